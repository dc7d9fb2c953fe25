/**
 * Local gradebook storage used by the sync engine.
 */

import type {
  Assignment,
  CanvasAccount,
  Course,
  GradeCategory,
  NewAssignment,
  NewCourse,
  NewGradeCategory,
  NewTerm,
  Term,
} from '@/lib/db/schema';
import type { Season } from '@/lib/sync/types';

export type CoursePatch = Partial<Pick<Course, 'name' | 'lastSyncedAt'>>;

export type AssignmentPatch = Partial<
  Pick<
    Assignment,
    | 'name'
    | 'maxScore'
    | 'dueDate'
    | 'categoryId'
    | 'score'
    | 'completed'
    | 'isSubmitted'
    | 'isMissing'
    | 'lastSyncedAt'
  >
>;

export interface AssignmentWrites {
  inserts: NewAssignment[];
  updates: Array<{ id: string; patch: AssignmentPatch }>;
}

export type AccountSyncPatch = Partial<
  Pick<
    CanvasAccount,
    | 'lastSyncedAt'
    | 'lastSyncCourses'
    | 'lastSyncAssignments'
    | 'lastSyncCategories'
    | 'syncStatus'
  >
>;

export interface CanvasAccountInput {
  ownerId: string;
  baseUrl: string;
  accessTokenEncrypted: string;
  timezone?: string | null;
}

/**
 * Everything the sync engine reads and writes locally.
 *
 * `transaction` runs `fn` against a store bound to one transaction; calling
 * it again on that store opens a nested transaction (savepoint) whose
 * failure rolls back only its own writes.
 */
export interface GradebookStore {
  transaction<T>(fn: (store: GradebookStore) => Promise<T>): Promise<T>;

  getCanvasAccount(ownerId: string): Promise<CanvasAccount | null>;
  saveCanvasAccount(input: CanvasAccountInput): Promise<CanvasAccount>;
  updateCanvasAccount(ownerId: string, patch: AccountSyncPatch): Promise<void>;

  getTerm(ownerId: string, termId: string): Promise<Term | null>;
  findTerm(ownerId: string, season: Season, year: number): Promise<Term | null>;
  createTerm(term: NewTerm): Promise<Term>;
  /** Set active=false on every term of the owner except `keepTermId`. */
  deactivateOtherTerms(ownerId: string, keepTermId: string): Promise<void>;

  getCourse(ownerId: string, courseId: string): Promise<Course | null>;
  findCourseByRemoteId(remoteCourseId: string, termId: string): Promise<Course | null>;
  listCoursesInTerm(termId: string): Promise<Course[]>;
  createCourse(course: NewCourse): Promise<Course>;
  updateCourse(courseId: string, patch: CoursePatch): Promise<Course>;

  listCategories(courseId: string): Promise<GradeCategory[]>;
  createCategories(categories: NewGradeCategory[]): Promise<GradeCategory[]>;
  updateCategoryWeight(categoryId: string, weight: number): Promise<void>;

  listAssignments(courseId: string): Promise<Assignment[]>;
  /**
   * Apply a planned batch of inserts and updates for one course.
   *
   * @returns The inserted rows
   */
  saveAssignments(writes: AssignmentWrites): Promise<Assignment[]>;

  /** Delete assignments and categories of the given courses. */
  purgeCourseContent(courseIds: string[]): Promise<{ assignments: number; categories: number }>;
}
