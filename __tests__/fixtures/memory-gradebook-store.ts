import { randomUUID } from 'crypto';

import type {
  Assignment,
  CanvasAccount,
  Course,
  GradeCategory,
  NewCourse,
  NewGradeCategory,
  NewTerm,
  Term,
} from '@/lib/db/schema';
import type {
  AccountSyncPatch,
  AssignmentWrites,
  CanvasAccountInput,
  CoursePatch,
  GradebookStore,
} from '@/lib/gradebook/types';
import type { Season } from '@/lib/sync/types';

interface GradebookState {
  accounts: CanvasAccount[];
  terms: Term[];
  courses: Course[];
  categories: GradeCategory[];
  assignments: Assignment[];
}

/**
 * In-process GradebookStore. Transactions snapshot the whole state and
 * restore it when the callback throws, nested ones included.
 */
export class MemoryGradebookStore implements GradebookStore {
  state: GradebookState = {
    accounts: [],
    terms: [],
    courses: [],
    categories: [],
    assignments: [],
  };

  /** Called before every write; throw from it to inject failures. */
  beforeWrite: ((operation: string, subject: string) => void) | null = null;

  transactions = 0;

  private write(operation: string, subject: string): void {
    this.beforeWrite?.(operation, subject);
  }

  async transaction<T>(fn: (store: GradebookStore) => Promise<T>): Promise<T> {
    this.transactions++;
    const snapshot = structuredClone(this.state);
    try {
      return await fn(this);
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }

  async getCanvasAccount(ownerId: string): Promise<CanvasAccount | null> {
    return this.state.accounts.find((account) => account.ownerId === ownerId) ?? null;
  }

  async saveCanvasAccount(input: CanvasAccountInput): Promise<CanvasAccount> {
    this.write('saveCanvasAccount', input.ownerId);
    const existing = await this.getCanvasAccount(input.ownerId);
    if (existing) {
      existing.baseUrl = input.baseUrl;
      existing.accessTokenEncrypted = input.accessTokenEncrypted;
      existing.timezone = input.timezone ?? null;
      existing.updatedAt = new Date();
      return existing;
    }

    const account: CanvasAccount = {
      ownerId: input.ownerId,
      baseUrl: input.baseUrl,
      accessTokenEncrypted: input.accessTokenEncrypted,
      timezone: input.timezone ?? null,
      lastSyncedAt: null,
      lastSyncCourses: 0,
      lastSyncAssignments: 0,
      lastSyncCategories: 0,
      syncStatus: 'idle',
      createdAt: new Date(),
      updatedAt: new Date(),
    };
    this.state.accounts.push(account);
    return account;
  }

  async updateCanvasAccount(ownerId: string, patch: AccountSyncPatch): Promise<void> {
    this.write('updateCanvasAccount', ownerId);
    const account = await this.getCanvasAccount(ownerId);
    if (account) {
      Object.assign(account, patch, { updatedAt: new Date() });
    }
  }

  async getTerm(ownerId: string, termId: string): Promise<Term | null> {
    return this.state.terms.find((term) => term.id === termId && term.ownerId === ownerId) ?? null;
  }

  async findTerm(ownerId: string, season: Season, year: number): Promise<Term | null> {
    return (
      this.state.terms.find(
        (term) => term.ownerId === ownerId && term.season === season && term.year === year
      ) ?? null
    );
  }

  async createTerm(term: NewTerm): Promise<Term> {
    this.write('createTerm', term.nickname);
    const created: Term = {
      id: term.id ?? randomUUID(),
      ownerId: term.ownerId,
      nickname: term.nickname,
      season: term.season,
      year: term.year,
      schoolName: term.schoolName,
      startDate: term.startDate ?? null,
      endDate: term.endDate ?? null,
      active: term.active ?? true,
      createdAt: new Date(),
    };
    this.state.terms.push(created);
    return created;
  }

  async deactivateOtherTerms(ownerId: string, keepTermId: string): Promise<void> {
    this.write('deactivateOtherTerms', ownerId);
    for (const term of this.state.terms) {
      if (term.ownerId === ownerId && term.id !== keepTermId) {
        term.active = false;
      }
    }
  }

  async getCourse(ownerId: string, courseId: string): Promise<Course | null> {
    return (
      this.state.courses.find((course) => course.id === courseId && course.ownerId === ownerId) ??
      null
    );
  }

  async findCourseByRemoteId(remoteCourseId: string, termId: string): Promise<Course | null> {
    return (
      this.state.courses.find(
        (course) => course.remoteCourseId === remoteCourseId && course.termId === termId
      ) ?? null
    );
  }

  async listCoursesInTerm(termId: string): Promise<Course[]> {
    return this.state.courses.filter((course) => course.termId === termId);
  }

  async createCourse(course: NewCourse): Promise<Course> {
    this.write('createCourse', course.name);
    if (course.remoteCourseId && (await this.findCourseByRemoteId(course.remoteCourseId, course.termId))) {
      throw new Error(`duplicate key value violates unique constraint "idx_courses_remote_term"`);
    }

    const created: Course = {
      id: course.id ?? randomUUID(),
      ownerId: course.ownerId,
      termId: course.termId,
      name: course.name,
      credits: course.credits ?? 0,
      isWeighted: course.isWeighted ?? true,
      remoteCourseId: course.remoteCourseId ?? null,
      lastSyncedAt: course.lastSyncedAt ?? null,
      createdAt: new Date(),
    };
    this.state.courses.push(created);
    return created;
  }

  async updateCourse(courseId: string, patch: CoursePatch): Promise<Course> {
    const course = this.state.courses.find((candidate) => candidate.id === courseId);
    if (!course) {
      throw new Error(`Course ${courseId} not found`);
    }
    this.write('updateCourse', course.name);
    Object.assign(course, patch);
    return course;
  }

  async listCategories(courseId: string): Promise<GradeCategory[]> {
    return this.state.categories
      .filter((category) => category.courseId === courseId)
      .map((category) => ({ ...category }));
  }

  async createCategories(categories: NewGradeCategory[]): Promise<GradeCategory[]> {
    this.write('createCategories', categories.map((category) => category.name).join(','));
    const created: GradeCategory[] = [];
    for (const category of categories) {
      const duplicate = this.state.categories.some(
        (existing) => existing.courseId === category.courseId && existing.name === category.name
      );
      if (duplicate) {
        throw new Error(`duplicate key value violates unique constraint "idx_grade_categories_course_name"`);
      }
      const row: GradeCategory = {
        id: category.id ?? randomUUID(),
        courseId: category.courseId,
        name: category.name,
        weight: category.weight,
      };
      this.state.categories.push(row);
      created.push({ ...row });
    }
    return created;
  }

  async updateCategoryWeight(categoryId: string, weight: number): Promise<void> {
    this.write('updateCategoryWeight', categoryId);
    const category = this.state.categories.find((candidate) => candidate.id === categoryId);
    if (category) {
      category.weight = weight;
    }
  }

  async listAssignments(courseId: string): Promise<Assignment[]> {
    return this.state.assignments
      .filter((assignment) => assignment.courseId === courseId)
      .map((assignment) => ({ ...assignment }));
  }

  async saveAssignments(writes: AssignmentWrites): Promise<Assignment[]> {
    this.write('saveAssignments', writes.inserts.map((row) => row.name).join(','));
    const inserted: Assignment[] = [];

    for (const row of writes.inserts) {
      const duplicate = this.state.assignments.some(
        (existing) =>
          existing.courseId === row.courseId && existing.remoteAssignmentId === row.remoteAssignmentId
      );
      if (duplicate) {
        throw new Error(`duplicate key value violates unique constraint "idx_assignments_remote_course"`);
      }

      const assignment: Assignment = {
        id: row.id ?? randomUUID(),
        courseId: row.courseId,
        categoryId: row.categoryId ?? null,
        name: row.name,
        score: row.score ?? null,
        maxScore: row.maxScore,
        dueDate: row.dueDate ?? null,
        remoteAssignmentId: row.remoteAssignmentId,
        remoteCourseId: row.remoteCourseId ?? null,
        completed: row.completed ?? false,
        isSubmitted: row.isSubmitted ?? false,
        isMissing: row.isMissing ?? false,
        isExtraCredit: row.isExtraCredit ?? false,
        lastSyncedAt: row.lastSyncedAt ?? null,
      };
      this.state.assignments.push(assignment);
      inserted.push({ ...assignment });
    }

    for (const { id, patch } of writes.updates) {
      const assignment = this.state.assignments.find((candidate) => candidate.id === id);
      if (assignment) {
        Object.assign(assignment, patch);
      }
    }

    return inserted;
  }

  async purgeCourseContent(courseIds: string[]): Promise<{ assignments: number; categories: number }> {
    this.write('purgeCourseContent', courseIds.join(','));
    const ids = new Set(courseIds);
    const assignmentsBefore = this.state.assignments.length;
    const categoriesBefore = this.state.categories.length;

    this.state.assignments = this.state.assignments.filter((row) => !ids.has(row.courseId));
    this.state.categories = this.state.categories.filter((row) => !ids.has(row.courseId));

    return {
      assignments: assignmentsBefore - this.state.assignments.length,
      categories: categoriesBefore - this.state.categories.length,
    };
  }

  /** Seed a term directly, bypassing sibling deactivation. */
  addTerm(term: Pick<Term, 'ownerId' | 'season' | 'year'> & Partial<Term>): Term {
    const row: Term = {
      id: randomUUID(),
      nickname: `${term.season} ${term.year}`,
      schoolName: 'Test University',
      startDate: null,
      endDate: null,
      active: true,
      createdAt: new Date(),
      ...term,
    };
    this.state.terms.push(row);
    return row;
  }

  /** Seed a course directly. */
  addCourse(course: Pick<Course, 'ownerId' | 'termId' | 'name'> & Partial<Course>): Course {
    const row: Course = {
      id: randomUUID(),
      credits: 3,
      isWeighted: true,
      remoteCourseId: null,
      lastSyncedAt: null,
      createdAt: new Date(),
      ...course,
    };
    this.state.courses.push(row);
    return row;
  }
}
