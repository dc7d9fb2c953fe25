/**
 * GradebookStore backed by PostgreSQL through drizzle-orm.
 */

import { and, eq, inArray, ne } from 'drizzle-orm';

import type { DbExecutor } from '@/lib/db';
import {
  assignments,
  canvasAccounts,
  courses,
  gradeCategories,
  terms,
  type CanvasAccount,
  type Course,
  type GradeCategory,
  type NewCourse,
  type NewGradeCategory,
  type NewTerm,
  type Term,
  type Assignment,
} from '@/lib/db/schema';
import type { Season } from '@/lib/sync/types';
import type {
  AccountSyncPatch,
  AssignmentWrites,
  CanvasAccountInput,
  CoursePatch,
  GradebookStore,
} from './types';

export class DrizzleGradebookStore implements GradebookStore {
  constructor(private readonly db: DbExecutor) {}

  async transaction<T>(fn: (store: GradebookStore) => Promise<T>): Promise<T> {
    // Inside a transaction drizzle turns this into a SAVEPOINT
    return this.db.transaction((tx) => fn(new DrizzleGradebookStore(tx)));
  }

  async getCanvasAccount(ownerId: string): Promise<CanvasAccount | null> {
    const [account] = await this.db
      .select()
      .from(canvasAccounts)
      .where(eq(canvasAccounts.ownerId, ownerId))
      .limit(1);
    return account ?? null;
  }

  async saveCanvasAccount(input: CanvasAccountInput): Promise<CanvasAccount> {
    const [account] = await this.db
      .insert(canvasAccounts)
      .values({
        ownerId: input.ownerId,
        baseUrl: input.baseUrl,
        accessTokenEncrypted: input.accessTokenEncrypted,
        timezone: input.timezone ?? null,
      })
      .onConflictDoUpdate({
        target: canvasAccounts.ownerId,
        set: {
          baseUrl: input.baseUrl,
          accessTokenEncrypted: input.accessTokenEncrypted,
          timezone: input.timezone ?? null,
          updatedAt: new Date(),
        },
      })
      .returning();
    return account;
  }

  async updateCanvasAccount(ownerId: string, patch: AccountSyncPatch): Promise<void> {
    await this.db
      .update(canvasAccounts)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(canvasAccounts.ownerId, ownerId));
  }

  async getTerm(ownerId: string, termId: string): Promise<Term | null> {
    const [term] = await this.db
      .select()
      .from(terms)
      .where(and(eq(terms.id, termId), eq(terms.ownerId, ownerId)))
      .limit(1);
    return term ?? null;
  }

  async findTerm(ownerId: string, season: Season, year: number): Promise<Term | null> {
    const [term] = await this.db
      .select()
      .from(terms)
      .where(
        and(
          eq(terms.ownerId, ownerId),
          eq(terms.season, season),
          eq(terms.year, year)
        )
      )
      .limit(1);
    return term ?? null;
  }

  async createTerm(term: NewTerm): Promise<Term> {
    const [created] = await this.db.insert(terms).values(term).returning();
    return created;
  }

  async deactivateOtherTerms(ownerId: string, keepTermId: string): Promise<void> {
    await this.db
      .update(terms)
      .set({ active: false })
      .where(and(eq(terms.ownerId, ownerId), ne(terms.id, keepTermId)));
  }

  async getCourse(ownerId: string, courseId: string): Promise<Course | null> {
    const [course] = await this.db
      .select()
      .from(courses)
      .where(and(eq(courses.id, courseId), eq(courses.ownerId, ownerId)))
      .limit(1);
    return course ?? null;
  }

  async findCourseByRemoteId(remoteCourseId: string, termId: string): Promise<Course | null> {
    const [course] = await this.db
      .select()
      .from(courses)
      .where(
        and(eq(courses.remoteCourseId, remoteCourseId), eq(courses.termId, termId))
      )
      .limit(1);
    return course ?? null;
  }

  async listCoursesInTerm(termId: string): Promise<Course[]> {
    return this.db.select().from(courses).where(eq(courses.termId, termId));
  }

  async createCourse(course: NewCourse): Promise<Course> {
    const [created] = await this.db.insert(courses).values(course).returning();
    return created;
  }

  async updateCourse(courseId: string, patch: CoursePatch): Promise<Course> {
    const [updated] = await this.db
      .update(courses)
      .set(patch)
      .where(eq(courses.id, courseId))
      .returning();

    if (!updated) {
      throw new Error(`Course ${courseId} not found`);
    }
    return updated;
  }

  async listCategories(courseId: string): Promise<GradeCategory[]> {
    return this.db
      .select()
      .from(gradeCategories)
      .where(eq(gradeCategories.courseId, courseId));
  }

  async createCategories(categories: NewGradeCategory[]): Promise<GradeCategory[]> {
    if (categories.length === 0) {
      return [];
    }
    return this.db.insert(gradeCategories).values(categories).returning();
  }

  async updateCategoryWeight(categoryId: string, weight: number): Promise<void> {
    await this.db
      .update(gradeCategories)
      .set({ weight })
      .where(eq(gradeCategories.id, categoryId));
  }

  async listAssignments(courseId: string): Promise<Assignment[]> {
    return this.db
      .select()
      .from(assignments)
      .where(eq(assignments.courseId, courseId));
  }

  async saveAssignments(writes: AssignmentWrites): Promise<Assignment[]> {
    const inserted =
      writes.inserts.length > 0
        ? await this.db.insert(assignments).values(writes.inserts).returning()
        : [];

    // Updates share the transaction's connection, so they run one at a time
    for (const { id, patch } of writes.updates) {
      await this.db.update(assignments).set(patch).where(eq(assignments.id, id));
    }

    return inserted;
  }

  async purgeCourseContent(
    courseIds: string[]
  ): Promise<{ assignments: number; categories: number }> {
    if (courseIds.length === 0) {
      return { assignments: 0, categories: 0 };
    }

    const deletedAssignments = await this.db
      .delete(assignments)
      .where(inArray(assignments.courseId, courseIds))
      .returning({ id: assignments.id });
    const deletedCategories = await this.db
      .delete(gradeCategories)
      .where(inArray(gradeCategories.courseId, courseIds))
      .returning({ id: gradeCategories.id });

    return {
      assignments: deletedAssignments.length,
      categories: deletedCategories.length,
    };
  }
}
