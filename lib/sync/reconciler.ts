/**
 * Reconciliation of Canvas entities into local gradebook rows.
 *
 * Every function is an idempotent upsert keyed by (remote id, parent id):
 * courses by (remoteCourseId, termId), categories by (courseId, name) and
 * assignments by (remoteAssignmentId, courseId).
 */

import pLimit from 'p-limit';

import {
  CanvasAssignmentGroupSchema,
  CanvasAssignmentSchema,
  CanvasIdSchema,
  CanvasSubmissionSchema,
  describeIssues,
  indexSubmissions,
  type CanvasAssignment,
  type CanvasAssignmentGroup,
  type CanvasCourse,
  type CanvasSubmission,
} from '@/lib/canvas/schemas';
import type { CanvasRecord, RemoteCourseClient } from '@/lib/canvas/types';
import type { Assignment, Course, NewAssignment } from '@/lib/db/schema';
import type { AssignmentPatch, GradebookStore } from '@/lib/gradebook/types';
import { convertDueDate } from './due-date';
import { deriveSubmissionState } from './submission-state';
import { ReconciliationError, errorMessage } from './types';

/** Credits given to courses imported from Canvas. */
export const DEFAULT_COURSE_CREDITS = 3.0;

/** Concurrent remote fetches per course (groups, assignments, submissions). */
export const COURSE_FETCH_CONCURRENCY = 3;

/** Pause between single-submission fetches when the bulk call fails. */
export const SUBMISSION_FALLBACK_DELAY_MS = 100;

const WEIGHT_EPSILON = 1e-6;

export interface ReconcileOptions {
  /** IANA timezone for due dates */
  timezone: string;
  now?: Date;
}

export interface CourseReconcileResult {
  course: Course;
  created: boolean;
}

/**
 * Find the course by (remoteCourseId, termId) or create it.
 * Existing courses get a new name only when it changed.
 */
export async function reconcileCourse(
  store: GradebookStore,
  remote: CanvasCourse,
  termId: string,
  ownerId: string,
  now: Date = new Date()
): Promise<CourseReconcileResult> {
  const existing = await store.findCourseByRemoteId(remote.id, termId);

  if (!existing) {
    const course = await store.createCourse({
      ownerId,
      termId,
      name: remote.name,
      credits: DEFAULT_COURSE_CREDITS,
      isWeighted: true,
      remoteCourseId: remote.id,
      lastSyncedAt: now,
    });
    return { course, created: true };
  }

  const course = await store.updateCourse(existing.id, {
    lastSyncedAt: now,
    ...(existing.name !== remote.name ? { name: remote.name } : {}),
  });
  return { course, created: false };
}

export interface CategoryReconcileResult {
  /** Remote assignment group id -> local category id */
  lookup: Map<string, string>;
  created: number;
}

/**
 * Map Canvas assignment groups onto the course's grade categories by name.
 *
 * Missing categories are inserted in one batch; existing ones get their
 * weight updated in place. Groups sharing a name share one category, and the
 * first of them decides its weight.
 */
export async function reconcileCategories(
  store: GradebookStore,
  groups: CanvasAssignmentGroup[],
  courseId: string
): Promise<CategoryReconcileResult> {
  const existing = await store.listCategories(courseId);
  const byName = new Map(existing.map((category) => [category.name, category]));

  const lookup = new Map<string, string>();
  const seenNames = new Set<string>();
  const toCreate = new Map<string, number>();
  const pendingGroups: CanvasAssignmentGroup[] = [];

  for (const group of groups) {
    const weight = (group.group_weight ?? 0) / 100;
    const firstOfName = !seenNames.has(group.name);
    seenNames.add(group.name);

    const category = byName.get(group.name);
    if (category) {
      if (firstOfName && Math.abs(category.weight - weight) > WEIGHT_EPSILON) {
        await store.updateCategoryWeight(category.id, weight);
      }
      lookup.set(group.id, category.id);
      continue;
    }

    if (firstOfName) {
      toCreate.set(group.name, weight);
    }
    pendingGroups.push(group);
  }

  const created = await store.createCategories(
    Array.from(toCreate, ([name, weight]) => ({ courseId, name, weight }))
  );
  const createdByName = new Map(created.map((category) => [category.name, category.id]));

  for (const group of pendingGroups) {
    const categoryId = createdByName.get(group.name);
    if (categoryId) {
      lookup.set(group.id, categoryId);
    }
  }

  return { lookup, created: created.length };
}

export interface AssignmentContext extends ReconcileOptions {
  courseId: string;
  remoteCourseId: string;
  categoryLookup: Map<string, string>;
}

type AssignmentPlan =
  | { kind: 'insert'; row: NewAssignment }
  | { kind: 'update'; id: string; patch: AssignmentPatch };

/**
 * Decide the write for one assignment without touching the store.
 *
 * @throws ReconciliationError for an invalid due date
 */
export function planAssignment(
  remote: CanvasAssignment,
  existing: Assignment | undefined,
  submission: CanvasSubmission | null | undefined,
  context: AssignmentContext
): AssignmentPlan {
  let dueDate: string | null;
  try {
    dueDate = convertDueDate(remote.due_at, context.timezone);
  } catch (error) {
    throw new ReconciliationError(`Assignment "${remote.name}": ${errorMessage(error)}`);
  }

  const categoryId = remote.assignment_group_id
    ? (context.categoryLookup.get(remote.assignment_group_id) ?? null)
    : null;
  const state = deriveSubmissionState(submission);
  const now = context.now ?? new Date();

  const fields = {
    name: remote.name,
    maxScore: remote.points_possible ?? 0,
    dueDate,
    categoryId,
    isSubmitted: state.isSubmitted,
    completed: state.completed,
    isMissing: state.isMissing,
    lastSyncedAt: now,
  };

  if (!existing) {
    return {
      kind: 'insert',
      row: {
        ...fields,
        courseId: context.courseId,
        remoteAssignmentId: remote.id,
        remoteCourseId: context.remoteCourseId,
        score: state.score ?? null,
        isExtraCredit: false,
      },
    };
  }

  return {
    kind: 'update',
    id: existing.id,
    patch: state.score !== undefined ? { ...fields, score: state.score } : fields,
  };
}

/**
 * Upsert a single assignment.
 */
export async function reconcileAssignment(
  store: GradebookStore,
  remote: CanvasAssignment,
  context: AssignmentContext,
  submission?: CanvasSubmission | null
): Promise<{ assignmentId: string; created: boolean }> {
  const existing = (await store.listAssignments(context.courseId)).find(
    (assignment) => assignment.remoteAssignmentId === remote.id
  );
  const plan = planAssignment(remote, existing, submission, context);

  if (plan.kind === 'update') {
    await store.saveAssignments({ inserts: [], updates: [{ id: plan.id, patch: plan.patch }] });
    return { assignmentId: plan.id, created: false };
  }

  const [inserted] = await store.saveAssignments({ inserts: [plan.row], updates: [] });
  if (!inserted) {
    throw new ReconciliationError(`Assignment "${remote.name}" was not saved`);
  }
  return { assignmentId: inserted.id, created: true };
}

export interface AssignmentBatchResult {
  processed: number;
  created: number;
  updated: number;
  errors: string[];
}

/**
 * Upsert every assignment of one course with a single store write.
 *
 * Assignments that fail validation are skipped and reported in `errors`.
 */
export async function reconcileAssignments(
  store: GradebookStore,
  records: CanvasRecord[],
  submissions: Map<string, CanvasSubmission>,
  context: AssignmentContext
): Promise<AssignmentBatchResult> {
  const existingByRemoteId = new Map(
    (await store.listAssignments(context.courseId)).map((assignment) => [
      assignment.remoteAssignmentId,
      assignment,
    ])
  );

  const result: AssignmentBatchResult = { processed: 0, created: 0, updated: 0, errors: [] };
  const inserts: NewAssignment[] = [];
  const updates: Array<{ id: string; patch: AssignmentPatch }> = [];
  const planned = new Set<string>();

  for (const record of records) {
    const parsed = CanvasAssignmentSchema.safeParse(record);
    if (!parsed.success) {
      result.errors.push(
        `Assignment in course ${context.remoteCourseId} skipped: ${describeIssues(parsed.error)}`
      );
      continue;
    }

    const remote = parsed.data;
    if (planned.has(remote.id)) {
      continue;
    }
    planned.add(remote.id);

    let plan: AssignmentPlan;
    try {
      plan = planAssignment(
        remote,
        existingByRemoteId.get(remote.id),
        submissions.get(remote.id),
        context
      );
    } catch (error) {
      if (!(error instanceof ReconciliationError)) {
        throw error;
      }
      console.warn(`[CanvasSync] ${error.message}`);
      result.errors.push(error.message);
      continue;
    }

    if (plan.kind === 'insert') {
      inserts.push(plan.row);
      result.created++;
    } else {
      updates.push({ id: plan.id, patch: plan.patch });
      result.updated++;
    }
    result.processed++;
  }

  await store.saveAssignments({ inserts, updates });
  return result;
}

/**
 * Remote data for one course, fetched before any local write.
 */
export interface CourseBundle {
  remoteCourseId: string;
  groups: CanvasAssignmentGroup[];
  assignments: CanvasRecord[];
  submissions: Map<string, CanvasSubmission>;
  errors: string[];
}

export interface FetchCourseOptions {
  submissionFallbackDelayMs?: number;
  /** Concurrent requests for this course, defaults to COURSE_FETCH_CONCURRENCY */
  concurrency?: number;
}

/**
 * Fetch assignment groups, assignments and bulk submissions concurrently.
 *
 * A failed bulk submissions call falls back to one request per assignment;
 * assignments whose submission still cannot be read sync as unsubmitted.
 *
 * @throws when groups or assignments cannot be fetched
 */
export async function fetchCourseBundle(
  client: RemoteCourseClient,
  remoteCourseId: string,
  options: FetchCourseOptions = {}
): Promise<CourseBundle> {
  const errors: string[] = [];
  const courseFetchLimit = pLimit(options.concurrency ?? COURSE_FETCH_CONCURRENCY);

  const [groupRecords, assignments, bulkSubmissions] = await Promise.all([
    courseFetchLimit(() => client.getAssignmentGroups(remoteCourseId)),
    courseFetchLimit(() => client.getAssignments(remoteCourseId)),
    courseFetchLimit(() =>
      client.getSubmissions(remoteCourseId).catch((error: unknown) => {
        console.warn(
          `[CanvasSync] Bulk submissions failed for course ${remoteCourseId}, fetching per assignment:`,
          errorMessage(error)
        );
        return null;
      })
    ),
  ]);

  const groups: CanvasAssignmentGroup[] = [];
  for (const record of groupRecords) {
    const parsed = CanvasAssignmentGroupSchema.safeParse(record);
    if (parsed.success) {
      groups.push(parsed.data);
    } else {
      errors.push(
        `Assignment group in course ${remoteCourseId} skipped: ${describeIssues(parsed.error)}`
      );
    }
  }

  const submissions = bulkSubmissions
    ? indexSubmissions(bulkSubmissions)
    : await fetchSubmissionsIndividually(
        client,
        remoteCourseId,
        assignments,
        options.submissionFallbackDelayMs ?? SUBMISSION_FALLBACK_DELAY_MS,
        errors
      );

  return { remoteCourseId, groups, assignments, submissions, errors };
}

async function fetchSubmissionsIndividually(
  client: RemoteCourseClient,
  remoteCourseId: string,
  assignments: CanvasRecord[],
  delayMs: number,
  errors: string[]
): Promise<Map<string, CanvasSubmission>> {
  const submissions = new Map<string, CanvasSubmission>();
  let failed = 0;

  for (const [index, record] of assignments.entries()) {
    const assignmentId = CanvasIdSchema.safeParse(record.id);
    if (!assignmentId.success) {
      continue;
    }

    if (index > 0 && delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }

    try {
      const [submission] = await client.getSubmissions(remoteCourseId, assignmentId.data);
      const parsed = CanvasSubmissionSchema.safeParse(submission);
      if (submission && parsed.success) {
        submissions.set(assignmentId.data, parsed.data);
      }
    } catch (error) {
      failed++;
      console.warn(
        `[CanvasSync] Submission for assignment ${assignmentId.data} unavailable:`,
        errorMessage(error)
      );
    }
  }

  if (failed > 0) {
    errors.push(
      `Could not fetch submissions for ${failed} assignment(s) in course ${remoteCourseId}`
    );
  }
  return submissions;
}

export interface CourseContentResult {
  categoriesCreated: number;
  assignments: AssignmentBatchResult;
}

/**
 * Write categories then assignments for one fetched course.
 */
export async function reconcileCourseContent(
  store: GradebookStore,
  bundle: CourseBundle,
  courseId: string,
  options: ReconcileOptions
): Promise<CourseContentResult> {
  const categories = await reconcileCategories(store, bundle.groups, courseId);

  const assignments = await reconcileAssignments(
    store,
    bundle.assignments,
    bundle.submissions,
    {
      ...options,
      courseId,
      remoteCourseId: bundle.remoteCourseId,
      categoryLookup: categories.lookup,
    }
  );

  return {
    categoriesCreated: categories.created,
    assignments: {
      ...assignments,
      errors: [...bundle.errors, ...assignments.errors],
    },
  };
}
