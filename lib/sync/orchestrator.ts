/**
 * Canvas Sync Orchestrator
 *
 * Drives one sync attempt (all courses, one term, or one course) through
 * connect -> fetch -> reconcile -> finalize, reporting progress and saving a
 * checkpoint after every committed chunk so a failed attempt can resume.
 */

import { CanvasCourseSchema, describeIssues, type CanvasCourse } from '@/lib/canvas/schemas';
import type { CanvasRecord, RemoteCourseClient } from '@/lib/canvas/types';
import type { GradebookStore } from '@/lib/gradebook/types';
import { DEFAULT_CHECKPOINT_TTL_MS, type CheckpointStore } from './checkpoints';
import {
  fetchCourseBundle,
  reconcileCourse,
  reconcileCourseContent,
  type CourseBundle,
} from './reconciler';
import { TermResolver } from './term-resolver';
import {
  CheckpointError,
  SyncCancelledError,
  SyncConnectionError,
  SyncError,
  SyncFetchError,
  SyncTargetError,
  emptySyncResult,
  errorMessage,
  type ProgressCallback,
  type SyncCheckpoint,
  type SyncRequest,
  type SyncResult,
  type SyncScope,
  type SyncState,
} from './types';

export const DEFAULT_CHUNK_SIZE = 10;
export const DEFAULT_CHUNK_DELAY_MS = 500;

const TRANSITIONS: Record<SyncState, readonly SyncState[]> = {
  init: ['connecting', 'failed'],
  connecting: ['fetching', 'failed'],
  fetching: ['reconciling', 'failed'],
  reconciling: ['finalizing', 'failed'],
  finalizing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface SyncOrchestratorOptions {
  client: RemoteCourseClient;
  store: GradebookStore;
  checkpoints: CheckpointStore;
  /** IANA timezone for due dates */
  timezone: string;
  chunkSize?: number;
  chunkDelayMs?: number;
  checkpointTtlMs?: number;
  onProgress?: ProgressCallback;
  onCheckpoint?: (checkpoint: SyncCheckpoint) => void;
  signal?: AbortSignal;
  submissionFallbackDelayMs?: number;
}

interface PreparedCourse {
  remote: CanvasCourse;
  termId: string;
  bundle: CourseBundle;
}

interface CourseRun {
  scope: 'all' | 'term';
  targetId: string | null;
  courses: CanvasCourse[];
  /** Fixed term for term scope; resolved per course otherwise */
  termId?: string;
  checkpoint: SyncCheckpoint | null;
  result: SyncResult;
}

export class SyncOrchestrator {
  private currentState: SyncState = 'init';
  private startedAt = Date.now();
  private readonly chunkSize: number;
  private readonly chunkDelayMs: number;
  private readonly checkpointTtlMs: number;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.chunkDelayMs = options.chunkDelayMs ?? DEFAULT_CHUNK_DELAY_MS;
    this.checkpointTtlMs = options.checkpointTtlMs ?? DEFAULT_CHECKPOINT_TTL_MS;
  }

  get state(): SyncState {
    return this.currentState;
  }

  /**
   * Run the sync described by `request`.
   *
   * @throws SyncError subclasses for attempt-level failures; per-course
   * failures are returned in `errors` instead
   */
  async run(ownerId: string, request: SyncRequest): Promise<SyncResult> {
    switch (request.scope) {
      case 'all':
        return this.syncAll(ownerId, { incremental: request.incremental });
      case 'term':
        return this.syncTerm(ownerId, request.termId, { forceFull: request.forceFull });
      case 'course':
        return this.syncCourse(ownerId, request.courseId);
    }
  }

  /**
   * Sync every enrolled Canvas course, creating terms as needed.
   *
   * With `incremental`, only courses updated since the account's last
   * successful sync are fetched.
   */
  async syncAll(
    ownerId: string,
    options: { incremental?: boolean } = {}
  ): Promise<SyncResult> {
    return this.attempt(ownerId, 'all', async () => {
      await this.connect();

      this.transition('fetching');
      let since: Date | undefined;
      if (options.incremental) {
        const account = await this.options.store.getCanvasAccount(ownerId);
        since = account?.lastSyncedAt ?? undefined;
      }
      await this.emit(5, 0, 0, 'Fetching courses from Canvas', '', []);
      const courses = await this.fetchCourses(since);

      const result = await this.runCourses(ownerId, {
        scope: 'all',
        targetId: null,
        courses: courses.valid,
        checkpoint: await this.loadCheckpoint(ownerId, 'all', null),
        result: { ...emptySyncResult(), errors: courses.errors },
      });

      await this.finalize(ownerId, 'all', result, true);
      return result;
    });
  }

  /**
   * Sync every Canvas course into one existing local term.
   *
   * Canvas term metadata is not used for filtering: all fetched courses are
   * attached to `termId`. With `forceFull`, existing assignments and
   * categories of the term's courses are deleted first (fresh starts only).
   */
  async syncTerm(
    ownerId: string,
    termId: string,
    options: { forceFull?: boolean } = {}
  ): Promise<SyncResult> {
    return this.attempt(ownerId, 'term', async () => {
      await this.connect();

      this.transition('fetching');
      const term = await this.options.store.getTerm(ownerId, termId);
      if (!term) {
        throw new SyncTargetError(`Term ${termId} not found`);
      }
      await this.emit(5, 0, 0, 'Fetching courses from Canvas', term.nickname, []);
      const courses = await this.fetchCourses();
      const checkpoint = await this.loadCheckpoint(ownerId, 'term', termId);

      if (options.forceFull && !checkpoint) {
        await this.purgeTerm(termId);
      }

      const result = await this.runCourses(ownerId, {
        scope: 'term',
        targetId: termId,
        termId,
        courses: courses.valid,
        checkpoint,
        result: { ...emptySyncResult(), errors: courses.errors },
      });

      await this.finalize(ownerId, 'term', result, true);
      return result;
    });
  }

  /**
   * Sync the assignment groups, assignments and submissions of one course
   * that is already linked to Canvas.
   */
  async syncCourse(ownerId: string, courseId: string): Promise<SyncResult> {
    return this.attempt(ownerId, 'course', async () => {
      await this.connect();

      this.transition('fetching');
      const course = await this.options.store.getCourse(ownerId, courseId);
      if (!course) {
        throw new SyncTargetError(`Course ${courseId} not found`);
      }
      if (!course.remoteCourseId) {
        throw new SyncTargetError(`Course "${course.name}" is not linked to Canvas`);
      }

      await this.emit(5, 0, 1, 'Fetching course data from Canvas', course.name, []);
      let bundle: CourseBundle;
      try {
        bundle = await fetchCourseBundle(this.options.client, course.remoteCourseId, {
          submissionFallbackDelayMs: this.options.submissionFallbackDelayMs,
        });
      } catch (error) {
        throw new SyncFetchError(
          `Failed to fetch course "${course.name}" from Canvas: ${errorMessage(error)}`
        );
      }

      this.transition('reconciling');
      this.checkAborted();
      const content = await this.options.store.transaction(async (tx) => {
        const written = await reconcileCourseContent(tx, bundle, course.id, {
          timezone: this.options.timezone,
        });
        await tx.updateCourse(course.id, { lastSyncedAt: new Date() });
        return written;
      });

      const result: SyncResult = {
        ...emptySyncResult(),
        coursesProcessed: 1,
        coursesUpdated: 1,
        assignmentsProcessed: content.assignments.processed,
        assignmentsCreated: content.assignments.created,
        assignmentsUpdated: content.assignments.updated,
        categoriesCreated: content.categoriesCreated,
        errors: content.assignments.errors,
      };
      await this.emit(95, 1, 1, 'Course reconciled', course.name, result.errors);

      await this.finalize(ownerId, 'course', result, false);
      return result;
    });
  }

  private async attempt(
    ownerId: string,
    scope: SyncScope,
    body: () => Promise<SyncResult>
  ): Promise<SyncResult> {
    this.startedAt = Date.now();
    console.log(`[CanvasSync] Starting ${scope} sync for ${ownerId}`);

    try {
      const result = await body();
      console.log(
        `[CanvasSync] ${scope} sync finished for ${ownerId}: ${result.coursesProcessed} courses, ${result.assignmentsProcessed} assignments, ${result.errors.length} errors`
      );
      return result;
    } catch (error) {
      if (TRANSITIONS[this.currentState].includes('failed')) {
        this.transition('failed');
      }
      console.error(`[CanvasSync] ${scope} sync failed for ${ownerId}:`, errorMessage(error));

      if (error instanceof SyncCancelledError && scope !== 'course') {
        await this.deleteCheckpoint(ownerId, scope);
      }
      await this.emit(100, 0, 0, `Sync failed: ${errorMessage(error)}`, '', []);
      throw error;
    }
  }

  private transition(next: SyncState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new SyncError(
        `Illegal sync state transition ${this.currentState} -> ${next}`,
        'ILLEGAL_TRANSITION'
      );
    }
    console.log(`[CanvasSync] State ${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  private async connect(): Promise<void> {
    this.transition('connecting');
    await this.emit(0, 0, 0, 'Testing Canvas connection', '', []);

    const connection = await this.options.client.testConnection();
    if (!connection.success) {
      throw new SyncConnectionError(`Canvas connection failed: ${connection.error}`);
    }
  }

  private async fetchCourses(
    since?: Date
  ): Promise<{ valid: CanvasCourse[]; errors: string[] }> {
    let records: CanvasRecord[];
    try {
      records = await this.options.client.getCourses({ since });
    } catch (error) {
      throw new SyncFetchError(`Failed to fetch courses from Canvas: ${errorMessage(error)}`);
    }

    const valid: CanvasCourse[] = [];
    const errors: string[] = [];
    for (const record of records) {
      const parsed = CanvasCourseSchema.safeParse(record);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        errors.push(`Course skipped: ${describeIssues(parsed.error)}`);
      }
    }
    return { valid, errors };
  }

  private async purgeTerm(termId: string): Promise<void> {
    const purged = await this.options.store.transaction(async (tx) => {
      const courses = await tx.listCoursesInTerm(termId);
      return tx.purgeCourseContent(courses.map((course) => course.id));
    });
    console.warn(
      `[CanvasSync] Force full term sync removed ${purged.assignments} assignments and ${purged.categories} categories`
    );
  }

  /**
   * Reconcile courses chunk by chunk, resuming from a checkpoint if given.
   */
  private async runCourses(ownerId: string, run: CourseRun): Promise<SyncResult> {
    this.transition('reconciling');

    const processed = new Set(run.checkpoint?.processedRemoteIds ?? []);
    const failed = new Set(run.checkpoint?.failedRemoteIds ?? []);
    let result = run.result;

    if (run.checkpoint) {
      // The interrupted attempt already saved the course list errors
      const carried = new Set(run.checkpoint.errors);
      result = {
        ...run.checkpoint.counts,
        errors: [
          ...run.checkpoint.errors,
          ...run.result.errors.filter((message) => !carried.has(message)),
        ],
      };
      console.log(
        `[Checkpoint] Resuming ${run.scope} sync for ${ownerId}: ${processed.size} courses already done`
      );
    }

    const total = run.courses.length;
    const pending = run.courses.filter(
      (course) => !processed.has(course.id) && !failed.has(course.id)
    );
    let completed = total - pending.length;

    const terms = run.termId ? null : new TermResolver(this.options.store, ownerId);

    for (let start = 0; start < pending.length; start += this.chunkSize) {
      const chunk = pending.slice(start, start + this.chunkSize);

      // Fetch the whole chunk before opening the write transaction
      const prepared: PreparedCourse[] = [];
      for (const remote of chunk) {
        this.checkAborted();
        await this.emit(this.percent(completed, total), completed, total, 'Fetching course', remote.name, result.errors);
        try {
          const termId = run.termId ?? (await this.resolveTerm(terms, remote));
          const bundle = await fetchCourseBundle(this.options.client, remote.id, {
            submissionFallbackDelayMs: this.options.submissionFallbackDelayMs,
          });
          prepared.push({ remote, termId, bundle });
        } catch (error) {
          failed.add(remote.id);
          completed++;
          result = this.recordCourseError(result, remote, error);
        }
      }

      this.checkAborted();
      const chunkResult = await this.options.store.transaction(async (tx) => {
        let tally: SyncResult = { ...emptySyncResult(), errors: [] };
        const done: string[] = [];
        const broken: string[] = [];

        for (const course of prepared) {
          try {
            const written = await tx.transaction((savepoint) =>
              this.writeCourse(savepoint, ownerId, course)
            );
            tally = mergeResults(tally, written);
            done.push(course.remote.id);
          } catch (error) {
            broken.push(course.remote.id);
            tally = this.recordCourseError(tally, course.remote, error);
          }

          const finished = completed + done.length + broken.length;
          await this.emit(
            this.percent(finished, total),
            finished,
            total,
            'Reconciled course',
            course.remote.name,
            [...result.errors, ...tally.errors]
          );
        }

        return { tally, done, broken };
      });

      result = mergeResults(result, chunkResult.tally);
      chunkResult.done.forEach((id) => processed.add(id));
      chunkResult.broken.forEach((id) => failed.add(id));
      completed += chunkResult.done.length + chunkResult.broken.length;

      await this.saveCheckpoint(ownerId, run.scope, {
        scope: run.scope,
        targetId: run.targetId,
        progressPercent: this.percent(completed, total),
        processedRemoteIds: Array.from(processed),
        failedRemoteIds: Array.from(failed),
        counts: countsOf(result),
        errors: result.errors,
        lastUpdated: new Date().toISOString(),
      });

      const hasMore = start + this.chunkSize < pending.length;
      if (hasMore && this.chunkDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.chunkDelayMs));
      }
    }

    return result;
  }

  private async resolveTerm(terms: TermResolver | null, remote: CanvasCourse): Promise<string> {
    if (!terms) {
      throw new SyncError('No term resolver for this sync scope');
    }
    return terms.resolve(remote.term?.name);
  }

  private async writeCourse(
    store: GradebookStore,
    ownerId: string,
    course: PreparedCourse
  ): Promise<SyncResult> {
    const { course: local, created } = await reconcileCourse(
      store,
      course.remote,
      course.termId,
      ownerId
    );
    const content = await reconcileCourseContent(store, course.bundle, local.id, {
      timezone: this.options.timezone,
    });

    return {
      coursesProcessed: 1,
      coursesCreated: created ? 1 : 0,
      coursesUpdated: created ? 0 : 1,
      assignmentsProcessed: content.assignments.processed,
      assignmentsCreated: content.assignments.created,
      assignmentsUpdated: content.assignments.updated,
      categoriesCreated: content.categoriesCreated,
      errors: content.assignments.errors,
    };
  }

  private recordCourseError(result: SyncResult, course: CanvasCourse, error: unknown): SyncResult {
    const message = `Course "${course.name}" (${course.id}): ${errorMessage(error)}`;
    console.error(`[CanvasSync] ${message}`);
    return { ...result, errors: [...result.errors, message] };
  }

  private async finalize(
    ownerId: string,
    scope: SyncScope,
    result: SyncResult,
    recordAccountSync: boolean
  ): Promise<void> {
    this.transition('finalizing');
    await this.emit(98, result.coursesProcessed, result.coursesProcessed, 'Finalizing sync', '', result.errors);

    if (scope !== 'course') {
      await this.deleteCheckpoint(ownerId, scope);
    }
    if (recordAccountSync) {
      await this.options.store.updateCanvasAccount(ownerId, {
        lastSyncedAt: new Date(),
        lastSyncCourses: result.coursesProcessed,
        lastSyncAssignments: result.assignmentsProcessed,
        lastSyncCategories: result.categoriesCreated,
      });
    }

    this.transition('completed');
    await this.emit(100, result.coursesProcessed, result.coursesProcessed, 'Sync complete', '', result.errors);
  }

  private checkAborted(): void {
    const signal = this.options.signal;
    if (!signal?.aborted) {
      return;
    }
    throw signal.reason instanceof SyncError ? signal.reason : new SyncCancelledError();
  }

  private percent(completed: number, total: number): number {
    if (total === 0) {
      return 95;
    }
    return Math.min(95, Math.floor((completed / total) * 85) + 10);
  }

  private async emit(
    progressPercent: number,
    completedItems: number,
    totalItems: number,
    currentOperation: string,
    currentItem: string,
    errors: string[]
  ): Promise<void> {
    if (!this.options.onProgress) {
      return;
    }

    try {
      await this.options.onProgress({
        state: this.currentState,
        progressPercent,
        completedItems,
        totalItems,
        currentOperation,
        currentItem,
        elapsedTime: Math.round((Date.now() - this.startedAt) / 100) / 10,
        errors: [...errors],
      });
    } catch (error) {
      console.warn('[CanvasSync] Progress callback failed:', errorMessage(error));
    }
  }

  private async loadCheckpoint(
    ownerId: string,
    scope: SyncScope,
    targetId: string | null
  ): Promise<SyncCheckpoint | null> {
    try {
      const checkpoint = await this.options.checkpoints.get(ownerId, scope);
      if (!checkpoint || checkpoint.targetId !== targetId) {
        return null;
      }
      return checkpoint;
    } catch (error) {
      const failure = new CheckpointError(`Could not load checkpoint: ${errorMessage(error)}`);
      console.warn(`[Checkpoint] ${failure.message}, starting from scratch`);
      return null;
    }
  }

  private async saveCheckpoint(
    ownerId: string,
    scope: SyncScope,
    checkpoint: SyncCheckpoint
  ): Promise<void> {
    try {
      await this.options.checkpoints.set(ownerId, scope, checkpoint, this.checkpointTtlMs);
      this.options.onCheckpoint?.(checkpoint);
    } catch (error) {
      const failure = new CheckpointError(`Could not save checkpoint: ${errorMessage(error)}`);
      console.warn(`[Checkpoint] ${failure.message}`);
    }
  }

  private async deleteCheckpoint(ownerId: string, scope: SyncScope): Promise<void> {
    try {
      await this.options.checkpoints.delete(ownerId, scope);
    } catch (error) {
      console.warn(`[Checkpoint] Could not delete checkpoint: ${errorMessage(error)}`);
    }
  }
}

function countsOf(result: SyncResult): SyncCheckpoint['counts'] {
  return {
    coursesProcessed: result.coursesProcessed,
    coursesCreated: result.coursesCreated,
    coursesUpdated: result.coursesUpdated,
    assignmentsProcessed: result.assignmentsProcessed,
    assignmentsCreated: result.assignmentsCreated,
    assignmentsUpdated: result.assignmentsUpdated,
    categoriesCreated: result.categoriesCreated,
  };
}

export function mergeResults(a: SyncResult, b: SyncResult): SyncResult {
  return {
    coursesProcessed: a.coursesProcessed + b.coursesProcessed,
    coursesCreated: a.coursesCreated + b.coursesCreated,
    coursesUpdated: a.coursesUpdated + b.coursesUpdated,
    assignmentsProcessed: a.assignmentsProcessed + b.assignmentsProcessed,
    assignmentsCreated: a.assignmentsCreated + b.assignmentsCreated,
    assignmentsUpdated: a.assignmentsUpdated + b.assignmentsUpdated,
    categoriesCreated: a.categoriesCreated + b.categoriesCreated,
    errors: [...a.errors, ...b.errors],
  };
}
