/**
 * Types and errors for the Canvas sync engine.
 */

export type SyncScope = 'all' | 'term' | 'course';

export type Season = 'Spring' | 'Summer' | 'Fall' | 'Winter';

export const SYNC_SCOPES: readonly SyncScope[] = ['all', 'term', 'course'];

/**
 * Lifecycle of one sync attempt.
 */
export type SyncState =
  | 'init'
  | 'connecting'
  | 'fetching'
  | 'reconciling'
  | 'finalizing'
  | 'completed'
  | 'failed';

/**
 * Counters reported by every sync scope.
 */
export interface SyncCounts {
  coursesProcessed: number;
  coursesCreated: number;
  coursesUpdated: number;
  assignmentsProcessed: number;
  assignmentsCreated: number;
  assignmentsUpdated: number;
  categoriesCreated: number;
}

export interface SyncResult extends SyncCounts {
  /** Soft failures; present even when the sync succeeds */
  errors: string[];
}

export function emptySyncResult(): SyncResult {
  return {
    coursesProcessed: 0,
    coursesCreated: 0,
    coursesUpdated: 0,
    assignmentsProcessed: 0,
    assignmentsCreated: 0,
    assignmentsUpdated: 0,
    categoriesCreated: 0,
    errors: [],
  };
}

/**
 * Resume state for one (owner, scope), saved after every committed chunk.
 */
export interface SyncCheckpoint {
  scope: SyncScope;
  targetId: string | null;
  progressPercent: number;
  /** Remote course ids whose writes are committed */
  processedRemoteIds: string[];
  /** Remote course ids that failed and were already reported */
  failedRemoteIds: string[];
  counts: SyncCounts;
  errors: string[];
  /** ISO timestamp */
  lastUpdated: string;
}

/**
 * Payload handed to the progress callback.
 */
export interface SyncProgressUpdate {
  state: SyncState;
  progressPercent: number;
  completedItems: number;
  totalItems: number;
  currentOperation: string;
  currentItem: string;
  /** Seconds since the attempt started */
  elapsedTime: number;
  errors: string[];
}

export type ProgressCallback = (update: SyncProgressUpdate) => void | Promise<void>;

export type SyncRequest =
  | { scope: 'all'; incremental?: boolean }
  | { scope: 'term'; termId: string; forceFull?: boolean }
  | { scope: 'course'; courseId: string };

export function requestTargetId(request: SyncRequest): string | null {
  switch (request.scope) {
    case 'all':
      return null;
    case 'term':
      return request.termId;
    case 'course':
      return request.courseId;
  }
}

/**
 * Base class for sync failures.
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/** Invalid credentials or unreachable Canvas host. */
export class SyncConnectionError extends SyncError {
  constructor(message: string) {
    super(message, 'CONNECTION_FAILED');
    this.name = 'SyncConnectionError';
  }
}

/** The initial course list could not be fetched. */
export class SyncFetchError extends SyncError {
  constructor(message: string) {
    super(message, 'FETCH_FAILED');
    this.name = 'SyncFetchError';
  }
}

/** The local term or course named by the request does not exist. */
export class SyncTargetError extends SyncError {
  constructor(message: string) {
    super(message, 'TARGET_NOT_FOUND');
    this.name = 'SyncTargetError';
  }
}

/** One remote entity could not be mapped to a local row. */
export class ReconciliationError extends SyncError {
  constructor(message: string) {
    super(message, 'RECONCILIATION_FAILED');
    this.name = 'ReconciliationError';
  }
}

export class CheckpointError extends SyncError {
  constructor(message: string) {
    super(message, 'CHECKPOINT_FAILED');
    this.name = 'CheckpointError';
  }
}

export class SyncInProgressError extends SyncError {
  constructor(ownerId: string, scope: SyncScope) {
    super(`A ${scope} sync is already in progress for ${ownerId}`, 'SYNC_IN_PROGRESS');
    this.name = 'SyncInProgressError';
  }
}

export class SyncCancelledError extends SyncError {
  constructor(message = 'Sync cancelled by user') {
    super(message, 'SYNC_CANCELLED');
    this.name = 'SyncCancelledError';
  }
}

export class SyncTimeoutError extends SyncError {
  constructor(timeoutMs: number) {
    super(`Sync timed out after ${Math.round(timeoutMs / 1000)}s`, 'SYNC_TIMEOUT');
    this.name = 'SyncTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
