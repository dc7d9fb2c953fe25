export {
  CanvasSyncService,
  createCanvasSyncService,
  snapshotFromRecord,
  DEFAULT_RETENTION_DAYS,
  DEFAULT_METRICS_WINDOW_DAYS,
} from './service';
export type {
  CanvasSyncServiceDeps,
  ConnectAccountInput,
  SyncHandle,
  SyncOutcome,
} from './service';
export { SyncOrchestrator, mergeResults, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_DELAY_MS } from './orchestrator';
export type { SyncOrchestratorOptions } from './orchestrator';
export {
  reconcileCourse,
  reconcileCategories,
  reconcileAssignment,
  reconcileAssignments,
  reconcileCourseContent,
  planAssignment,
  fetchCourseBundle,
  DEFAULT_COURSE_CREDITS,
} from './reconciler';
export type { CourseBundle, AssignmentContext, AssignmentBatchResult } from './reconciler';
export { parseTermLabel, resolveOrCreateTerm, TermResolver, IMPORTED_SCHOOL_NAME } from './term-resolver';
export type { ParsedTerm } from './term-resolver';
export { deriveSubmissionState, SUBMITTED_WORKFLOW_STATES } from './submission-state';
export type { SubmissionState } from './submission-state';
export { convertDueDate } from './due-date';
export {
  MemoryCheckpointStore,
  DrizzleCheckpointStore,
  parseCheckpoint,
  DEFAULT_CHECKPOINT_TTL_MS,
} from './checkpoints';
export type { CheckpointStore } from './checkpoints';
export { ActiveSyncRegistry } from './active-sync-registry';
export type { ActiveSync } from './active-sync-registry';
export { ProgressChannel, idleSnapshot, PROGRESS_RETENTION_MS } from './progress-channel';
export type { ProgressSnapshot, ProgressEvent, ProgressListener, SyncStatus } from './progress-channel';
export { DrizzleSyncProgressStore, CANCELLED_OPERATION } from './progress-store';
export type { SyncProgressStore, ProgressPatch } from './progress-store';
export { SyncMetricsTracker, summarizeMetrics } from './metrics';
export type { ApiMetrics, MetricsTotals, SyncMetricsSummary } from './metrics';
export { InlineTaskRunner, QueuedTaskRunner, createTaskRunner } from './task-runner';
export type { TaskRunner, SyncJob } from './task-runner';
export {
  SyncError,
  SyncConnectionError,
  SyncFetchError,
  SyncTargetError,
  ReconciliationError,
  CheckpointError,
  SyncInProgressError,
  SyncCancelledError,
  SyncTimeoutError,
  emptySyncResult,
  requestTargetId,
  SYNC_SCOPES,
} from './types';
export type {
  Season,
  SyncScope,
  SyncState,
  SyncCounts,
  SyncResult,
  SyncCheckpoint,
  SyncProgressUpdate,
  ProgressCallback,
  SyncRequest,
} from './types';
