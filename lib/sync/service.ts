/**
 * Canvas Sync Service
 *
 * Entry point for callers: starts syncs in the background or blocking,
 * guards against duplicate runs, relays progress to the channel and the
 * persisted progress record, applies the outer timeout and records metrics.
 */

import { randomUUID } from 'crypto';

import { createCanvasClient } from '@/lib/canvas/client';
import type {
  CanvasClientOptions,
  CanvasIdentity,
  RemoteCourseClient,
} from '@/lib/canvas/types';
import { getSyncConfig, type SyncConfig } from '@/lib/config/env';
import { decryptAccessToken, encryptAccessToken } from '@/lib/crypto/encryption';
import { getDb } from '@/lib/db';
import type { CanvasAccount, SyncProgressRecord } from '@/lib/db/schema';
import { DrizzleGradebookStore } from '@/lib/gradebook/drizzle-store';
import type { GradebookStore } from '@/lib/gradebook/types';
import { ActiveSyncRegistry } from './active-sync-registry';
import { DrizzleCheckpointStore, type CheckpointStore } from './checkpoints';
import { SyncMetricsTracker, summarizeMetrics, type SyncMetricsSummary } from './metrics';
import { SyncOrchestrator } from './orchestrator';
import {
  ProgressChannel,
  idleSnapshot,
  type ProgressListener,
  type ProgressSnapshot,
  type SyncStatus,
} from './progress-channel';
import {
  CANCELLED_OPERATION,
  DrizzleSyncProgressStore,
  type SyncProgressStore,
} from './progress-store';
import { createTaskRunner, type TaskRunner } from './task-runner';
import {
  SYNC_SCOPES,
  SyncCancelledError,
  SyncConnectionError,
  SyncError,
  SyncInProgressError,
  SyncTimeoutError,
  errorMessage,
  requestTargetId,
  type SyncProgressUpdate,
  type SyncRequest,
  type SyncResult,
  type SyncScope,
} from './types';

export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_METRICS_WINDOW_DAYS = 7;

export type SyncOutcome =
  | { status: 'completed'; result: SyncResult }
  | { status: 'failed' | 'cancelled'; error: Error };

export interface SyncHandle {
  taskId: string;
  progressRecordId: string;
  /** Settles when the sync ends; never rejects */
  completion: Promise<SyncOutcome>;
}

export interface ConnectAccountInput {
  baseUrl: string;
  accessToken: string;
  timezone?: string;
}

export interface CanvasSyncServiceDeps {
  store: GradebookStore;
  progressStore: SyncProgressStore;
  checkpoints: CheckpointStore;
  config: SyncConfig;
  registry?: ActiveSyncRegistry;
  channel?: ProgressChannel;
  runner?: TaskRunner;
  createClient?: (options: CanvasClientOptions) => RemoteCourseClient;
  encryptToken?: (token: string) => string;
  decryptToken?: (stored: string) => string;
  generateTaskId?: () => string;
}

interface RunContext {
  ownerId: string;
  request: SyncRequest;
  taskId: string;
  recordId: string;
  controller: AbortController;
  account: CanvasAccount;
  accessToken: string;
}

function daysAgo(days: number): Date {
  return new Date(Date.now() - days * 24 * 60 * 60 * 1000);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function toSyncStatus(value: string): SyncStatus {
  switch (value) {
    case 'running':
    case 'completed':
    case 'failed':
    case 'cancelled':
      return value;
    default:
      return 'idle';
  }
}

function toScope(value: string): SyncScope | null {
  return SYNC_SCOPES.find((scope) => scope === value) ?? null;
}

/**
 * Snapshot rebuilt from a persisted progress record.
 */
export function snapshotFromRecord(record: SyncProgressRecord): ProgressSnapshot {
  return {
    ownerId: record.ownerId,
    taskId: record.taskId,
    scope: toScope(record.scope),
    status: toSyncStatus(record.status),
    isComplete: record.isComplete,
    progressPercent: record.progressPercent,
    completedItems: record.completedItems,
    totalItems: record.totalItems,
    currentOperation: record.currentOperation,
    currentItem: record.currentItem,
    elapsedTime: record.elapsedTime,
    errors: record.errors,
    result: record.result ?? null,
    checkpoint: null,
    updatedAt: record.updatedAt.toISOString(),
  };
}

export class CanvasSyncService {
  readonly registry: ActiveSyncRegistry;
  readonly channel: ProgressChannel;
  readonly runner: TaskRunner;
  private readonly store: GradebookStore;
  private readonly progressStore: SyncProgressStore;
  private readonly checkpoints: CheckpointStore;
  private readonly config: SyncConfig;
  private readonly createClient: (options: CanvasClientOptions) => RemoteCourseClient;
  private readonly encryptToken: (token: string) => string;
  private readonly decryptToken: (stored: string) => string;
  private readonly generateTaskId: () => string;

  constructor(deps: CanvasSyncServiceDeps) {
    this.store = deps.store;
    this.progressStore = deps.progressStore;
    this.checkpoints = deps.checkpoints;
    this.config = deps.config;
    this.registry = deps.registry ?? new ActiveSyncRegistry();
    this.channel = deps.channel ?? new ProgressChannel();
    this.runner = deps.runner ?? createTaskRunner(deps.config.runner, deps.config.queueConcurrency);
    this.createClient = deps.createClient ?? createCanvasClient;
    this.encryptToken = deps.encryptToken ?? ((token) => encryptAccessToken(token, deps.config.encryptionKey));
    this.decryptToken = deps.decryptToken ?? ((stored) => decryptAccessToken(stored, deps.config.encryptionKey));
    this.generateTaskId = deps.generateTaskId ?? randomUUID;
  }

  /**
   * Verify a Canvas token and store it encrypted for the owner.
   *
   * @throws SyncConnectionError when Canvas rejects the token
   */
  async connectAccount(ownerId: string, input: ConnectAccountInput): Promise<CanvasIdentity> {
    const client = this.createClient(this.clientOptions(input.baseUrl, input.accessToken));
    const connection = await client.testConnection();
    if (!connection.success) {
      throw new SyncConnectionError(`Canvas connection failed: ${connection.error}`);
    }

    await this.store.saveCanvasAccount({
      ownerId,
      baseUrl: input.baseUrl,
      accessTokenEncrypted: this.encryptToken(input.accessToken),
      timezone: input.timezone ?? null,
    });

    console.log(`[SyncService] Connected Canvas account for ${ownerId} as ${connection.identity.name}`);
    return connection.identity;
  }

  /**
   * Start a sync in the background.
   *
   * @throws SyncInProgressError when a sync of the same scope is running
   * @throws SyncConnectionError when the owner has no Canvas account
   * @throws CredentialError when the stored token cannot be decrypted
   */
  async startSync(ownerId: string, request: SyncRequest): Promise<SyncHandle> {
    const { scope } = request;
    if (this.registry.isActive(ownerId, scope)) {
      throw new SyncInProgressError(ownerId, scope);
    }
    await this.clearStaleRecords(ownerId, scope);

    const account = await this.store.getCanvasAccount(ownerId);
    if (!account) {
      throw new SyncConnectionError(`No Canvas account connected for ${ownerId}`);
    }
    const accessToken = this.decryptToken(account.accessTokenEncrypted);

    const taskId = this.generateTaskId();
    const controller = new AbortController();
    const acquired = this.registry.tryAcquire({
      ownerId,
      scope,
      taskId,
      controller,
      startedAt: new Date(),
    });
    if (!acquired) {
      throw new SyncInProgressError(ownerId, scope);
    }

    let record: SyncProgressRecord;
    try {
      record = await this.progressStore.createRecord({
        ownerId,
        taskId,
        scope,
        targetId: requestTargetId(request),
        currentOperation: 'Queued',
        status: 'running',
      });
    } catch (error) {
      this.registry.release(ownerId, scope, taskId);
      throw error;
    }

    this.channel.publish(ownerId, {
      taskId,
      scope,
      status: 'running',
      isComplete: false,
      progressPercent: 0,
      completedItems: 0,
      totalItems: 0,
      currentOperation: 'Queued',
      currentItem: '',
      elapsedTime: 0,
      errors: [],
      result: null,
    });

    const context: RunContext = {
      ownerId,
      request,
      taskId,
      recordId: record.id,
      controller,
      account,
      accessToken,
    };

    const completion = this.runner
      .submit(taskId, () => this.execute(context))
      .catch((error: unknown): SyncOutcome => {
        this.registry.release(ownerId, scope, taskId);
        return { status: 'failed', error: toError(error) };
      });

    console.log(`[SyncService] Started ${scope} sync ${taskId} for ${ownerId} (${this.runner.name} runner)`);
    return { taskId, progressRecordId: record.id, completion };
  }

  /**
   * Run a sync and wait for it.
   *
   * @throws the attempt-level error when the sync fails or is cancelled
   */
  async runSync(ownerId: string, request: SyncRequest): Promise<SyncResult> {
    const handle = await this.startSync(ownerId, request);
    const outcome = await handle.completion;
    if (outcome.status === 'completed') {
      return outcome.result;
    }
    throw outcome.error;
  }

  /**
   * Cancel every sync of the owner.
   *
   * @returns true when a running sync or an incomplete record was found
   */
  async cancelSync(ownerId: string): Promise<boolean> {
    const aborted = this.registry.abortOwner(ownerId, new SyncCancelledError());
    const marked = await this.progressStore.markIncompleteCancelled(ownerId);
    await this.checkpoints.deleteAll(ownerId);
    this.channel.clear(ownerId);

    console.log(`[SyncService] Cancelled ${aborted} running sync(s) for ${ownerId}, ${marked} record(s) closed`);
    return aborted > 0 || marked > 0;
  }

  async getProgress(ownerId: string): Promise<ProgressSnapshot> {
    const live = this.channel.latest(ownerId);
    if (live) {
      return live;
    }

    const record = await this.progressStore.latestRecord(ownerId);
    return record ? snapshotFromRecord(record) : idleSnapshot(ownerId);
  }

  subscribe(ownerId: string, listener: ProgressListener): () => void {
    return this.channel.subscribe(ownerId, listener);
  }

  /**
   * Success rate, duration and API usage of the owner's sync attempts over
   * the last `days`.
   */
  async getMetricsSummary(
    ownerId: string,
    days: number = DEFAULT_METRICS_WINDOW_DAYS
  ): Promise<SyncMetricsSummary> {
    const totals = await this.progressStore.metricsTotals(daysAgo(days), ownerId);
    return summarizeMetrics(totals, ownerId, days);
  }

  /** Same as getMetricsSummary across every owner. */
  async getAllMetricsSummary(days: number = DEFAULT_METRICS_WINDOW_DAYS): Promise<SyncMetricsSummary> {
    const totals = await this.progressStore.metricsTotals(daysAgo(days));
    return summarizeMetrics(totals, null, days);
  }

  /**
   * Delete completed progress records older than `days` and expired
   * checkpoints.
   */
  async cleanupOldSyncData(
    days: number = DEFAULT_RETENTION_DAYS
  ): Promise<{ deletedRecords: number; deletedCheckpoints: number; cutoff: Date }> {
    const cutoff = daysAgo(days);
    const deletedRecords = await this.progressStore.deleteCompletedBefore(cutoff);
    const deletedCheckpoints = await this.checkpoints.purgeExpired();

    console.log(
      `[SyncService] Cleanup removed ${deletedRecords} progress records and ${deletedCheckpoints} checkpoints older than ${cutoff.toISOString()}`
    );
    return { deletedRecords, deletedCheckpoints, cutoff };
  }

  /**
   * Incomplete records not touched within the timeout belong to a sync that
   * died with its process; newer ones mean a sync is running elsewhere.
   */
  private async clearStaleRecords(ownerId: string, scope: SyncScope): Promise<void> {
    const incomplete = await this.progressStore.findIncomplete(ownerId, scope);
    if (incomplete.length === 0) {
      return;
    }

    const staleBefore = Date.now() - this.config.timeoutMs;
    if (incomplete.some((record) => record.updatedAt.getTime() > staleBefore)) {
      throw new SyncInProgressError(ownerId, scope);
    }

    const removed = await this.progressStore.deleteRecords(incomplete.map((record) => record.id));
    console.warn(`[SyncService] Removed ${removed} stale ${scope} progress record(s) for ${ownerId}`);
  }

  private clientOptions(baseUrl: string, accessToken: string): CanvasClientOptions {
    return {
      baseUrl,
      accessToken,
      maxAttempts: this.config.canvas.maxAttempts,
      pageConcurrency: this.config.canvas.pageConcurrency,
      retryBaseMs: this.config.canvas.retryBaseMs,
    };
  }

  private async execute(context: RunContext): Promise<SyncOutcome> {
    const { ownerId, request, taskId, recordId, controller } = context;
    const startedAt = new Date();
    const tracker = new SyncMetricsTracker();

    const timeout = setTimeout(() => {
      controller.abort(new SyncTimeoutError(this.config.timeoutMs));
    }, this.config.timeoutMs);

    let outcome: SyncOutcome;
    try {
      await this.safely('mark account running', () =>
        this.store.updateCanvasAccount(ownerId, { syncStatus: 'running' })
      );

      const client = this.createClient({
        ...this.clientOptions(context.account.baseUrl, context.accessToken),
        onRequest: tracker.onRequest,
      });

      const orchestrator = new SyncOrchestrator({
        client,
        store: this.store,
        checkpoints: this.checkpoints,
        timezone: context.account.timezone ?? this.config.timezone,
        chunkSize: this.config.chunkSize,
        chunkDelayMs: this.config.chunkDelayMs,
        checkpointTtlMs: this.config.checkpointTtlMs,
        signal: controller.signal,
        onProgress: (update) => this.relayProgress(context, update),
        onCheckpoint: (checkpoint) => this.channel.publishCheckpoint(ownerId, checkpoint),
      });

      const result = await orchestrator.run(ownerId, request);
      outcome = { status: 'completed', result };
    } catch (error) {
      outcome = {
        status: error instanceof SyncCancelledError ? 'cancelled' : 'failed',
        error: toError(error),
      };
    } finally {
      clearTimeout(timeout);
      this.registry.release(ownerId, request.scope, taskId);
    }

    await this.finish(context, outcome);
    await this.safely('save metrics', () =>
      this.progressStore.saveMetrics(
        tracker.toRecord({
          ownerId,
          taskId,
          scope: request.scope,
          status: outcome.status,
          result: outcome.status === 'completed' ? outcome.result : undefined,
          errorMessage: outcome.status === 'completed' ? undefined : outcome.error.message,
          startedAt,
          finishedAt: new Date(),
        })
      )
    );

    console.log(`[SyncService] Sync ${taskId} for ${ownerId} ${outcome.status} (record ${recordId})`);
    return outcome;
  }

  private async relayProgress(context: RunContext, update: SyncProgressUpdate): Promise<void> {
    // Terminal updates are written by finish()
    if (update.state === 'completed' || update.state === 'failed') {
      return;
    }

    const progress = {
      progressPercent: update.progressPercent,
      completedItems: update.completedItems,
      totalItems: update.totalItems,
      currentOperation: update.currentOperation,
      currentItem: update.currentItem,
      elapsedTime: update.elapsedTime,
      errors: update.errors,
    };

    this.channel.publish(context.ownerId, {
      ...progress,
      taskId: context.taskId,
      scope: context.request.scope,
      status: 'running',
      isComplete: false,
      result: null,
    });
    await this.progressStore.updateRecord(context.recordId, progress);
  }

  private async finish(context: RunContext, outcome: SyncOutcome): Promise<void> {
    const { ownerId, taskId, recordId, request } = context;
    const previous = this.channel.latest(ownerId);
    const base = {
      taskId,
      scope: request.scope,
      isComplete: true,
      currentItem: '',
      elapsedTime: previous?.taskId === taskId ? previous.elapsedTime : 0,
    };

    if (outcome.status === 'completed') {
      const { result } = outcome;
      await this.safely('complete progress record', () =>
        this.progressStore.updateRecord(recordId, {
          isComplete: true,
          status: 'completed',
          progressPercent: 100,
          currentOperation: 'Sync complete',
          currentItem: '',
          errors: result.errors,
          result,
        })
      );
      await this.safely('mark account completed', () =>
        this.store.updateCanvasAccount(ownerId, { syncStatus: 'completed' })
      );
      this.channel.publish(ownerId, {
        ...base,
        status: 'completed',
        progressPercent: 100,
        completedItems: result.coursesProcessed,
        totalItems: result.coursesProcessed,
        currentOperation: 'Sync complete',
        errors: result.errors,
        result,
      });
      return;
    }

    const cancelled = outcome.status === 'cancelled';
    const operation = cancelled ? CANCELLED_OPERATION : `Sync failed: ${outcome.error.message}`;
    const errors = cancelled ? [] : [outcome.error.message];
    const code = outcome.error instanceof SyncError ? outcome.error.code : undefined;
    console.error(`[SyncService] Sync ${taskId} ${outcome.status}${code ? ` (${code})` : ''}: ${outcome.error.message}`);

    await this.safely('close progress record', () =>
      this.progressStore.updateRecord(recordId, {
        isComplete: true,
        status: outcome.status,
        currentOperation: operation,
        errors,
      })
    );
    await this.safely('mark account status', () =>
      this.store.updateCanvasAccount(ownerId, { syncStatus: cancelled ? 'idle' : 'failed' })
    );

    if (cancelled) {
      this.channel.clear(ownerId);
      return;
    }
    this.channel.publish(ownerId, {
      ...base,
      status: 'failed',
      progressPercent: previous?.taskId === taskId ? previous.progressPercent : 0,
      completedItems: previous?.taskId === taskId ? previous.completedItems : 0,
      totalItems: previous?.taskId === taskId ? previous.totalItems : 0,
      currentOperation: operation,
      errors,
      result: null,
    });
  }

  private async safely(label: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.error(`[SyncService] Failed to ${label}:`, errorMessage(error));
    }
  }
}

/**
 * Build the service on the PostgreSQL stores and environment config.
 */
export function createCanvasSyncService(config: SyncConfig = getSyncConfig()): CanvasSyncService {
  const db = getDb();
  return new CanvasSyncService({
    store: new DrizzleGradebookStore(db),
    progressStore: new DrizzleSyncProgressStore(db),
    checkpoints: new DrizzleCheckpointStore(db),
    config,
  });
}
