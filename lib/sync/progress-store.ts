/**
 * Persistence for sync progress records and per-attempt metrics.
 */

import { and, count, desc, eq, gte, lt, sql } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';

import type { DbExecutor } from '@/lib/db';
import {
  syncMetrics,
  syncProgress,
  type NewSyncMetricsRecord,
  type NewSyncProgressRecord,
  type SyncProgressRecord,
} from '@/lib/db/schema';
import type { MetricsTotals } from './metrics';
import type { SyncScope } from './types';

export const CANCELLED_OPERATION = 'Sync cancelled by user';

export type ProgressPatch = Partial<
  Pick<
    SyncProgressRecord,
    | 'progressPercent'
    | 'completedItems'
    | 'totalItems'
    | 'currentOperation'
    | 'currentItem'
    | 'elapsedTime'
    | 'errors'
    | 'isComplete'
    | 'status'
    | 'result'
  >
>;

export interface SyncProgressStore {
  createRecord(record: NewSyncProgressRecord): Promise<SyncProgressRecord>;
  updateRecord(id: string, patch: ProgressPatch): Promise<void>;
  findIncomplete(ownerId: string, scope?: SyncScope): Promise<SyncProgressRecord[]>;
  latestRecord(ownerId: string): Promise<SyncProgressRecord | null>;
  /** @returns Number of records removed */
  deleteRecords(ids: string[]): Promise<number>;
  /**
   * Mark every incomplete record of the owner as cancelled.
   *
   * @returns Number of records updated
   */
  markIncompleteCancelled(ownerId: string): Promise<number>;
  /** @returns Number of completed records created before `cutoff` removed */
  deleteCompletedBefore(cutoff: Date): Promise<number>;
  saveMetrics(metrics: NewSyncMetricsRecord): Promise<void>;
  /** Totals of attempts started at or after `since`, for one owner or all */
  metricsTotals(since: Date, ownerId?: string): Promise<MetricsTotals>;
}

const sumOf = (column: AnyPgColumn) => sql<number>`coalesce(sum(${column}), 0)`.mapWith(Number);

export class DrizzleSyncProgressStore implements SyncProgressStore {
  constructor(private readonly db: DbExecutor) {}

  async createRecord(record: NewSyncProgressRecord): Promise<SyncProgressRecord> {
    const [created] = await this.db.insert(syncProgress).values(record).returning();
    return created;
  }

  async updateRecord(id: string, patch: ProgressPatch): Promise<void> {
    await this.db
      .update(syncProgress)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(syncProgress.id, id));
  }

  async findIncomplete(ownerId: string, scope?: SyncScope): Promise<SyncProgressRecord[]> {
    return this.db
      .select()
      .from(syncProgress)
      .where(
        and(
          eq(syncProgress.ownerId, ownerId),
          eq(syncProgress.isComplete, false),
          scope ? eq(syncProgress.scope, scope) : undefined
        )
      );
  }

  async latestRecord(ownerId: string): Promise<SyncProgressRecord | null> {
    const [record] = await this.db
      .select()
      .from(syncProgress)
      .where(eq(syncProgress.ownerId, ownerId))
      .orderBy(desc(syncProgress.createdAt))
      .limit(1);
    return record ?? null;
  }

  async deleteRecords(ids: string[]): Promise<number> {
    let removed = 0;
    for (const id of ids) {
      const deleted = await this.db
        .delete(syncProgress)
        .where(eq(syncProgress.id, id))
        .returning({ id: syncProgress.id });
      removed += deleted.length;
    }
    return removed;
  }

  async markIncompleteCancelled(ownerId: string): Promise<number> {
    const updated = await this.db
      .update(syncProgress)
      .set({
        isComplete: true,
        status: 'cancelled',
        currentOperation: CANCELLED_OPERATION,
        updatedAt: new Date(),
      })
      .where(and(eq(syncProgress.ownerId, ownerId), eq(syncProgress.isComplete, false)))
      .returning({ id: syncProgress.id });
    return updated.length;
  }

  async deleteCompletedBefore(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(syncProgress)
      .where(and(eq(syncProgress.isComplete, true), lt(syncProgress.createdAt, cutoff)))
      .returning({ id: syncProgress.id });
    return deleted.length;
  }

  async saveMetrics(metrics: NewSyncMetricsRecord): Promise<void> {
    await this.db.insert(syncMetrics).values(metrics);
  }

  async metricsTotals(since: Date, ownerId?: string): Promise<MetricsTotals> {
    const window = and(
      gte(syncMetrics.startedAt, since),
      ownerId ? eq(syncMetrics.ownerId, ownerId) : undefined
    );

    const [totals] = await this.db
      .select({
        totalSyncs: count(),
        successfulSyncs: sql<number>`count(*) filter (where ${syncMetrics.status} = 'completed')`.mapWith(Number),
        failedSyncs: sql<number>`count(*) filter (where ${syncMetrics.status} = 'failed')`.mapWith(Number),
        totalDurationSeconds: sumOf(syncMetrics.durationSeconds),
        coursesProcessed: sumOf(syncMetrics.coursesProcessed),
        assignmentsProcessed: sumOf(syncMetrics.assignmentsProcessed),
        apiCalls: sumOf(syncMetrics.apiCalls),
        apiCallsFailed: sumOf(syncMetrics.apiCallsFailed),
        rateLimitHits: sumOf(syncMetrics.rateLimitHits),
      })
      .from(syncMetrics)
      .where(window);

    const [recent] = await this.db
      .select({ errorMessage: syncMetrics.errorMessage })
      .from(syncMetrics)
      .where(and(window, eq(syncMetrics.status, 'failed')))
      .orderBy(desc(syncMetrics.startedAt))
      .limit(1);

    return { ...totals, recentError: recent?.errorMessage ?? null };
  }
}
