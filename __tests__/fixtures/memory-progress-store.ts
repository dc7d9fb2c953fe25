import { randomUUID } from 'crypto';

import type {
  NewSyncMetricsRecord,
  NewSyncProgressRecord,
  SyncProgressRecord,
} from '@/lib/db/schema';
import {
  CANCELLED_OPERATION,
  type ProgressPatch,
  type SyncProgressStore,
} from '@/lib/sync/progress-store';
import type { MetricsTotals } from '@/lib/sync/metrics';
import type { SyncScope } from '@/lib/sync/types';

export class MemorySyncProgressStore implements SyncProgressStore {
  records: SyncProgressRecord[] = [];
  metrics: NewSyncMetricsRecord[] = [];
  /** Progress updates received, in order */
  updates: ProgressPatch[] = [];

  async createRecord(record: NewSyncProgressRecord): Promise<SyncProgressRecord> {
    const now = new Date();
    const created: SyncProgressRecord = {
      id: record.id ?? randomUUID(),
      ownerId: record.ownerId,
      taskId: record.taskId,
      scope: record.scope,
      targetId: record.targetId ?? null,
      progressPercent: record.progressPercent ?? 0,
      completedItems: record.completedItems ?? 0,
      totalItems: record.totalItems ?? 0,
      currentOperation: record.currentOperation ?? '',
      currentItem: record.currentItem ?? '',
      elapsedTime: record.elapsedTime ?? 0,
      errors: record.errors ?? [],
      isComplete: record.isComplete ?? false,
      status: record.status ?? 'running',
      result: record.result ?? null,
      createdAt: record.createdAt ?? now,
      updatedAt: record.updatedAt ?? now,
    };
    this.records.push(created);
    return created;
  }

  async updateRecord(id: string, patch: ProgressPatch): Promise<void> {
    this.updates.push(patch);
    const record = this.records.find((candidate) => candidate.id === id);
    if (record) {
      Object.assign(record, patch, { updatedAt: new Date() });
    }
  }

  async findIncomplete(ownerId: string, scope?: SyncScope): Promise<SyncProgressRecord[]> {
    return this.records.filter(
      (record) =>
        record.ownerId === ownerId && !record.isComplete && (!scope || record.scope === scope)
    );
  }

  async latestRecord(ownerId: string): Promise<SyncProgressRecord | null> {
    const owned = this.records.filter((record) => record.ownerId === ownerId);
    return owned.length > 0 ? owned[owned.length - 1] : null;
  }

  async deleteRecords(ids: string[]): Promise<number> {
    const before = this.records.length;
    this.records = this.records.filter((record) => !ids.includes(record.id));
    return before - this.records.length;
  }

  async markIncompleteCancelled(ownerId: string): Promise<number> {
    let marked = 0;
    for (const record of this.records) {
      if (record.ownerId === ownerId && !record.isComplete) {
        Object.assign(record, {
          isComplete: true,
          status: 'cancelled',
          currentOperation: CANCELLED_OPERATION,
        });
        marked++;
      }
    }
    return marked;
  }

  async deleteCompletedBefore(cutoff: Date): Promise<number> {
    const before = this.records.length;
    this.records = this.records.filter(
      (record) => !(record.isComplete && record.createdAt < cutoff)
    );
    return before - this.records.length;
  }

  async saveMetrics(metrics: NewSyncMetricsRecord): Promise<void> {
    this.metrics.push(metrics);
  }

  async metricsTotals(since: Date, ownerId?: string): Promise<MetricsTotals> {
    const rows = this.metrics
      .filter((row) => row.startedAt >= since && (!ownerId || row.ownerId === ownerId))
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());
    const sum = (pick: (row: NewSyncMetricsRecord) => number | undefined) =>
      rows.reduce((total, row) => total + (pick(row) ?? 0), 0);
    const failed = rows.filter((row) => row.status === 'failed');

    return {
      totalSyncs: rows.length,
      successfulSyncs: rows.filter((row) => row.status === 'completed').length,
      failedSyncs: failed.length,
      totalDurationSeconds: sum((row) => row.durationSeconds),
      coursesProcessed: sum((row) => row.coursesProcessed),
      assignmentsProcessed: sum((row) => row.assignmentsProcessed),
      apiCalls: sum((row) => row.apiCalls),
      apiCallsFailed: sum((row) => row.apiCallsFailed),
      rateLimitHits: sum((row) => row.rateLimitHits),
      recentError: failed[0]?.errorMessage ?? null,
    };
  }
}
