/**
 * Per-attempt Canvas API metrics, fed by the client's onRequest hook.
 */

import type { RequestLog } from '@/lib/canvas/types';
import type { NewSyncMetricsRecord } from '@/lib/db/schema';
import type { SyncResult, SyncScope } from './types';

export interface ApiMetrics {
  apiCalls: number;
  apiCallsFailed: number;
  rateLimitHits: number;
  apiDurationMs: number;
}

export interface MetricsContext {
  ownerId: string;
  taskId: string;
  scope: SyncScope;
  status: string;
  result?: SyncResult;
  errorMessage?: string;
  startedAt: Date;
  finishedAt: Date;
}

/** Raw totals over a window of sync_metrics rows. */
export interface MetricsTotals {
  totalSyncs: number;
  successfulSyncs: number;
  failedSyncs: number;
  totalDurationSeconds: number;
  coursesProcessed: number;
  assignmentsProcessed: number;
  apiCalls: number;
  apiCallsFailed: number;
  rateLimitHits: number;
  /** Error of the most recent failed attempt in the window */
  recentError: string | null;
}

export interface SyncMetricsSummary extends MetricsTotals {
  ownerId: string | null;
  periodDays: number;
  /** Percentage of attempts that completed, 0 when there were none */
  successRate: number;
  averageDurationSeconds: number;
}

export function summarizeMetrics(
  totals: MetricsTotals,
  ownerId: string | null,
  periodDays: number
): SyncMetricsSummary {
  const { totalSyncs } = totals;
  return {
    ...totals,
    ownerId,
    periodDays,
    successRate: totalSyncs > 0 ? (totals.successfulSyncs / totalSyncs) * 100 : 0,
    averageDurationSeconds: totalSyncs > 0 ? totals.totalDurationSeconds / totalSyncs : 0,
  };
}

export class SyncMetricsTracker {
  private readonly metrics: ApiMetrics = {
    apiCalls: 0,
    apiCallsFailed: 0,
    rateLimitHits: 0,
    apiDurationMs: 0,
  };

  /** Pass as CanvasClientOptions.onRequest. */
  readonly onRequest = (log: RequestLog): void => {
    this.metrics.apiCalls++;
    this.metrics.apiDurationMs += log.durationMs;

    if (log.status === null || log.status >= 400) {
      this.metrics.apiCallsFailed++;
    }
    if (log.status === 429) {
      this.metrics.rateLimitHits++;
    }
  };

  snapshot(): ApiMetrics {
    return { ...this.metrics };
  }

  toRecord(context: MetricsContext): NewSyncMetricsRecord {
    const durationSeconds =
      (context.finishedAt.getTime() - context.startedAt.getTime()) / 1000;

    return {
      ownerId: context.ownerId,
      taskId: context.taskId,
      scope: context.scope,
      status: context.status,
      ...this.snapshot(),
      coursesProcessed: context.result?.coursesProcessed ?? 0,
      assignmentsProcessed: context.result?.assignmentsProcessed ?? 0,
      categoriesCreated: context.result?.categoriesCreated ?? 0,
      errorMessage: context.errorMessage ?? null,
      startedAt: context.startedAt,
      finishedAt: context.finishedAt,
      durationSeconds,
    };
  }
}
