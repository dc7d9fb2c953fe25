/**
 * Runs sync jobs either on the caller's event loop or through a bounded
 * in-process queue.
 */

import pLimit, { type LimitFunction } from 'p-limit';

export type SyncJob<T> = () => Promise<T>;

export interface TaskRunner {
  readonly name: string;
  submit<T>(taskId: string, job: SyncJob<T>): Promise<T>;
}

/**
 * Starts every job immediately.
 */
export class InlineTaskRunner implements TaskRunner {
  readonly name = 'inline';

  submit<T>(taskId: string, job: SyncJob<T>): Promise<T> {
    console.log(`[TaskRunner] Running task ${taskId} inline`);
    return job();
  }
}

/**
 * FIFO queue running at most `concurrency` jobs at once.
 */
export class QueuedTaskRunner implements TaskRunner {
  readonly name = 'queued';
  private readonly limit: LimitFunction;

  constructor(concurrency: number) {
    this.limit = pLimit(concurrency);
  }

  submit<T>(taskId: string, job: SyncJob<T>): Promise<T> {
    console.log(
      `[TaskRunner] Queued task ${taskId} (${this.limit.activeCount} active, ${this.limit.pendingCount} pending)`
    );
    return this.limit(job);
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}

export function createTaskRunner(
  kind: 'inline' | 'queued',
  concurrency: number
): TaskRunner {
  return kind === 'queued' ? new QueuedTaskRunner(concurrency) : new InlineTaskRunner();
}
