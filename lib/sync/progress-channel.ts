/**
 * In-memory channel carrying the latest sync progress per owner.
 *
 * Pollers read `latest`; push transports (SSE, websockets) use `subscribe`.
 */

import type { SyncCheckpoint, SyncProgressUpdate, SyncResult, SyncScope } from './types';

export type SyncStatus = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface ProgressSnapshot extends Omit<SyncProgressUpdate, 'state'> {
  ownerId: string;
  taskId: string | null;
  scope: SyncScope | null;
  status: SyncStatus;
  isComplete: boolean;
  result: SyncResult | null;
  checkpoint: SyncCheckpoint | null;
  /** ISO timestamp */
  updatedAt: string;
}

export type ProgressEvent = Omit<ProgressSnapshot, 'ownerId' | 'checkpoint' | 'updatedAt'>;

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

export const PROGRESS_RETENTION_MS = 60 * 60 * 1000;

/**
 * Snapshot reported when nothing is known about the owner.
 */
export function idleSnapshot(ownerId: string, now: Date = new Date()): ProgressSnapshot {
  return {
    ownerId,
    taskId: null,
    scope: null,
    status: 'idle',
    isComplete: true,
    progressPercent: 0,
    completedItems: 0,
    totalItems: 0,
    currentOperation: 'No sync running',
    currentItem: '',
    elapsedTime: 0,
    errors: [],
    result: null,
    checkpoint: null,
    updatedAt: now.toISOString(),
  };
}

interface ChannelEntry {
  snapshot: ProgressSnapshot;
  storedAt: number;
}

export class ProgressChannel {
  private readonly entries = new Map<string, ChannelEntry>();
  private readonly listeners = new Map<string, Set<ProgressListener>>();

  constructor(
    private readonly retentionMs: number = PROGRESS_RETENTION_MS,
    private readonly now: () => number = Date.now
  ) {}

  publish(ownerId: string, event: ProgressEvent): ProgressSnapshot {
    const previous = this.latest(ownerId);
    const snapshot: ProgressSnapshot = {
      ...event,
      ownerId,
      // A new task starts without the previous task's checkpoint
      checkpoint: previous?.taskId === event.taskId ? previous.checkpoint : null,
      updatedAt: new Date(this.now()).toISOString(),
    };

    this.store(ownerId, snapshot);
    return snapshot;
  }

  /**
   * Attach a checkpoint to the owner's current snapshot.
   */
  publishCheckpoint(ownerId: string, checkpoint: SyncCheckpoint): void {
    const current = this.latest(ownerId) ?? idleSnapshot(ownerId, new Date(this.now()));
    this.store(ownerId, {
      ...current,
      checkpoint,
      updatedAt: new Date(this.now()).toISOString(),
    });
  }

  /**
   * @returns The newest snapshot, or null when none was published in the
   * retention window
   */
  latest(ownerId: string): ProgressSnapshot | null {
    const entry = this.entries.get(ownerId);
    if (!entry) return null;

    if (this.now() - entry.storedAt > this.retentionMs) {
      this.entries.delete(ownerId);
      return null;
    }
    return entry.snapshot;
  }

  /**
   * @returns A function that removes the listener
   */
  subscribe(ownerId: string, listener: ProgressListener): () => void {
    let listeners = this.listeners.get(ownerId);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(ownerId, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.listeners.get(ownerId);
      current?.delete(listener);
      if (current?.size === 0) {
        this.listeners.delete(ownerId);
      }
    };
  }

  clear(ownerId: string): void {
    this.entries.delete(ownerId);
  }

  private store(ownerId: string, snapshot: ProgressSnapshot): void {
    this.entries.set(ownerId, { snapshot, storedAt: this.now() });

    for (const listener of this.listeners.get(ownerId) ?? []) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error('[SyncService] Progress listener failed:', error);
      }
    }
  }
}
