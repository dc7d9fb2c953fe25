/**
 * Checkpoint storage for resumable syncs, keyed by (ownerId, scope).
 */

import { and, eq, gt, lte } from 'drizzle-orm';
import { z } from 'zod';

import type { DbExecutor } from '@/lib/db';
import { syncCheckpoints } from '@/lib/db/schema';
import { CheckpointError, SYNC_SCOPES, type SyncCheckpoint, type SyncScope } from './types';

export const DEFAULT_CHECKPOINT_TTL_MS = 24 * 60 * 60 * 1000;

const countSchema = z.number().int().min(0);

export const SyncCheckpointSchema = z.object({
  scope: z.enum(['all', 'term', 'course']),
  targetId: z.string().nullable(),
  progressPercent: z.number().min(0).max(100),
  processedRemoteIds: z.array(z.string()),
  failedRemoteIds: z.array(z.string()),
  counts: z.object({
    coursesProcessed: countSchema,
    coursesCreated: countSchema,
    coursesUpdated: countSchema,
    assignmentsProcessed: countSchema,
    assignmentsCreated: countSchema,
    assignmentsUpdated: countSchema,
    categoriesCreated: countSchema,
  }),
  errors: z.array(z.string()),
  lastUpdated: z.string(),
});

/**
 * Validate a stored checkpoint.
 *
 * @throws CheckpointError when the stored value is not a checkpoint
 */
export function parseCheckpoint(value: unknown): SyncCheckpoint {
  const parsed = SyncCheckpointSchema.safeParse(value);
  if (!parsed.success) {
    throw new CheckpointError(
      `Stored checkpoint is invalid: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }
  return parsed.data;
}

export interface CheckpointStore {
  get(ownerId: string, scope: SyncScope): Promise<SyncCheckpoint | null>;
  set(ownerId: string, scope: SyncScope, checkpoint: SyncCheckpoint, ttlMs: number): Promise<void>;
  delete(ownerId: string, scope: SyncScope): Promise<void>;
  /** Remove every checkpoint of the owner. */
  deleteAll(ownerId: string): Promise<void>;
  /** @returns Number of expired checkpoints removed */
  purgeExpired(): Promise<number>;
}

interface CheckpointEntry {
  checkpoint: SyncCheckpoint;
  expiresAt: number;
}

const CLEANUP_INTERVAL = 5 * 60 * 1000;

/**
 * In-process checkpoint store.
 *
 * Entries are lost on restart; use DrizzleCheckpointStore when syncs must
 * resume across processes.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  private readonly entries = new Map<string, CheckpointEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  private key(ownerId: string, scope: SyncScope): string {
    return `${ownerId}:${scope}`;
  }

  private startCleanup(): void {
    if (this.cleanupInterval) return;
    this.cleanupInterval = setInterval(() => {
      this.sweep();
    }, CLEANUP_INTERVAL);
    this.cleanupInterval.unref();
  }

  private sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async get(ownerId: string, scope: SyncScope): Promise<SyncCheckpoint | null> {
    const key = this.key(ownerId, scope);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.checkpoint);
  }

  async set(
    ownerId: string,
    scope: SyncScope,
    checkpoint: SyncCheckpoint,
    ttlMs: number
  ): Promise<void> {
    this.startCleanup();
    this.entries.set(this.key(ownerId, scope), {
      checkpoint: structuredClone(checkpoint),
      expiresAt: this.now() + ttlMs,
    });
  }

  async delete(ownerId: string, scope: SyncScope): Promise<void> {
    this.entries.delete(this.key(ownerId, scope));
  }

  async deleteAll(ownerId: string): Promise<void> {
    for (const scope of SYNC_SCOPES) {
      this.entries.delete(this.key(ownerId, scope));
    }
  }

  async purgeExpired(): Promise<number> {
    return this.sweep();
  }

  /** Stop the background sweep. */
  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}

/**
 * Checkpoints in the sync_checkpoints table.
 */
export class DrizzleCheckpointStore implements CheckpointStore {
  constructor(private readonly db: DbExecutor) {}

  async get(ownerId: string, scope: SyncScope): Promise<SyncCheckpoint | null> {
    const [row] = await this.db
      .select()
      .from(syncCheckpoints)
      .where(
        and(
          eq(syncCheckpoints.ownerId, ownerId),
          eq(syncCheckpoints.scope, scope),
          gt(syncCheckpoints.expiresAt, new Date())
        )
      )
      .limit(1);

    return row ? parseCheckpoint(row.data) : null;
  }

  async set(
    ownerId: string,
    scope: SyncScope,
    checkpoint: SyncCheckpoint,
    ttlMs: number
  ): Promise<void> {
    const expiresAt = new Date(Date.now() + ttlMs);
    await this.db
      .insert(syncCheckpoints)
      .values({ ownerId, scope, data: checkpoint, expiresAt })
      .onConflictDoUpdate({
        target: [syncCheckpoints.ownerId, syncCheckpoints.scope],
        set: { data: checkpoint, expiresAt, updatedAt: new Date() },
      });
  }

  async delete(ownerId: string, scope: SyncScope): Promise<void> {
    await this.db
      .delete(syncCheckpoints)
      .where(and(eq(syncCheckpoints.ownerId, ownerId), eq(syncCheckpoints.scope, scope)));
  }

  async deleteAll(ownerId: string): Promise<void> {
    await this.db.delete(syncCheckpoints).where(eq(syncCheckpoints.ownerId, ownerId));
  }

  async purgeExpired(): Promise<number> {
    const removed = await this.db
      .delete(syncCheckpoints)
      .where(lte(syncCheckpoints.expiresAt, new Date()))
      .returning({ ownerId: syncCheckpoints.ownerId });
    return removed.length;
  }
}
