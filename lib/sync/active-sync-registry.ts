/**
 * Tracks syncs running in this process, one per (ownerId, scope).
 *
 * Advisory only: entries vanish on restart, and the persisted progress
 * records remain the durable source of truth for duplicate-start checks.
 */

import type { SyncScope } from './types';

export interface ActiveSync {
  ownerId: string;
  scope: SyncScope;
  taskId: string;
  controller: AbortController;
  startedAt: Date;
}

export class ActiveSyncRegistry {
  private readonly active = new Map<string, ActiveSync>();

  private key(ownerId: string, scope: SyncScope): string {
    return `${ownerId}:${scope}`;
  }

  isActive(ownerId: string, scope: SyncScope): boolean {
    return this.active.has(this.key(ownerId, scope));
  }

  /**
   * Register a sync.
   *
   * @returns false when another sync already holds (ownerId, scope)
   */
  tryAcquire(entry: ActiveSync): boolean {
    const key = this.key(entry.ownerId, entry.scope);
    if (this.active.has(key)) {
      return false;
    }
    this.active.set(key, entry);
    return true;
  }

  /**
   * Remove the entry, but only if it still belongs to `taskId`.
   */
  release(ownerId: string, scope: SyncScope, taskId: string): void {
    const key = this.key(ownerId, scope);
    if (this.active.get(key)?.taskId === taskId) {
      this.active.delete(key);
    }
  }

  listForOwner(ownerId: string): ActiveSync[] {
    return Array.from(this.active.values()).filter((entry) => entry.ownerId === ownerId);
  }

  /**
   * Abort every running sync of the owner.
   *
   * @returns Number of syncs signalled
   */
  abortOwner(ownerId: string, reason: Error): number {
    const entries = this.listForOwner(ownerId);
    for (const entry of entries) {
      entry.controller.abort(reason);
    }
    return entries.length;
  }

  get size(): number {
    return this.active.size;
  }

  clear(): void {
    this.active.clear();
  }
}
