/**
 * In-memory store for task results too large to publish inline.
 * Entries expire; nothing survives a restart.
 */

import { randomUUID } from 'node:crypto';
import { createLogger } from '../logger.js';
import { Clock, systemClock } from '../types/index.js';

const log = createLogger('ResultStore');

interface StoredEntry<T> {
  data: T;
  expiresAt: number;
}

export const DEFAULT_RESULT_TTL_MS = 60 * 60 * 1000;

export class ResultStore<T> {
  private readonly entries = new Map<string, StoredEntry<T>>();

  constructor(
    private readonly defaultTtlMs: number = DEFAULT_RESULT_TTL_MS,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Store data for a task and return its storage key
   */
  store(taskId: string, data: T, ttlMs: number = this.defaultTtlMs): string {
    const key = `result:${taskId}:${randomUUID()}`;
    this.entries.set(key, { data, expiresAt: this.clock().getTime() + ttlMs });
    log.info(`Stored result for ${taskId} as ${key} (ttl ${Math.round(ttlMs / 1000)}s)`);
    return key;
  }

  retrieve(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return entry.data;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every expired entry; returns how many were removed
   */
  evictExpired(): number {
    const now = this.clock().getTime();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
