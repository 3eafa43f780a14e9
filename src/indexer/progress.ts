/**
 * Progress Tracker
 *
 * Per-request ingestion progress, keyed by request id. Finished entries are
 * kept for `retentionMs` so a poller can see the final state, then evicted
 * lazily on the next read or sweep.
 */

import type { ProgressSnapshot, ProgressStatus } from './types.js';

export const DEFAULT_PROGRESS_RETENTION_MS = 60_000;

export interface ProgressTrackerOptions {
  retentionMs?: number;
  now?: () => number;
}

interface ProgressEntry {
  current: number;
  total: number;
  status: ProgressStatus;
  error?: string;
  finishedAt?: number;
}

export function percentageOf(current: number, total: number): number {
  return total > 0 ? Math.floor((current / total) * 100) : 0;
}

export class ProgressTracker {
  private readonly entries = new Map<string, ProgressEntry>();
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: ProgressTrackerOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_PROGRESS_RETENTION_MS;
    this.now = options.now ?? Date.now;
  }

  start(id: string): void {
    this.entries.set(id, { current: 0, total: 0, status: 'processing' });
  }

  /** Ignored for unknown or finished ids */
  update(id: string, current: number, total: number): void {
    const entry = this.entries.get(id);
    if (entry?.status !== 'processing') {
      return;
    }
    entry.current = current;
    entry.total = total;
  }

  complete(id: string): void {
    this.finish(id, 'completed');
  }

  fail(id: string, message: string): void {
    this.finish(id, 'failed', message);
  }

  /**
   * Snapshot for an id, or undefined if it is unknown or has expired.
   */
  get(id: string): ProgressSnapshot | undefined {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(id);
      return undefined;
    }

    const snapshot: ProgressSnapshot = {
      current: entry.current,
      total: entry.total,
      percentage: percentageOf(entry.current, entry.total),
      status: entry.status,
    };
    if (entry.error !== undefined) {
      snapshot.error = entry.error;
    }
    return snapshot;
  }

  /**
   * Drop every expired entry.
   *
   * @returns ids that were evicted
   */
  sweep(): string[] {
    const evicted: string[] = [];
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(id);
        evicted.push(id);
      }
    }
    return evicted;
  }

  get size(): number {
    return this.entries.size;
  }

  private finish(id: string, status: ProgressStatus, error?: string): void {
    const entry = this.entries.get(id) ?? { current: 0, total: 0, status };
    entry.status = status;
    entry.finishedAt = this.now();
    if (error !== undefined) {
      entry.error = error;
    }
    this.entries.set(id, entry);
  }

  private isExpired(entry: ProgressEntry): boolean {
    return entry.finishedAt !== undefined && this.now() >= entry.finishedAt + this.retentionMs;
  }
}
