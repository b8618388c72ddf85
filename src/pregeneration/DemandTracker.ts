/**
 * Demand Tracker
 *
 * Counts hot-path cache misses per configuration so that escalation can
 * pre-generate what users actually asked for, not just the static priority
 * list. Bounded: when full, the configuration missed least recently is
 * forgotten.
 */

import { deriveCacheKey } from '../cache/CacheKey.js';
import type { QuestionRequest } from '../types.js';

interface DemandRecord {
  request: QuestionRequest;
  misses: number;
  /** Monotonic sequence of the latest miss, for tie-breaking */
  lastSeen: number;
}

export class DemandTracker {
  // Insertion order doubles as recency order
  private records: Map<string, DemandRecord> = new Map();
  private sequence: number = 0;

  constructor(private readonly capacity: number = 500) {}

  recordMiss(request: QuestionRequest): void {
    const key = deriveCacheKey(request);
    const existing = this.records.get(key);
    this.sequence++;

    if (existing) {
      this.records.delete(key);
      this.records.set(key, { request, misses: existing.misses + 1, lastSeen: this.sequence });
      return;
    }

    if (this.records.size >= this.capacity) {
      const oldest = this.records.keys().next();
      if (!oldest.done) {
        this.records.delete(oldest.value);
      }
    }

    this.records.set(key, { request, misses: 1, lastSeen: this.sequence });
  }

  /**
   * Configurations ranked by miss count, most recent first on ties
   */
  topMissed(limit: number): QuestionRequest[] {
    return Array.from(this.records.values())
      .sort((a, b) => b.misses - a.misses || b.lastSeen - a.lastSeen)
      .slice(0, Math.max(0, limit))
      .map((record) => record.request);
  }

  missesFor(request: QuestionRequest): number {
    return this.records.get(deriveCacheKey(request))?.misses ?? 0;
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
    this.sequence = 0;
  }
}
