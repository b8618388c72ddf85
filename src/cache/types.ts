/**
 * Question Cache Type Definitions
 */

import type { BackendInfo } from '../storage/interface.js';

/**
 * Configuration options for the question cache
 */
export interface QuestionCacheOptions {
  /** Default time-to-live for cached sets in seconds (default: 1800) */
  defaultTtlSeconds: number;
}

/**
 * Access metadata kept beside every cache entry, stored as a hash at
 * `metadata:{cacheKey}`. Counters are request outcomes, so a miss against a
 * key that was never cached still creates the record.
 */
export interface AccessMetadata {
  hit_count: number;
  miss_count: number;
  last_accessed?: string;
  question_count?: number;
  created_at?: string;
}

/**
 * Stats reported when the backing store could not be reached at startup
 */
export interface DisabledCacheStats {
  enabled: false;
  message: string;
}

/**
 * Aggregate stats across all live metadata records
 */
export interface CacheStatsSnapshot {
  enabled: true;
  total_cached_sets: number;
  total_cached_questions: number;
  total_hits: number;
  total_misses: number;
  /** hits / (hits + misses) * 100, rounded to 2 decimals; 0 with no accesses */
  hit_rate_percentage: number;
  backend: BackendInfo;
}

/**
 * Stats reported when aggregation itself failed
 */
export interface FailedCacheStats {
  enabled: true;
  error: string;
}

export type CacheStats = DisabledCacheStats | CacheStatsSnapshot | FailedCacheStats;

export function isStatsSnapshot(stats: CacheStats): stats is CacheStatsSnapshot {
  return stats.enabled && !('error' in stats);
}
