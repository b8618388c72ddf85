/**
 * Cache Module
 *
 * Question-set caching with deterministic keys, TTL expiry, per-key access
 * metadata and a degraded mode for when the backing store is unreachable.
 */

// Type definitions
export type {
  QuestionCacheOptions,
  AccessMetadata,
  CacheStats,
  CacheStatsSnapshot,
  DisabledCacheStats,
  FailedCacheStats,
} from './types.js';
export { isStatsSnapshot } from './types.js';

// Cache key generation
export {
  CACHE_KEY_PREFIX,
  METADATA_KEY_PREFIX,
  DEFAULT_CACHE_PATTERN,
  canonicalizeRequest,
  deriveCacheKey,
  metadataKeyFor,
} from './CacheKey.js';

// Cache store
export { QuestionCache } from './QuestionCache.js';
