/**
 * Question Cache - TTL store for generated question sets
 *
 * Stores serialized question sets in the key-value backend together with an
 * access-metadata hash per key. If the backend cannot be reached when the
 * cache connects, the cache disables itself for the lifetime of the process:
 * every `get` returns null, every `set` returns false, nothing throws.
 */

import { z } from 'zod';
import type { BackendInfo, KeyValueBackend } from '../storage/interface.js';
import type { Logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Question, QuestionRequest } from '../types.js';
import type { AccessMetadata, CacheStats, QuestionCacheOptions } from './types.js';
import {
  CACHE_KEY_PREFIX,
  DEFAULT_CACHE_PATTERN,
  METADATA_KEY_PREFIX,
  deriveCacheKey,
  metadataKeyFor,
} from './CacheKey.js';

const cachedSetSchema = z.array(z.record(z.unknown()));

function toCount(value: string | undefined): number {
  const parsed = parseInt(value ?? '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function toAccessMetadata(fields: Record<string, string>): AccessMetadata {
  const metadata: AccessMetadata = {
    hit_count: toCount(fields.hit_count),
    miss_count: toCount(fields.miss_count),
  };
  if (fields.last_accessed !== undefined) metadata.last_accessed = fields.last_accessed;
  if (fields.question_count !== undefined) metadata.question_count = toCount(fields.question_count);
  if (fields.created_at !== undefined) metadata.created_at = fields.created_at;
  return metadata;
}

/**
 * QuestionCache class
 *
 * Features:
 * - Get/set of whole question sets under derived cache keys
 * - Hit/miss counters per key, incremented atomically by the backend
 * - Pattern invalidation
 * - Aggregate stats with hit rate
 * - Degraded mode when the backend is unavailable
 */
export class QuestionCache {
  private constructor(
    private readonly backend: KeyValueBackend | null,
    private readonly options: QuestionCacheOptions,
    private readonly logger: Logger,
    private readonly unavailableBackend?: KeyValueBackend
  ) {}

  /**
   * Connect to the backend and build the cache
   *
   * Connection failures are logged once and produce a disabled cache rather
   * than an error.
   */
  static async connect(
    backend: KeyValueBackend,
    options: QuestionCacheOptions,
    logger: Logger
  ): Promise<QuestionCache> {
    const log = logger.child({ component: 'question-cache' });

    try {
      await backend.connect();
      log.info('cache.connected', { backend: backend.describe(), defaultTtlSeconds: options.defaultTtlSeconds });
      return new QuestionCache(backend, options, log);
    } catch (error) {
      log.warn('cache.disabled', {
        backend: backend.describe(),
        error: errorMessage(error),
        message: 'Backing store unreachable; questions will be generated in real time',
      });
      return new QuestionCache(null, options, log, backend);
    }
  }

  /**
   * Check if the cache connected successfully
   */
  isEnabled(): boolean {
    return this.backend !== null;
  }

  get defaultTtlSeconds(): number {
    return this.options.defaultTtlSeconds;
  }

  /**
   * Get a cached question set
   *
   * Records a hit or miss in the key's access metadata. Entries that cannot be
   * decoded count as misses.
   *
   * @returns The cached questions, or null when absent, expired or disabled
   */
  async get(key: string): Promise<Question[] | null> {
    if (!this.backend) {
      return null;
    }

    let raw: string | null;
    try {
      raw = await this.backend.get(key);
    } catch (error) {
      this.logger.warn('cache.get_failed', { cacheKey: key, error: errorMessage(error) });
      return null;
    }

    const questions = raw === null ? null : this.decode(key, raw);
    await this.recordAccess(this.backend, key, questions !== null);

    if (questions) {
      this.logger.info('cache.hit', { cacheKey: key, questionCount: questions.length });
    } else {
      this.logger.info('cache.miss', { cacheKey: key });
    }

    return questions;
  }

  /**
   * Store a question set
   *
   * Replaces any existing entry under the key and re-initializes its access
   * metadata with the same TTL.
   *
   * @param ttlSeconds - Custom TTL (uses the configured default if omitted or 0)
   * @returns Whether the set was stored
   */
  async set(key: string, questions: Question[], ttlSeconds?: number): Promise<boolean> {
    if (!this.backend) {
      return false;
    }

    const ttl = ttlSeconds || this.options.defaultTtlSeconds;

    let serialized: string;
    try {
      serialized = JSON.stringify(questions);
    } catch (error) {
      this.logger.warn('cache.serialize_failed', { cacheKey: key, error: errorMessage(error) });
      return false;
    }

    try {
      await this.backend.setEx(key, ttl, serialized);
    } catch (error) {
      this.logger.warn('cache.store_failed', { cacheKey: key, error: errorMessage(error) });
      return false;
    }

    await this.initializeMetadata(this.backend, key, questions.length, ttl);

    this.logger.info('cache.store', { cacheKey: key, questionCount: questions.length, ttlSeconds: ttl });
    return true;
  }

  /**
   * Store a supplied question set under the key derived from `request`
   */
  async warm(request: QuestionRequest, questions: Question[], ttlSeconds?: number): Promise<boolean> {
    return this.set(deriveCacheKey(request), questions, ttlSeconds);
  }

  /**
   * Delete every cache entry matching a glob pattern, along with its metadata
   *
   * @returns Number of cache entries deleted
   */
  async invalidate(pattern: string = DEFAULT_CACHE_PATTERN): Promise<number> {
    if (!this.backend) {
      return 0;
    }

    try {
      const keys = await this.backend.scanKeys(pattern);
      if (keys.length === 0) {
        return 0;
      }

      const deleted = await this.backend.del(keys);
      await this.backend.del(keys.map(metadataKeyFor));

      this.logger.info('cache.invalidate', { pattern, deleted });
      return deleted;
    } catch (error) {
      this.logger.warn('cache.invalidate_failed', { pattern, error: errorMessage(error) });
      return 0;
    }
  }

  /**
   * Aggregate statistics across all live entries and metadata records
   */
  async stats(): Promise<CacheStats> {
    if (!this.backend) {
      return { enabled: false, message: 'Question cache is disabled' };
    }

    try {
      const [entryKeys, metadataKeys] = await Promise.all([
        this.backend.scanKeys(`${CACHE_KEY_PREFIX}:*`),
        this.backend.scanKeys(`${METADATA_KEY_PREFIX}:*`),
      ]);

      let totalHits = 0;
      let totalMisses = 0;
      for (const metadataKey of metadataKeys) {
        const metadata = toAccessMetadata(await this.backend.hashGetAll(metadataKey));
        totalHits += metadata.hit_count;
        totalMisses += metadata.miss_count;
      }

      let totalQuestions = 0;
      for (const entryKey of entryKeys) {
        const raw = await this.backend.get(entryKey);
        if (raw !== null) {
          totalQuestions += this.decode(entryKey, raw)?.length ?? 0;
        }
      }

      const accesses = totalHits + totalMisses;
      const hitRate = accesses > 0 ? (totalHits / accesses) * 100 : 0;

      return {
        enabled: true,
        total_cached_sets: entryKeys.length,
        total_cached_questions: totalQuestions,
        total_hits: totalHits,
        total_misses: totalMisses,
        hit_rate_percentage: Math.round(hitRate * 100) / 100,
        backend: this.backend.describe(),
      };
    } catch (error) {
      this.logger.warn('cache.stats_failed', { error: errorMessage(error) });
      return { enabled: true, error: errorMessage(error) };
    }
  }

  /**
   * Description of the configured backend, whether or not it connected
   */
  describeBackend(): BackendInfo | null {
    return (this.backend ?? this.unavailableBackend)?.describe() ?? null;
  }

  /**
   * Close the backend connection
   */
  async close(): Promise<void> {
    if (this.backend) {
      await this.backend.disconnect();
    }
  }

  private decode(key: string, raw: string): Question[] | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('cache.decode_failed', { cacheKey: key, error: errorMessage(error) });
      return null;
    }

    const result = cachedSetSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('cache.decode_failed', { cacheKey: key, error: 'Cached value is not a list of questions' });
      return null;
    }
    return result.data;
  }

  private async recordAccess(backend: KeyValueBackend, key: string, hit: boolean): Promise<void> {
    const metadataKey = metadataKeyFor(key);

    try {
      await backend.hashIncrement(metadataKey, hit ? 'hit_count' : 'miss_count', 1);
      await backend.hashSet(metadataKey, { last_accessed: new Date().toISOString() });

      // A record created by this increment has no expiry yet
      if ((await backend.ttl(metadataKey)) === -1) {
        const entryTtl = hit ? await backend.ttl(key) : -2;
        await backend.expire(metadataKey, entryTtl > 0 ? entryTtl : this.options.defaultTtlSeconds);
      }
    } catch (error) {
      this.logger.warn('cache.metadata_failed', { cacheKey: key, error: errorMessage(error) });
    }
  }

  private async initializeMetadata(
    backend: KeyValueBackend,
    key: string,
    questionCount: number,
    ttlSeconds: number
  ): Promise<void> {
    const metadataKey = metadataKeyFor(key);

    try {
      await backend.hashSet(metadataKey, {
        question_count: questionCount,
        created_at: new Date().toISOString(),
      });
      await backend.hashSetIfAbsent(metadataKey, 'hit_count', 0);
      await backend.hashSetIfAbsent(metadataKey, 'miss_count', 0);
      await backend.expire(metadataKey, ttlSeconds);
    } catch (error) {
      this.logger.warn('cache.metadata_failed', { cacheKey: key, error: errorMessage(error) });
    }
  }
}
