/**
 * Storage Module
 *
 * Selects the key-value engine behind the question cache.
 */

import type { KeyValueBackend } from './interface.js';
import { MemoryBackend } from './memory.js';
import { RedisBackend, type RedisBackendConfig } from './redis.js';
import type { Logger } from '../logger.js';

export type { KeyValueBackend, BackendInfo } from './interface.js';
export { MemoryBackend, WrongTypeError } from './memory.js';
export { RedisBackend } from './redis.js';
export type { RedisBackendConfig } from './redis.js';
export { globToRegExp, matchesGlob } from './glob.js';

export interface BackendConfig {
  kind: 'redis' | 'memory';
  redis: RedisBackendConfig;
}

/**
 * Create the configured backend (not yet connected)
 *
 * @example
 * ```ts
 * const backend = createBackend(config.cache, logger);
 * const cache = await QuestionCache.connect(backend, { defaultTtlSeconds: 1800 }, logger);
 * ```
 */
export function createBackend(config: BackendConfig, logger: Logger): KeyValueBackend {
  switch (config.kind) {
    case 'memory':
      return new MemoryBackend();
    case 'redis':
      return new RedisBackend(config.redis, logger.child({ component: 'redis' }));
  }
}
