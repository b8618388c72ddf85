/**
 * Redis Backend
 *
 * ioredis-backed implementation of the key-value contract. The client is
 * created lazily and connected explicitly so an unreachable server surfaces
 * as a rejected `connect()` instead of a queue of pending commands.
 */

import { Redis } from 'ioredis';
import type { BackendInfo, KeyValueBackend } from './interface.js';
import type { Logger } from '../logger.js';

/**
 * Redis connection configuration
 */
export interface RedisBackendConfig {
  host: string;
  port: number;
  db: number;
  password?: string;
  /** Socket connect timeout in milliseconds (default: 5000) */
  connectTimeoutMs: number;
  /** Reconnection attempts after an established connection drops (default: 10) */
  maxReconnectAttempts?: number;
}

const SCAN_COUNT = 200;

export class RedisBackend implements KeyValueBackend {
  private readonly client: Redis;

  constructor(
    private readonly config: RedisBackendConfig,
    private readonly logger: Logger
  ) {
    const maxReconnectAttempts = config.maxReconnectAttempts ?? 10;

    this.client = new Redis({
      host: config.host,
      port: config.port,
      db: config.db,
      password: config.password,
      connectTimeout: config.connectTimeoutMs,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: (times) => (times > maxReconnectAttempts ? null : Math.min(times * 200, 2000)),
    });

    this.client.on('error', (error: Error) => {
      this.logger.debug('redis.error', { error: error.message });
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      await this.client.ping();
    } catch (error) {
      // Stop background reconnection; the cache runs disabled from here on
      this.client.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client.status === 'ready') {
      await this.client.quit();
      return;
    }
    this.client.disconnect();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setEx(key: string, ttlSeconds: number, value: string): Promise<void> {
    await this.client.setex(key, ttlSeconds, value);
  }

  async hashSet(key: string, fields: Record<string, string | number>): Promise<void> {
    await this.client.hset(key, fields);
  }

  async hashSetIfAbsent(key: string, field: string, value: string | number): Promise<boolean> {
    return (await this.client.hsetnx(key, field, value)) === 1;
  }

  async hashIncrement(key: string, field: string, by: number): Promise<number> {
    return this.client.hincrby(key, field, by);
  }

  async hashGetAll(key: string): Promise<Record<string, string>> {
    return this.client.hgetall(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.client.expire(key, ttlSeconds)) === 1;
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = '0';

    do {
      const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
      for (const key of batch) {
        keys.add(key);
      }
      cursor = next;
    } while (cursor !== '0');

    return Array.from(keys);
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(...keys);
  }

  describe(): BackendInfo {
    return {
      kind: 'redis',
      host: this.config.host,
      port: this.config.port,
      db: this.config.db,
    };
  }
}
