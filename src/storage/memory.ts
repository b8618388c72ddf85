/**
 * Memory Backend - in-process key-value engine
 *
 * Keeps string values and hashes in a Map with per-key expiry. Expired keys
 * are dropped lazily on access and by `cleanup()`. Behaves like the Redis
 * commands the question cache uses, including WRONGTYPE errors when a string
 * command hits a hash or the other way round.
 */

import type { BackendInfo, KeyValueBackend } from './interface.js';
import { globToRegExp } from './glob.js';

type StoredValue =
  | { type: 'string'; value: string }
  | { type: 'hash'; fields: Map<string, string> };

interface StoredEntry {
  data: StoredValue;
  /** Absolute expiry in ms since epoch; undefined = never expires */
  expiresAt?: number;
}

export class WrongTypeError extends Error {
  constructor(key: string) {
    super(`WRONGTYPE Operation against a key holding the wrong kind of value: ${key}`);
    this.name = 'WrongTypeError';
  }
}

export class MemoryBackend implements KeyValueBackend {
  private entries: Map<string, StoredEntry> = new Map();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) {
      return null;
    }
    if (entry.data.type !== 'string') {
      throw new WrongTypeError(key);
    }
    return entry.data.value;
  }

  async setEx(key: string, ttlSeconds: number, value: string): Promise<void> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`ERR invalid expire time in 'setex' command: ${ttlSeconds}`);
    }
    this.entries.set(key, {
      data: { type: 'string', value },
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async hashSet(key: string, fields: Record<string, string | number>): Promise<void> {
    const hash = this.hashFor(key);
    for (const [field, value] of Object.entries(fields)) {
      hash.set(field, String(value));
    }
  }

  async hashSetIfAbsent(key: string, field: string, value: string | number): Promise<boolean> {
    const hash = this.hashFor(key);
    if (hash.has(field)) {
      return false;
    }
    hash.set(field, String(value));
    return true;
  }

  async hashIncrement(key: string, field: string, by: number): Promise<number> {
    const hash = this.hashFor(key);
    const current = hash.get(field) ?? '0';
    const parsed = Number(current);
    if (!Number.isInteger(parsed)) {
      throw new Error(`ERR hash value is not an integer: ${key} ${field}`);
    }
    const next = parsed + by;
    hash.set(field, String(next));
    return next;
  }

  async hashGetAll(key: string): Promise<Record<string, string>> {
    const entry = this.live(key);
    if (!entry) {
      return {};
    }
    if (entry.data.type !== 'hash') {
      throw new WrongTypeError(key);
    }
    return Object.fromEntries(entry.data.fields);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) {
      return false;
    }
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return true;
    }
    entry.expiresAt = Date.now() + ttlSeconds * 1000;
    return true;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    if (entry.expiresAt === undefined) {
      return -1;
    }
    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    const keys: string[] = [];
    for (const key of Array.from(this.entries.keys())) {
      if (this.live(key) && matcher.test(key)) {
        keys.push(key);
      }
    }
    return keys;
  }

  async del(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.live(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  describe(): BackendInfo {
    return { kind: 'memory', keys: this.size() };
  }

  /**
   * Number of live keys
   */
  size(): number {
    this.cleanup();
    return this.entries.size;
  }

  /**
   * Drop expired entries
   *
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  private live(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private hashFor(key: string): Map<string, string> {
    const entry = this.live(key);
    if (!entry) {
      const fields = new Map<string, string>();
      this.entries.set(key, { data: { type: 'hash', fields } });
      return fields;
    }
    if (entry.data.type !== 'hash') {
      throw new WrongTypeError(key);
    }
    return entry.data.fields;
  }
}
