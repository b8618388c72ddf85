import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryBackend, WrongTypeError } from '../src/storage/memory.js';
import { globToRegExp, matchesGlob } from '../src/storage/glob.js';
import { createBackend } from '../src/storage/index.js';
import { RedisBackend } from '../src/storage/redis.js';
import { createSilentLogger } from '../src/logger.js';

describe('Glob matching', () => {
  it('should match * across separators', () => {
    expect(matchesGlob('questions:*', 'questions:abc:physics:medium')).toBe(true);
    expect(matchesGlob('questions:*', 'metadata:questions:abc')).toBe(false);
  });

  it('should match ? as exactly one character', () => {
    expect(matchesGlob('k?y', 'key')).toBe(true);
    expect(matchesGlob('k?y', 'ky')).toBe(false);
  });

  it('should support character classes and negation', () => {
    expect(matchesGlob('[ab]x', 'bx')).toBe(true);
    expect(matchesGlob('[a-c]x', 'cx')).toBe(true);
    expect(matchesGlob('[^a]x', 'ax')).toBe(false);
    expect(matchesGlob('[^a]x', 'bx')).toBe(true);
  });

  it('should treat regex metacharacters and escapes literally', () => {
    expect(matchesGlob('a.b', 'a.b')).toBe(true);
    expect(matchesGlob('a.b', 'axb')).toBe(false);
    expect(matchesGlob('a\\*b', 'a*b')).toBe(true);
    expect(matchesGlob('a\\*b', 'axb')).toBe(false);
  });

  it('should anchor the whole key', () => {
    expect(globToRegExp('physics').test('questions:physics')).toBe(false);
  });
});

describe('MemoryBackend', () => {
  let backend: MemoryBackend;

  beforeEach(async () => {
    vi.useFakeTimers();
    backend = new MemoryBackend();
    await backend.connect();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should store and expire string values', async () => {
    await backend.setEx('k', 10, 'v');
    expect(await backend.get('k')).toBe('v');
    expect(await backend.ttl('k')).toBe(10);

    vi.advanceTimersByTime(10_000);
    expect(await backend.get('k')).toBeNull();
    expect(await backend.ttl('k')).toBe(-2);
  });

  it('should reject non-positive TTLs on setEx', async () => {
    await expect(backend.setEx('k', 0, 'v')).rejects.toThrow('invalid expire time');
  });

  it('should create hashes without expiry and increment fields', async () => {
    expect(await backend.hashIncrement('h', 'hits', 1)).toBe(1);
    expect(await backend.hashIncrement('h', 'hits', 2)).toBe(3);
    expect(await backend.ttl('h')).toBe(-1);

    expect(await backend.hashSetIfAbsent('h', 'hits', 0)).toBe(false);
    expect(await backend.hashSetIfAbsent('h', 'misses', 0)).toBe(true);
    expect(await backend.hashGetAll('h')).toEqual({ hits: '3', misses: '0' });
  });

  it('should raise WRONGTYPE when mixing strings and hashes', async () => {
    await backend.setEx('s', 10, 'v');
    await expect(backend.hashGetAll('s')).rejects.toBeInstanceOf(WrongTypeError);
    await backend.hashSet('h', { a: 1 });
    await expect(backend.get('h')).rejects.toBeInstanceOf(WrongTypeError);
  });

  it('should expire existing keys only', async () => {
    expect(await backend.expire('missing', 5)).toBe(false);
    await backend.hashSet('h', { a: 1 });
    expect(await backend.expire('h', 5)).toBe(true);
    expect(await backend.ttl('h')).toBe(5);
  });

  it('should scan live keys by pattern and delete them', async () => {
    await backend.setEx('questions:1', 10, 'a');
    await backend.setEx('questions:2', 1, 'b');
    await backend.hashSet('metadata:questions:1', { hit_count: 0 });

    vi.advanceTimersByTime(1_000);

    expect(await backend.scanKeys('questions:*')).toEqual(['questions:1']);
    expect(await backend.del(['questions:1', 'questions:2'])).toBe(1);
    expect(backend.size()).toBe(1);
  });

  it('should describe itself with its live key count', async () => {
    await backend.setEx('a', 10, 'x');
    expect(backend.describe()).toEqual({ kind: 'memory', keys: 1 });
  });
});

describe('createBackend', () => {
  const redis = { host: 'localhost', port: 6379, db: 0, connectTimeoutMs: 1000 };

  it('should build the configured engine', () => {
    expect(createBackend({ kind: 'memory', redis }, createSilentLogger())).toBeInstanceOf(MemoryBackend);

    const backend = createBackend({ kind: 'redis', redis }, createSilentLogger());
    expect(backend).toBeInstanceOf(RedisBackend);
    expect(backend.describe()).toEqual({ kind: 'redis', host: 'localhost', port: 6379, db: 0 });
  });
});
