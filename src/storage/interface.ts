/**
 * Key-value backend interface
 *
 * The contract the question cache needs from its backing engine: string
 * values with TTLs, hash fields with atomic increments, and glob-pattern key
 * enumeration. Semantics follow Redis so the Redis client and the in-process
 * engine are interchangeable.
 *
 * @example
 * ```ts
 * const backend = createBackend(config);
 * await backend.connect();
 * await backend.setEx('questions:abc', 1800, '[]');
 * ```
 */
export interface KeyValueBackend {
  /**
   * Establish the connection and verify it answers
   *
   * @throws Error if the engine is unreachable
   */
  connect(): Promise<void>;

  /** Close the connection; safe to call when never connected */
  disconnect(): Promise<void>;

  get(key: string): Promise<string | null>;

  /** Store a string value that expires after `ttlSeconds` */
  setEx(key: string, ttlSeconds: number, value: string): Promise<void>;

  /** Set several hash fields at once, creating the hash if needed */
  hashSet(key: string, fields: Record<string, string | number>): Promise<void>;

  /** Set a hash field only when it does not exist yet */
  hashSetIfAbsent(key: string, field: string, value: string | number): Promise<boolean>;

  /** Atomically add `by` to an integer hash field and return the new value */
  hashIncrement(key: string, field: string, by: number): Promise<number>;

  /** All fields of a hash; empty object when the key does not exist */
  hashGetAll(key: string): Promise<Record<string, string>>;

  /** Set a key's expiry; returns false when the key does not exist */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  /** Remaining TTL in seconds: -2 when missing, -1 when the key never expires */
  ttl(key: string): Promise<number>;

  /** Every live key matching a Redis glob pattern */
  scanKeys(pattern: string): Promise<string[]>;

  /** Delete keys, returning how many existed */
  del(keys: string[]): Promise<number>;

  /** Connection details for stats and health reporting */
  describe(): BackendInfo;
}

export type BackendInfo =
  | { kind: 'redis'; host: string; port: number; db: number }
  | { kind: 'memory'; keys: number };

