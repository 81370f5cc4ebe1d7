export interface CacheEntry<T> {
  value: T;
  /** unix epoch milliseconds */
  storedAt: number;
}

/**
 * Key/value store for decoded API payloads.
 *
 * Freshness is the caller's concern: get() returns whatever is stored,
 * see isFresh() in ./ttl.
 */
export interface CacheStore<T = unknown> {
  get(key: string): Promise<CacheEntry<T> | null>;
  /** Unconditional overwrite. */
  put(key: string, value: T, storedAt: number): Promise<void>;
  /** Remove every entry. Succeeds when the store is already empty. */
  clear(): Promise<void>;
}
