import type { CacheEntry, CacheStore } from "./types";

/**
 * Cache used when caching is turned off: every get misses, put is a no-op.
 * clear() still reaches the wrapped store, so entries written by earlier
 * runs can be removed with caching off.
 */
export class DisabledCache<T = unknown> implements CacheStore<T> {
  private readonly inner?: Pick<CacheStore<T>, "clear">;

  constructor(inner?: Pick<CacheStore<T>, "clear">) {
    this.inner = inner;
  }

  async get(_key: string): Promise<CacheEntry<T> | null> {
    return null;
  }

  async put(_key: string, _value: T, _storedAt: number): Promise<void> {
    // no-op
  }

  async clear(): Promise<void> {
    await this.inner?.clear();
  }
}
