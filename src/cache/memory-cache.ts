import type { CacheEntry, CacheStore } from "./types";

export class MemoryCache<T = unknown> implements CacheStore<T> {
  private readonly map = new Map<string, CacheEntry<T>>();

  async get(key: string): Promise<CacheEntry<T> | null> {
    return this.map.get(key) ?? null;
  }

  async put(key: string, value: T, storedAt: number): Promise<void> {
    this.map.set(key, { value, storedAt });
  }

  async clear(): Promise<void> {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}
