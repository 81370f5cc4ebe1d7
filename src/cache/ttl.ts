import type { CacheEntry } from "./types";

/** An entry is fresh while its age is strictly below the TTL. */
export function isFresh(entry: CacheEntry<unknown>, ttlMs: number, now: number): boolean {
  return now - entry.storedAt < ttlMs;
}

export function entryAgeMs(entry: CacheEntry<unknown>, now: number): number {
  return Math.max(0, now - entry.storedAt);
}
