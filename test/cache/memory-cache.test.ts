import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MemoryCache } from "../../src/cache/memory-cache";
import { DisabledCache } from "../../src/cache/disabled-cache";

describe("MemoryCache", () => {
  it("returns what was put", async () => {
    const cache = new MemoryCache<string[]>();
    await cache.put("k", ["a"], 42);

    assert.deepEqual(await cache.get("k"), { value: ["a"], storedAt: 42 });
  });

  it("overwrites instead of merging", async () => {
    const cache = new MemoryCache<Record<string, number>>();
    await cache.put("k", { a: 1 }, 1);
    await cache.put("k", { b: 2 }, 2);

    assert.deepEqual(await cache.get("k"), { value: { b: 2 }, storedAt: 2 });
  });

  it("clear wipes every key", async () => {
    const cache = new MemoryCache<number>();
    for (let i = 0; i < 5; i++) await cache.put(`k${i}`, i, i);

    await cache.clear();

    assert.equal(cache.size, 0);
    for (let i = 0; i < 5; i++) assert.equal(await cache.get(`k${i}`), null);
  });
});

describe("DisabledCache", () => {
  it("always misses, even right after a put", async () => {
    const cache = new DisabledCache<string>();
    await cache.put("k", "v", Date.now());

    assert.equal(await cache.get("k"), null);
  });

  it("clear succeeds", async () => {
    await new DisabledCache().clear();
  });

  it("clear empties the wrapped store", async () => {
    const inner = new MemoryCache<string>();
    await inner.put("k", "v", 1);

    const cache = new DisabledCache<string>(inner);
    await cache.clear();

    assert.equal(inner.size, 0);
  });
});
