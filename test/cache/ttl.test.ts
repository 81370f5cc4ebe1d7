import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { entryAgeMs, isFresh } from "../../src/cache/ttl";

describe("isFresh", () => {
  const entry = { value: "x", storedAt: 10_000 };
  const ttl = 60_000;

  it("is fresh just before the TTL elapses", () => {
    assert.equal(isFresh(entry, ttl, 10_000 + ttl - 1), true);
  });

  it("is stale exactly at the TTL", () => {
    assert.equal(isFresh(entry, ttl, 10_000 + ttl), false);
  });

  it("is stale just after the TTL elapses", () => {
    assert.equal(isFresh(entry, ttl, 10_000 + ttl + 1), false);
  });

  it("is never fresh with a zero TTL", () => {
    assert.equal(isFresh(entry, 0, 10_000), false);
  });

  it("treats an entry from the future as fresh", () => {
    assert.equal(isFresh(entry, ttl, 5_000), true);
  });
});

describe("entryAgeMs", () => {
  it("returns the age in milliseconds", () => {
    assert.equal(entryAgeMs({ value: 1, storedAt: 1_000 }, 4_500), 3_500);
  });

  it("never returns a negative age", () => {
    assert.equal(entryAgeMs({ value: 1, storedAt: 9_000 }, 4_500), 0);
  });
});
