import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { sha256Hex } from "../../src/utils/hash";

describe("sha256Hex", () => {
  it("produces consistent hash", () => {
    assert.equal(sha256Hex("catalog:pc:en"), sha256Hex("catalog:pc:en"));
  });

  it("produces different hash for different input", () => {
    assert.notEqual(sha256Hex("orders:a:pc:en"), sha256Hex("orders:b:pc:en"));
  });

  it("produces the known digest of the empty string", () => {
    assert.equal(sha256Hex(""), "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });
});
