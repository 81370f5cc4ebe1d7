import { describe, it, mock, afterEach } from "node:test";
import assert from "node:assert/strict";
import { createLogger, envLogLevel, levelFromVerbosity } from "../../src/utils/logger";

const noop = (..._args: unknown[]): void => {};

function captureConsole() {
  const log = mock.method(console, "log", noop);
  const warn = mock.method(console, "warn", noop);
  const error = mock.method(console, "error", noop);
  const lines = (m: typeof log) => m.mock.calls.map((c) => c.arguments[0]);
  return {
    stdout: () => lines(log),
    warnings: () => lines(warn),
    errors: () => lines(error),
  };
}

describe("logger", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe("createLogger", () => {
    it("prefixes each level and routes it to the matching console method", () => {
      const out = captureConsole();
      const log = createLogger("debug");

      log.debug("d");
      log.info("i");
      log.warn("w");
      log.error("e");

      assert.deepEqual(out.stdout(), ["[wfm][debug] d", "[wfm] i"]);
      assert.deepEqual(out.warnings(), ["[wfm][warn] w"]);
      assert.deepEqual(out.errors(), ["[wfm][error] e"]);
    });

    it("drops messages below the configured level", () => {
      const out = captureConsole();
      const log = createLogger("warn");

      log.debug("hidden");
      log.info("hidden");
      log.warn("shown");

      assert.deepEqual(out.stdout(), []);
      assert.deepEqual(out.warnings(), ["[wfm][warn] shown"]);
    });

    it("prints nothing when silent", () => {
      const out = captureConsole();
      const log = createLogger("silent");

      log.error("nope");

      assert.deepEqual(out.errors(), []);
    });

    it("honours a level changed after creation", () => {
      const out = captureConsole();
      const log = createLogger("warn");

      log.level = "info";
      log.info("now visible");

      assert.deepEqual(out.stdout(), ["[wfm] now visible"]);
    });

    it("appends metadata as JSON", () => {
      const out = captureConsole();
      createLogger("info").info("cache", { enabled: true });

      assert.deepEqual(out.stdout(), ['[wfm] cache {"enabled":true}']);
    });

    it("survives metadata that cannot be stringified", () => {
      const out = captureConsole();
      const circular: Record<string, unknown> = {};
      circular.self = circular;

      createLogger("info").info("loop", circular);

      assert.deepEqual(out.stdout(), ["[wfm] loop [meta:unstringifiable]"]);
    });
  });

  describe("envLogLevel", () => {
    it("reads WFM_LOOKUP_LOG_LEVEL case-insensitively", () => {
      assert.equal(envLogLevel({ WFM_LOOKUP_LOG_LEVEL: "DEBUG" }), "debug");
    });

    it("falls back to LOG_LEVEL", () => {
      assert.equal(envLogLevel({ LOG_LEVEL: "error" }), "error");
    });

    it("defaults to warn for missing or unknown values", () => {
      assert.equal(envLogLevel({}), "warn");
      assert.equal(envLogLevel({ WFM_LOOKUP_LOG_LEVEL: "loud" }), "warn");
    });
  });

  describe("levelFromVerbosity", () => {
    it("starts at warn and moves one step per flag", () => {
      assert.equal(levelFromVerbosity(0, 0), "warn");
      assert.equal(levelFromVerbosity(1, 0), "info");
      assert.equal(levelFromVerbosity(2, 0), "debug");
      assert.equal(levelFromVerbosity(0, 1), "error");
      assert.equal(levelFromVerbosity(0, 2), "silent");
      assert.equal(levelFromVerbosity(2, 1), "info");
    });

    it("clamps at both ends", () => {
      assert.equal(levelFromVerbosity(9, 0), "debug");
      assert.equal(levelFromVerbosity(0, 9), "silent");
    });

    it("lets an explicit debug level win", () => {
      assert.equal(levelFromVerbosity(2, 0, 1), "error");
      assert.equal(levelFromVerbosity(0, 0, 4), "debug");
      assert.equal(levelFromVerbosity(0, 0, 7), "debug");
    });
  });
});
