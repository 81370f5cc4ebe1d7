import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { defaultCacheDir, loadConfig } from "../src/config";
import { DEFAULT_BASE_URL } from "../src/market/fetcher";
import { ConfigError } from "../src/utils/error";
import { logger } from "../src/utils/logger";

describe("defaultCacheDir", () => {
  it("uses XDG_CACHE_HOME on Linux", () => {
    assert.equal(
      defaultCacheDir({ XDG_CACHE_HOME: "/xdg" }, "linux", "/home/u"),
      path.join("/xdg", "warframe-market"),
    );
  });

  it("falls back to ~/.cache on Linux", () => {
    assert.equal(defaultCacheDir({}, "linux", "/home/u"), path.join("/home/u", ".cache", "warframe-market"));
  });

  it("uses ~/Library/Caches on macOS", () => {
    assert.equal(
      defaultCacheDir({ XDG_CACHE_HOME: "/xdg" }, "darwin", "/Users/u"),
      path.join("/Users/u", "Library", "Caches", "warframe-market"),
    );
  });

  it("uses LOCALAPPDATA on Windows", () => {
    assert.equal(
      defaultCacheDir({ LOCALAPPDATA: "/appdata" }, "win32", "/home/u"),
      path.join("/appdata", "warframe-market", "Cache"),
    );
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  const env = { XDG_CACHE_HOME: "/xdg" };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "wfm-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeConfig = (content: string, name = ".wfm-lookup.yaml") =>
    fs.writeFile(path.join(tempDir, name), content);

  it("returns defaults when config file is missing", async () => {
    const cfg = await loadConfig({ cwd: tempDir, env });

    assert.deepEqual(cfg, {
      baseUrl: DEFAULT_BASE_URL,
      platform: "pc",
      language: "en",
      cache: {
        enabled: true,
        dir: defaultCacheDir(env),
        catalogTtlMs: 86_400_000,
        ordersTtlMs: 600_000,
      },
      requestsPerMinute: 180,
      timeoutMs: 15000,
      concurrency: 4,
    });
  });

  it("loads valid YAML config and merges with defaults", async () => {
    await writeConfig(`
platform: xbox
language: de
rateLimit: 60
cache:
  dir: /var/cache/wfm
  ttlItems: 2h
  ttlOrders: 300
`);

    const cfg = await loadConfig({ cwd: tempDir, env });

    assert.equal(cfg.platform, "xbox");
    assert.equal(cfg.language, "de");
    assert.equal(cfg.requestsPerMinute, 60);
    assert.equal(cfg.cache.dir, "/var/cache/wfm");
    assert.equal(cfg.cache.catalogTtlMs, 7_200_000);
    assert.equal(cfg.cache.ordersTtlMs, 300_000);
    assert.equal(cfg.timeoutMs, 15000);
  });

  it("ignores invalid values and keeps the defaults", async () => {
    await writeConfig(`
platform: wii
concurrency: 100
baseUrl: ftp://example.test
cache:
  ttlItems: forever
`);

    const cfg = await loadConfig({ cwd: tempDir, env });

    assert.equal(cfg.platform, "pc");
    assert.equal(cfg.concurrency, 4);
    assert.equal(cfg.baseUrl, DEFAULT_BASE_URL);
    assert.equal(cfg.cache.catalogTtlMs, 86_400_000);
  });

  it("fails on a non-positive rate limit in the file", async () => {
    for (const value of ["0", "-1", ".nan", "fast"]) {
      await writeConfig(`rateLimit: ${value}\n`);

      await assert.rejects(loadConfig({ cwd: tempDir, env }), (err: unknown) => {
        assert.ok(err instanceof ConfigError, value);
        assert.match(err.message, /^Invalid config value for 'rateLimit': must be a positive number, got /);
        return true;
      });
    }
  });

  it("handles empty config file (uses defaults)", async () => {
    await writeConfig("");

    const cfg = await loadConfig({ cwd: tempDir, env });

    assert.equal(cfg.platform, "pc");
  });

  it("throws on invalid YAML syntax", async () => {
    await writeConfig("platform: [pc\n");

    await assert.rejects(loadConfig({ cwd: tempDir, env }), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.match(err.message, /^Failed to parse /);
      return true;
    });
  });

  it("throws when the file is not a mapping", async () => {
    await writeConfig("- pc\n- xbox\n");

    await assert.rejects(loadConfig({ cwd: tempDir, env }), ConfigError);
  });

  it("uses env var WFM_LOOKUP_CONFIG_PATH to override config location", async () => {
    await fs.mkdir(path.join(tempDir, "custom"));
    await writeConfig("platform: ps4\n", path.join("custom", "my-config.yaml"));

    const cfg = await loadConfig({
      cwd: tempDir,
      env: { ...env, WFM_LOOKUP_CONFIG_PATH: path.join("custom", "my-config.yaml") },
    });

    assert.equal(cfg.platform, "ps4");
  });

  it("warns when WFM_LOOKUP_CONFIG_PATH names a missing file", async () => {
    const warn = mock.method(console, "warn", (..._args: unknown[]): void => {});
    const previousLevel = logger.level;
    logger.level = "warn";
    try {
      const cfg = await loadConfig({ cwd: tempDir, env: { ...env, WFM_LOOKUP_CONFIG_PATH: "missing.yaml" } });

      assert.equal(cfg.platform, "pc");
      assert.deepEqual(
        warn.mock.calls.map((c) => c.arguments[0]),
        [`[wfm][warn] Config file ${path.join(tempDir, "missing.yaml")} from WFM_LOOKUP_CONFIG_PATH not found, using defaults`],
      );
    } finally {
      logger.level = previousLevel;
      warn.mock.restore();
    }
  });

  it("stays quiet when the default config file is absent", async () => {
    const warn = mock.method(console, "warn", (..._args: unknown[]): void => {});
    try {
      await loadConfig({ cwd: tempDir, env });
      assert.equal(warn.mock.callCount(), 0);
    } finally {
      warn.mock.restore();
    }
  });

  it("applies cache and base URL environment variables", async () => {
    const cfg = await loadConfig({
      cwd: tempDir,
      env: {
        ...env,
        WFM_LOOKUP_CACHE_DIR: "/env/cache",
        WFM_LOOKUP_NO_CACHE: "1",
        WFM_LOOKUP_BASE_URL: "http://localhost:8080/v1",
      },
    });

    assert.equal(cfg.cache.dir, "/env/cache");
    assert.equal(cfg.cache.enabled, false);
    assert.equal(cfg.baseUrl, "http://localhost:8080/v1");
  });

  it("rejects an invalid WFM_LOOKUP_BASE_URL", async () => {
    await assert.rejects(
      loadConfig({ cwd: tempDir, env: { ...env, WFM_LOOKUP_BASE_URL: "not a url" } }),
      ConfigError,
    );
  });

  describe("command-line overrides", () => {
    it("win over the config file", async () => {
      await writeConfig("platform: xbox\nlanguage: de\ncache:\n  ttlOrders: 1h\n");

      const cfg = await loadConfig({
        cwd: tempDir,
        env,
        overrides: { platform: "switch", language: "fr", ttlOrders: "60s", rateLimit: 30, timeoutSeconds: 2.5 },
      });

      assert.equal(cfg.platform, "switch");
      assert.equal(cfg.language, "fr");
      assert.equal(cfg.cache.ordersTtlMs, 60_000);
      assert.equal(cfg.requestsPerMinute, 30);
      assert.equal(cfg.timeoutMs, 2500);
    });

    it("resolves a relative cache directory against cwd", async () => {
      const cfg = await loadConfig({ cwd: tempDir, env, overrides: { cacheDir: "cache" } });
      assert.equal(cfg.cache.dir, path.join(tempDir, "cache"));
    });

    it("disables the cache with noCache", async () => {
      const cfg = await loadConfig({ cwd: tempDir, env, overrides: { noCache: true } });
      assert.equal(cfg.cache.enabled, false);
    });

    it("rejects an unknown platform", async () => {
      await assert.rejects(loadConfig({ cwd: tempDir, env, overrides: { platform: "wii" } }), {
        name: "ConfigError",
        message: "argument --platform: invalid choice: 'wii' (choose from pc, ps4, switch, xbox)",
      });
    });

    it("rejects an unparseable TTL", async () => {
      await assert.rejects(loadConfig({ cwd: tempDir, env, overrides: { ttlItems: "soon" } }), {
        message: "argument --ttl-items: invalid time value: 'soon'",
      });
    });

    it("rejects a non-positive rate limit", async () => {
      await assert.rejects(loadConfig({ cwd: tempDir, env, overrides: { rateLimit: 0 } }), {
        message: "argument --rate-limit: must be a positive number, got 0",
      });
    });

    it("rejects a timeout outside the allowed range", async () => {
      await assert.rejects(loadConfig({ cwd: tempDir, env, overrides: { timeoutSeconds: 301 } }), {
        message: "argument --timeout: must be between 0 and 300 seconds",
      });
    });
  });
});
