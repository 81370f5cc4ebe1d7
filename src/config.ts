import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { DEFAULT_BASE_URL } from "./market/fetcher";
import { PLATFORMS, type LookupConfig, type Platform } from "./types";
import { parseDuration } from "./utils/duration";
import { ConfigError, errorMessage } from "./utils/error";
import { parseBoolOrFalse } from "./utils/env";
import { logger } from "./utils/logger";

/** Maximum allowed request timeout in milliseconds (5 minutes) */
const MAX_TIMEOUT_MS = 300000;
const MAX_CONCURRENCY = 16;
const CACHE_APP_NAME = "warframe-market";

export const DEFAULT_CATALOG_TTL = "1d";
export const DEFAULT_ORDERS_TTL = "10m";
export const DEFAULT_RATE_LIMIT = 180;

/** Type guard for NodeJS.ErrnoException */
function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isPlatform(v: unknown): v is Platform {
  return typeof v === "string" && (PLATFORMS as readonly string[]).includes(v);
}

/**
 * Per-user cache directory, following each OS's convention:
 * XDG_CACHE_HOME (or ~/.cache) on Linux, ~/Library/Caches on macOS,
 * %LOCALAPPDATA%\<app>\Cache on Windows.
 */
export function defaultCacheDir(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  if (platform === "win32") {
    const base = env.LOCALAPPDATA || path.join(home, "AppData", "Local");
    return path.join(base, CACHE_APP_NAME, "Cache");
  }
  if (platform === "darwin") {
    return path.join(home, "Library", "Caches", CACHE_APP_NAME);
  }
  return path.join(env.XDG_CACHE_HOME || path.join(home, ".cache"), CACHE_APP_NAME);
}

export function defaultConfig(env: Record<string, string | undefined>): LookupConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    platform: "pc",
    language: "en",
    cache: {
      enabled: true,
      dir: defaultCacheDir(env),
      catalogTtlMs: 86_400_000,
      ordersTtlMs: 600_000,
    },
    requestsPerMinute: DEFAULT_RATE_LIMIT,
    timeoutMs: 15000,
    concurrency: 4,
  };
}

/** Values given on the command line; each one wins over file and env. */
export interface ConfigOverrides {
  platform?: string;
  language?: string;
  cacheDir?: string;
  noCache?: boolean;
  ttlItems?: string;
  ttlOrders?: string;
  rateLimit?: number;
  timeoutSeconds?: number;
}

export interface LoadConfigOptions {
  cwd: string;
  env: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
}

function validBaseUrl(v: string): boolean {
  try {
    const u = new URL(v);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

async function readConfigFile(configPath: string, explicit: boolean): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (e: unknown) {
    if (isNodeError(e) && e.code === "ENOENT") {
      if (explicit) logger.warn(`Config file ${configPath} from WFM_LOOKUP_CONFIG_PATH not found, using defaults`);
      else logger.debug(`No config file found at ${configPath}, using defaults`);
      return {};
    }
    throw new ConfigError(`Failed to read config: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (e) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorMessage(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`Config file ${configPath} must contain a mapping`);
  return parsed;
}

/**
 * Merge a validated file value into the config; invalid file values are
 * logged and the previous value kept.
 */
function fromFile<T>(
  raw: Record<string, unknown>,
  key: string,
  accept: (v: unknown) => T | undefined,
  fallback: T,
): T {
  if (!(key in raw) || raw[key] === undefined) return fallback;
  const v = accept(raw[key]);
  if (v === undefined) {
    logger.warn(`Invalid config value for '${key}' ignored: ${JSON.stringify(raw[key])}`);
    return fallback;
  }
  return v;
}

const positiveNumber = (max: number) => (v: unknown) =>
  typeof v === "number" && Number.isFinite(v) && v > 0 && v <= max ? v : undefined;

const durationMs = (v: unknown) =>
  typeof v === "string" || typeof v === "number" ? parseDuration(String(v)) ?? undefined : undefined;

const nonEmptyString = (v: unknown) => (typeof v === "string" && v.trim() ? v.trim() : undefined);

/** A bad rate in the file is fatal, as it is on the command line. */
function fileRateLimit(raw: Record<string, unknown>, fallback: number): number {
  const v = raw.rateLimit;
  if (v === undefined || v === null) return fallback;
  if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) {
    throw new ConfigError(`Invalid config value for 'rateLimit': must be a positive number, got ${String(v)}`);
  }
  return v;
}

function overrideDuration(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const ms = parseDuration(value);
  if (ms === null) throw new ConfigError(`argument ${flag}: invalid time value: '${value}'`);
  return ms;
}

/**
 * Build the effective configuration: defaults, then `.wfm-lookup.yaml`
 * (or WFM_LOOKUP_CONFIG_PATH), then environment, then command-line overrides.
 */
export async function loadConfig(opts: LoadConfigOptions): Promise<LookupConfig> {
  const { env } = opts;
  const defaults = defaultConfig(env);
  const configPath = path.resolve(opts.cwd, env.WFM_LOOKUP_CONFIG_PATH || ".wfm-lookup.yaml");
  const raw = await readConfigFile(configPath, Boolean(env.WFM_LOOKUP_CONFIG_PATH));
  const rawCache = isRecord(raw.cache) ? raw.cache : {};

  const cfg: LookupConfig = {
    baseUrl: fromFile(raw, "baseUrl", (v) => (typeof v === "string" && validBaseUrl(v) ? v : undefined), defaults.baseUrl),
    platform: fromFile(raw, "platform", (v) => (isPlatform(v) ? v : undefined), defaults.platform),
    language: fromFile(raw, "language", nonEmptyString, defaults.language),
    cache: {
      enabled: fromFile(rawCache, "enabled", (v) => (typeof v === "boolean" ? v : undefined), true),
      dir: fromFile(rawCache, "dir", nonEmptyString, defaults.cache.dir),
      catalogTtlMs: fromFile(rawCache, "ttlItems", durationMs, defaults.cache.catalogTtlMs),
      ordersTtlMs: fromFile(rawCache, "ttlOrders", durationMs, defaults.cache.ordersTtlMs),
    },
    requestsPerMinute: fileRateLimit(raw, defaults.requestsPerMinute),
    timeoutMs: fromFile(raw, "timeoutMs", positiveNumber(MAX_TIMEOUT_MS), defaults.timeoutMs),
    concurrency: fromFile(
      raw,
      "concurrency",
      (v) => (typeof v === "number" && Number.isInteger(v) && v >= 1 && v <= MAX_CONCURRENCY ? v : undefined),
      defaults.concurrency,
    ),
  };

  if (env.WFM_LOOKUP_BASE_URL) {
    if (!validBaseUrl(env.WFM_LOOKUP_BASE_URL)) {
      throw new ConfigError(`Invalid WFM_LOOKUP_BASE_URL: "${env.WFM_LOOKUP_BASE_URL}"`);
    }
    cfg.baseUrl = env.WFM_LOOKUP_BASE_URL;
  }
  if (env.WFM_LOOKUP_CACHE_DIR) cfg.cache.dir = env.WFM_LOOKUP_CACHE_DIR;
  if (parseBoolOrFalse(env.WFM_LOOKUP_NO_CACHE)) cfg.cache.enabled = false;

  const o = opts.overrides ?? {};
  if (o.platform !== undefined) {
    if (!isPlatform(o.platform)) {
      throw new ConfigError(
        `argument --platform: invalid choice: '${o.platform}' (choose from ${PLATFORMS.join(", ")})`,
      );
    }
    cfg.platform = o.platform;
  }
  if (o.language !== undefined) {
    if (!o.language.trim()) throw new ConfigError("argument --language: must not be empty");
    cfg.language = o.language.trim();
  }
  if (o.cacheDir !== undefined) cfg.cache.dir = path.resolve(opts.cwd, o.cacheDir);
  if (o.noCache) cfg.cache.enabled = false;
  cfg.cache.catalogTtlMs = overrideDuration("--ttl-items", o.ttlItems, cfg.cache.catalogTtlMs);
  cfg.cache.ordersTtlMs = overrideDuration("--ttl-orders", o.ttlOrders, cfg.cache.ordersTtlMs);
  if (o.rateLimit !== undefined) {
    if (!Number.isFinite(o.rateLimit) || o.rateLimit <= 0) {
      throw new ConfigError(`argument --rate-limit: must be a positive number, got ${o.rateLimit}`);
    }
    cfg.requestsPerMinute = o.rateLimit;
  }
  if (o.timeoutSeconds !== undefined) {
    const ms = o.timeoutSeconds * 1000;
    if (!Number.isFinite(ms) || ms <= 0 || ms > MAX_TIMEOUT_MS) {
      throw new ConfigError(`argument --timeout: must be between 0 and ${MAX_TIMEOUT_MS / 1000} seconds`);
    }
    cfg.timeoutMs = ms;
  }

  return cfg;
}
