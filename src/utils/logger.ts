export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
  level: LogLevel;
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

const LEVEL_NUM: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };
const LEVELS_BY_NUM: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const formatMeta = (meta: unknown) => {
  if (meta === undefined) return "";
  try {
    return " " + JSON.stringify(meta);
  } catch {
    return " [meta:unstringifiable]";
  }
};

function isLogLevel(v: string): v is LogLevel {
  return v in LEVEL_NUM;
}

export function createLogger(level: LogLevel): Logger {
  const log: Logger = {
    level,
    debug: (msg, meta) => {
      if (should("debug")) console.log(`[wfm][debug] ${msg}${formatMeta(meta)}`);
    },
    info: (msg, meta) => {
      if (should("info")) console.log(`[wfm] ${msg}${formatMeta(meta)}`);
    },
    warn: (msg, meta) => {
      if (should("warn")) console.warn(`[wfm][warn] ${msg}${formatMeta(meta)}`);
    },
    error: (msg, meta) => {
      if (should("error")) console.error(`[wfm][error] ${msg}${formatMeta(meta)}`);
    },
  };
  // Read level on every call so the CLI can adjust the shared logger after import
  const should = (l: LogLevel) => LEVEL_NUM[l] <= LEVEL_NUM[log.level];
  return log;
}

export function envLogLevel(env: Record<string, string | undefined>): LogLevel {
  const v = (env.WFM_LOOKUP_LOG_LEVEL || env.LOG_LEVEL || "").toLowerCase();
  return isLogLevel(v) ? v : "warn";
}

/**
 * Map -v/-q counts (or an explicit -d level) onto a log level.
 * warn is the baseline; each -v raises it one step, each -q lowers it.
 */
export function levelFromVerbosity(verbose: number, quiet: number, debug?: number): LogLevel {
  const base = LEVEL_NUM.warn;
  const n = debug !== undefined ? debug : base + verbose - quiet;
  const clamped = Math.max(0, Math.min(LEVELS_BY_NUM.length - 1, n));
  return LEVELS_BY_NUM[clamped] ?? "warn";
}

export const logger: Logger = createLogger(envLogLevel(process.env));
