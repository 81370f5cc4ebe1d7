import type { LookupError } from "../types";

/**
 * Extract error message from unknown error type.
 * Common pattern for catch blocks.
 */
export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/** Invalid configuration, raised at startup before any request is made. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CacheIoError extends Error {
  readonly key: string;

  constructor(message: string, key: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheIoError";
    this.key = key;
  }
}

export function describeLookupError(err: LookupError): string {
  switch (err.kind) {
    case "network-unreachable":
      return `network unreachable: ${err.detail}`;
    case "http-status":
      return `HTTP ${err.status}: ${err.detail}`;
    case "malformed-response":
      return `malformed response: ${err.detail}`;
    case "timeout":
      return `timed out: ${err.detail}`;
    case "aborted":
      return `aborted: ${err.detail}`;
    case "cache-io":
      return `cache error: ${err.detail}`;
  }
}
