import { ConfigError } from "./error";
import { logger } from "./logger";

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export interface RateLimiterOptions {
  requestsPerMinute: number;
  /** Clock in epoch ms, injectable for tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Spaces outbound requests at least 60000 / requestsPerMinute ms apart,
 * measured grant to grant.
 *
 * Callers queue on a promise chain, so concurrent acquire() calls are granted
 * one at a time in call order.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastGrant: number | undefined;
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: RateLimiterOptions) {
    const rpm = opts.requestsPerMinute;
    if (typeof rpm !== "number" || !Number.isFinite(rpm) || rpm <= 0) {
      throw new ConfigError(`Invalid rate limit: ${rpm} (requests per minute must be a positive number)`);
    }
    this.intervalMs = 60000 / rpm;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleep;
  }

  acquire(): Promise<void> {
    const grant = this.tail.then(() => this.waitTurn());
    // Keep the chain alive if a wait rejects
    this.tail = grant.catch((e: unknown) => {
      logger.debug(`Rate limiter wait failed: ${String(e)}`);
    });
    return grant;
  }

  private async waitTurn(): Promise<void> {
    if (this.lastGrant === undefined) {
      this.lastGrant = this.now();
      return;
    }

    const due = this.lastGrant + this.intervalMs;
    const waitMs = due - this.now();
    if (waitMs > 0) {
      logger.debug(`Delaying request for ${Math.round(waitMs * 10) / 10} ms`);
      await this.sleep(waitMs);
    }
    // Timers may wake early, so never record a grant before it was due
    this.lastGrant = Math.max(this.now(), due);
  }
}
