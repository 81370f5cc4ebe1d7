export type Platform = "pc" | "ps4" | "switch" | "xbox";
export type OrderType = "buy" | "sell";
export type OnlineStatus = "online" | "ingame" | "offline";
export type LookupAction = "list" | "orders" | "summary" | "clear-cache";

export const PLATFORMS: readonly Platform[] = ["pc", "ps4", "switch", "xbox"];

/** A tradeable item as listed in the catalog */
export interface ItemDescriptor {
  id: string;
  name: string;
  /** Slug used in order URLs, e.g. "ember_prime_set" */
  urlName: string;
}

export interface Order {
  userName: string;
  platform: string;
  /** Language region the order was posted in */
  region: string;
  orderType: OrderType;
  pricePerUnit: number;
  quantity: number;
  onlineStatus: OnlineStatus;
}

export type FetchRequest =
  | { readonly kind: "catalog"; readonly platform: Platform; readonly language: string }
  | {
      readonly kind: "orders";
      readonly urlName: string;
      readonly platform: Platform;
      readonly language: string;
    };

export type LookupError =
  | { kind: "network-unreachable"; detail: string }
  | { kind: "http-status"; status: number; detail: string }
  | { kind: "malformed-response"; detail: string }
  | { kind: "timeout"; detail: string }
  | { kind: "aborted"; detail: string }
  | { kind: "cache-io"; detail: string };

export type Result<T, E = LookupError> = { ok: true; value: T } | { ok: false; error: E };

export type FetchResult<T> = Result<T>;

export interface CacheConfig {
  enabled: boolean;
  dir: string;
  /** Catalog validity window in milliseconds */
  catalogTtlMs: number;
  /** Order book validity window in milliseconds */
  ordersTtlMs: number;
}

export interface LookupConfig {
  baseUrl: string;
  platform: Platform;
  language: string;
  cache: CacheConfig;
  requestsPerMinute: number;
  timeoutMs: number;
  /** Max order fetches in flight at once; the rate limiter still paces them */
  concurrency: number;
}
