export * from "./types";
export { runCli } from "./app";
export { parseArgs, renderHelp, type CliArgs } from "./args";
export { loadConfig, defaultCacheDir, type ConfigOverrides } from "./config";
export { runLookup, type RunLookupInput, type RunLookupOutput } from "./lookup";
export { matchPatterns, expandPatterns } from "./lookup/matching";
export { selectOrders, sortOrders, summarizeOrders, type OrderSummary } from "./lookup/orders";
export { MarketResolver, type ItemOrdersResult } from "./market/resolver";
export { MarketFetcher, DEFAULT_BASE_URL } from "./market/fetcher";
export type { Fetcher } from "./market/connector";
export { createMarketResolver, createCacheStore } from "./market/factory";
export type { CacheEntry, CacheStore } from "./cache/types";
export { FileCache } from "./cache/file-cache";
export { MemoryCache } from "./cache/memory-cache";
export { DisabledCache } from "./cache/disabled-cache";
export { isFresh } from "./cache/ttl";
export { RateLimiter } from "./utils/rate-limiter";
export { HttpClient, HttpError } from "./utils/http";
export { ConfigError, CacheIoError } from "./utils/error";
