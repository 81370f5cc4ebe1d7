import { DisabledCache } from "../cache/disabled-cache";
import { FileCache } from "../cache/file-cache";
import type { CacheStore } from "../cache/types";
import type { CacheConfig, LookupConfig } from "../types";
import { HttpClient, type FetchLike } from "../utils/http";
import { RateLimiter } from "../utils/rate-limiter";
import { MarketFetcher } from "./fetcher";
import { MarketResolver } from "./resolver";

const USER_AGENT = "wfm-lookup";

/**
 * Disk cache, or the null cache when caching is switched off. The null cache
 * still clears the disk cache at the same root.
 */
export function createCacheStore(cfg: CacheConfig): CacheStore<unknown> {
  const disk = new FileCache({ dir: cfg.dir });
  return cfg.enabled ? disk : new DisabledCache(disk);
}

export function createHttpClient(cfg: LookupConfig, fetch?: FetchLike): HttpClient {
  return new HttpClient({ timeoutMs: cfg.timeoutMs, userAgent: USER_AGENT, fetch });
}

export interface ResolverDeps {
  fetch?: FetchLike;
  cache?: CacheStore<unknown>;
}

/** Wire cache, limiter and fetcher for one invocation. */
export function createMarketResolver(cfg: LookupConfig, deps: ResolverDeps = {}): MarketResolver {
  return new MarketResolver({
    cache: deps.cache ?? createCacheStore(cfg.cache),
    limiter: new RateLimiter({ requestsPerMinute: cfg.requestsPerMinute }),
    fetcher: new MarketFetcher({ http: createHttpClient(cfg, deps.fetch), baseUrl: cfg.baseUrl }),
  });
}
