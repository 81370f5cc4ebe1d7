import type { CacheStore } from "../cache/types";
import { entryAgeMs, isFresh } from "../cache/ttl";
import type { FetchResult, ItemDescriptor, Order, Platform, Result } from "../types";
import { processWithConcurrency } from "../utils/concurrency";
import { errorMessage } from "../utils/error";
import { logger } from "../utils/logger";
import type { RateLimiter } from "../utils/rate-limiter";
import { catalogKey, ordersKey, type Fetcher } from "./connector";
import { isItemList, isOrderList } from "./guards";

export interface MarketResolverOptions {
  cache: CacheStore<unknown>;
  limiter: Pick<RateLimiter, "acquire">;
  fetcher: Fetcher;
  /** Clock in epoch ms, injectable for tests */
  now?: () => number;
}

export interface BatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface ItemOrdersResult {
  item: ItemDescriptor;
  result: Result<Order[]>;
}

interface ResolveRequest<T> {
  key: string;
  desc: string;
  ttlMs: number;
  isValid: (v: unknown) => v is T;
  fetch: () => Promise<FetchResult<T>>;
  signal?: AbortSignal;
}

const byName = (a: ItemDescriptor, b: ItemDescriptor) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Cache-first access to the market API.
 *
 * A fresh cache entry is returned as is. Anything else costs one rate-limited
 * fetch whose result overwrites the entry. A failed fetch is returned as the
 * failure even when an expired entry exists.
 */
export class MarketResolver {
  private readonly cache: CacheStore<unknown>;
  private readonly limiter: Pick<RateLimiter, "acquire">;
  private readonly fetcher: Fetcher;
  private readonly now: () => number;

  constructor(opts: MarketResolverOptions) {
    this.cache = opts.cache;
    this.limiter = opts.limiter;
    this.fetcher = opts.fetcher;
    this.now = opts.now ?? Date.now;
  }

  /** The full catalog for a platform/language pair, sorted by item name. */
  async resolveCatalog(
    platform: Platform,
    language: string,
    ttlMs: number,
    signal?: AbortSignal,
  ): Promise<Result<ItemDescriptor[]>> {
    const result = await this.resolve({
      key: catalogKey(platform, language),
      desc: "all items",
      ttlMs,
      isValid: isItemList,
      fetch: () => this.fetcher.fetchCatalog(platform, language, signal),
      signal,
    });
    if (!result.ok) return result;
    return { ok: true, value: [...result.value].sort(byName) };
  }

  /** Open orders for one item, in the order the API listed them. */
  resolveOrders(
    item: ItemDescriptor,
    platform: Platform,
    language: string,
    ttlMs: number,
    signal?: AbortSignal,
  ): Promise<Result<Order[]>> {
    return this.resolve({
      key: ordersKey(item.urlName, platform, language),
      desc: `orders for '${item.name}'`,
      ttlMs,
      isValid: isOrderList,
      fetch: () => this.fetcher.fetchOrders(item.urlName, platform, language, signal),
      signal,
    });
  }

  /**
   * Resolve orders for several items at once. Fetches may run concurrently
   * (all through the shared limiter); results come back in input order.
   */
  async resolveOrdersBatch(
    items: readonly ItemDescriptor[],
    platform: Platform,
    language: string,
    ttlMs: number,
    opts: BatchOptions = {},
  ): Promise<ItemOrdersResult[]> {
    return processWithConcurrency(items, opts.concurrency ?? 4, async (item) => ({
      item,
      result: await this.resolveOrders(item, platform, language, ttlMs, opts.signal),
    }));
  }

  async clearCache(): Promise<Result<void>> {
    try {
      await this.cache.clear();
      return { ok: true, value: undefined };
    } catch (e) {
      logger.error(`Failed to clear cache: ${errorMessage(e)}`);
      return { ok: false, error: { kind: "cache-io", detail: errorMessage(e) } };
    }
  }

  private async readCache(key: string): Promise<{ value: unknown; storedAt: number } | null> {
    try {
      return await this.cache.get(key);
    } catch (e) {
      logger.warn(`Cache read failed for ${key}, treating as miss: ${errorMessage(e)}`);
      return null;
    }
  }

  private async resolve<T>(req: ResolveRequest<T>): Promise<Result<T>> {
    const { key, desc, ttlMs, signal } = req;

    const cached = await this.readCache(key);
    if (cached && isFresh(cached, ttlMs, this.now())) {
      if (req.isValid(cached.value)) {
        logger.info(`Loading ${desc} from cache`);
        return { ok: true, value: cached.value };
      }
      logger.warn(`Cached ${desc} has an unexpected shape, refetching`);
    } else if (cached) {
      logger.debug(`Cached ${desc} expired (${Math.round(entryAgeMs(cached, this.now()) / 1000)}s old)`);
    }

    if (signal?.aborted) {
      return { ok: false, error: { kind: "aborted", detail: `lookup of ${desc} cancelled` } };
    }

    await this.limiter.acquire();
    logger.info(`Fetching ${desc}`);
    const result = await req.fetch();
    if (!result.ok) return result;

    // Never persist a response that arrived after cancellation
    if (signal?.aborted) {
      return { ok: false, error: { kind: "aborted", detail: `lookup of ${desc} cancelled` } };
    }

    try {
      await this.cache.put(key, result.value, this.now());
      logger.debug(`Updated ${desc} cache`);
    } catch (e) {
      logger.warn(`Could not cache ${desc}: ${errorMessage(e)}`);
    }
    return result;
  }
}
