import type { FetchResult, ItemDescriptor, Order, Platform } from "../types";

/** What the resolver needs from the network side. MarketFetcher is the real one. */
export interface Fetcher {
  fetchCatalog(platform: Platform, language: string, signal?: AbortSignal): Promise<FetchResult<ItemDescriptor[]>>;
  fetchOrders(
    urlName: string,
    platform: Platform,
    language: string,
    signal?: AbortSignal,
  ): Promise<FetchResult<Order[]>>;
}

export function catalogKey(platform: Platform, language: string): string {
  return `catalog:${platform}:${language}`;
}

export function ordersKey(urlName: string, platform: Platform, language: string): string {
  return `orders:${urlName}:${platform}:${language}`;
}
