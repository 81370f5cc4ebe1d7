import type {
  FetchRequest,
  FetchResult,
  ItemDescriptor,
  LookupError,
  OnlineStatus,
  Order,
  Platform,
} from "../types";
import { HttpError, type HttpClient } from "../utils/http";
import { errorMessage } from "../utils/error";
import { logger } from "../utils/logger";

export const DEFAULT_BASE_URL = "https://api.warframe.market/v1";

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

class DecodeError extends Error {}

/** Unwrap `{ payload: { [field]: [...] } }`, rejecting API error envelopes. */
function payloadList(body: unknown, field: string): unknown[] {
  if (!isObject(body)) throw new DecodeError("response is not a JSON object");
  if ("error" in body && body.error !== undefined && body.error !== null) {
    throw new DecodeError(`API error: ${JSON.stringify(body.error)}`);
  }
  const payload = body.payload;
  if (!isObject(payload)) throw new DecodeError("missing payload");
  const list = payload[field];
  if (!Array.isArray(list)) throw new DecodeError(`missing payload.${field}`);
  return list;
}

function str(obj: JsonObject, key: string, where: string): string {
  const v = obj[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  throw new DecodeError(`${where}: '${key}' must be a string`);
}

function num(obj: JsonObject, key: string, where: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new DecodeError(`${where}: '${key}' must be a number`);
  }
  return v;
}

function decodeItem(raw: unknown, index: number): ItemDescriptor {
  const where = `items[${index}]`;
  if (!isObject(raw)) throw new DecodeError(`${where} is not an object`);
  return {
    id: str(raw, "id", where),
    name: str(raw, "item_name", where),
    urlName: str(raw, "url_name", where),
  };
}

function onlineStatus(v: unknown): OnlineStatus {
  return v === "online" || v === "ingame" ? v : "offline";
}

function decodeOrder(raw: unknown, index: number): Order {
  const where = `orders[${index}]`;
  if (!isObject(raw)) throw new DecodeError(`${where} is not an object`);
  const user = raw.user;
  if (!isObject(user)) throw new DecodeError(`${where}: missing user`);
  const orderType = raw.order_type;
  if (orderType !== "buy" && orderType !== "sell") {
    throw new DecodeError(`${where}: unknown order_type ${JSON.stringify(orderType)}`);
  }
  return {
    userName: str(user, "ingame_name", `${where}.user`),
    platform: str(raw, "platform", where),
    region: str(raw, "region", where),
    orderType,
    pricePerUnit: num(raw, "platinum", where),
    quantity: num(raw, "quantity", where),
    onlineStatus: onlineStatus(user.status),
  };
}

export function decodeCatalog(body: unknown): ItemDescriptor[] {
  return payloadList(body, "items").map(decodeItem);
}

export function decodeOrders(body: unknown): Order[] {
  return payloadList(body, "orders").map(decodeOrder);
}

export function toLookupError(e: unknown): LookupError {
  if (e instanceof DecodeError) return { kind: "malformed-response", detail: e.message };
  if (e instanceof HttpError) {
    switch (e.kind) {
      case "status":
        return { kind: "http-status", status: e.status ?? 0, detail: e.message };
      case "malformed":
        return { kind: "malformed-response", detail: e.message };
      case "timeout":
        return { kind: "timeout", detail: e.message };
      case "aborted":
        return { kind: "aborted", detail: e.message };
      case "network":
        return { kind: "network-unreachable", detail: e.message };
    }
  }
  return { kind: "network-unreachable", detail: errorMessage(e) };
}

export interface MarketFetcherOptions {
  http: HttpClient;
  baseUrl?: string;
}

/**
 * I/O boundary to the market API: builds the request, decodes the envelope,
 * and turns every failure into a tagged result.
 */
export class MarketFetcher {
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(opts: MarketFetcherOptions) {
    this.http = opts.http;
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  urlFor(req: FetchRequest): string {
    if (req.kind === "catalog") return `${this.baseUrl}/items`;
    return `${this.baseUrl}/items/${encodeURIComponent(req.urlName)}/orders`;
  }

  fetchCatalog(platform: Platform, language: string, signal?: AbortSignal): Promise<FetchResult<ItemDescriptor[]>> {
    return this.fetch({ kind: "catalog", platform, language }, decodeCatalog, signal);
  }

  fetchOrders(
    urlName: string,
    platform: Platform,
    language: string,
    signal?: AbortSignal,
  ): Promise<FetchResult<Order[]>> {
    return this.fetch({ kind: "orders", urlName, platform, language }, decodeOrders, signal);
  }

  private async fetch<T>(
    req: FetchRequest,
    decode: (body: unknown) => T,
    signal?: AbortSignal,
  ): Promise<FetchResult<T>> {
    const url = this.urlFor(req);
    logger.debug(`Fetching ${url}`);
    try {
      const body = await this.http.getJson(url, {
        headers: { Platform: req.platform, Language: req.language },
        signal,
      });
      return { ok: true, value: decode(body) };
    } catch (e) {
      const error = toLookupError(e);
      logger.debug(`Fetch failed for ${url}`, error);
      return { ok: false, error };
    }
  }
}
