import fs from "node:fs/promises";
import type { CliArgs } from "./args";
import { expandPatterns } from "./lookup/matching";
import { selectOrders, sortOrders, summarizeOrders, type OrderSummary } from "./lookup/orders";
import type { MarketResolver } from "./market/resolver";
import type { LookupConfig, OrderType } from "./types";
import { describeLookupError } from "./utils/error";
import { logger } from "./utils/logger";
import { formatOrderListing, formatSummary } from "./utils/output-formatter";

/** Orders shown per item unless --all is given */
const TOP_ORDERS = 5;

export interface RunLookupInput {
  args: Pick<CliArgs, "action" | "all" | "buyers" | "reverse">;
  /** Item patterns, already merged from arguments and files */
  patterns: string[];
  config: LookupConfig;
  resolver: MarketResolver;
  signal?: AbortSignal;
}

export interface RunLookupOutput {
  /** Lines for stdout */
  lines: string[];
  /** Lines for stderr */
  errors: string[];
  exitCode: number;
}

/** Read item patterns from a file, one per line; blank lines are skipped. */
export async function readItemsFile(file: string): Promise<string[]> {
  const text = await fs.readFile(file, "utf-8");
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
}

/** Append patterns not already present, keeping first-seen order. */
export function mergePatterns(base: readonly string[], extra: readonly string[]): string[] {
  const out = [...base];
  for (const p of extra) if (!out.includes(p)) out.push(p);
  return out;
}

export async function runLookup(input: RunLookupInput): Promise<RunLookupOutput> {
  const { args, config, resolver, signal } = input;
  const lines: string[] = [];
  const errors: string[] = [];

  if (args.action === "clear-cache") {
    logger.info(`Clearing cache dir ${config.cache.dir}`);
    const cleared = await resolver.clearCache();
    if (!cleared.ok) {
      errors.push(`Error: could not clear cache: ${describeLookupError(cleared.error)}`);
      return { lines, errors, exitCode: 1 };
    }
    return { lines, errors, exitCode: 0 };
  }

  const catalog = await resolver.resolveCatalog(
    config.platform,
    config.language,
    config.cache.catalogTtlMs,
    signal,
  );
  if (!catalog.ok) {
    errors.push(`Error: could not retrieve all items: ${describeLookupError(catalog.error)}`);
    return { lines, errors, exitCode: 1 };
  }

  const { items, unmatched } = expandPatterns(catalog.value, input.patterns);
  let exitCode = unmatched.length > 0 ? 1 : 0;

  if (args.action === "list") {
    const names = items.map((i) => i.name).sort();
    if (args.reverse) names.reverse();
    for (const pattern of unmatched) logger.warn(`'${pattern}' matched no items`);
    return { lines: names, errors, exitCode };
  }

  if (unmatched.length > 0) {
    errors.push(`Error: '${unmatched[0]}' not found`);
    return { lines, errors, exitCode: 1 };
  }

  const side: OrderType = args.buyers ? "buy" : "sell";
  const batch = await resolver.resolveOrdersBatch(
    items,
    config.platform,
    config.language,
    config.cache.ordersTtlMs,
    { concurrency: config.concurrency, signal },
  );

  const summaries: OrderSummary[] = [];
  for (const { item, result } of batch) {
    if (!result.ok) {
      errors.push(`Error: orders for '${item.name}': ${describeLookupError(result.error)}`);
      exitCode = 1;
      continue;
    }

    const selected = selectOrders(result.value, {
      side,
      platform: config.platform,
      language: config.language,
    });
    const sorted = sortOrders(selected, side, args.reverse);

    if (args.action === "summary") {
      summaries.push(summarizeOrders(item.name, sorted));
    } else {
      lines.push(...formatOrderListing(item.name, side, args.all ? sorted : sorted.slice(0, TOP_ORDERS)));
    }
  }

  if (args.action === "summary") lines.push(...formatSummary(summaries));

  return { lines, errors, exitCode };
}
