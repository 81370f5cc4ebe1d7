import path from "node:path";
import { parseArgs, renderHelp } from "./args";
import { loadConfig } from "./config";
import { mergePatterns, readItemsFile, runLookup } from "./lookup";
import { createMarketResolver } from "./market/factory";
import type { LookupConfig } from "./types";
import type { FetchLike } from "./utils/http";
import { ConfigError, errorMessage } from "./utils/error";
import { levelFromVerbosity, logger } from "./utils/logger";
import { formatDuration } from "./utils/duration";

export interface CliIo {
  cwd: string;
  env: Record<string, string | undefined>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

const PROG = "wfm-lookup";

/** Run one invocation and return its exit code. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const { args, errors } = parseArgs(argv);

  if (args.help) {
    io.stdout(renderHelp());
    return 0;
  }
  if (errors.length > 0) {
    io.stderr(`usage: ${PROG} [options] [item ...]`);
    for (const e of errors) io.stderr(`${PROG}: error: ${e}`);
    return 2;
  }

  if (args.verbose > 0 || args.quiet > 0 || args.debug !== undefined) {
    logger.level = levelFromVerbosity(args.verbose, args.quiet, args.debug);
  }

  let config: LookupConfig;
  try {
    config = await loadConfig({
      cwd: io.cwd,
      env: io.env,
      overrides: {
        platform: args.platform,
        language: args.language,
        cacheDir: args.cacheDir,
        noCache: args.noCache,
        ttlItems: args.ttlItems,
        ttlOrders: args.ttlOrders,
        rateLimit: args.rateLimit,
        timeoutSeconds: args.timeoutSeconds,
      },
    });
  } catch (e) {
    if (e instanceof ConfigError) {
      io.stderr(`${PROG}: error: ${e.message}`);
      return 2;
    }
    throw e;
  }

  logger.debug(`Cache dir: ${config.cache.dir}`, {
    enabled: config.cache.enabled,
    ttlItems: formatDuration(config.cache.catalogTtlMs),
    ttlOrders: formatDuration(config.cache.ordersTtlMs),
  });

  let patterns = args.items;
  for (const file of args.files) {
    try {
      patterns = mergePatterns(patterns, await readItemsFile(path.resolve(io.cwd, file)));
    } catch (e) {
      io.stderr(`${PROG}: error: cannot read ${file}: ${errorMessage(e)}`);
      return 2;
    }
  }

  const resolver = createMarketResolver(config, { fetch: io.fetch });
  const out = await runLookup({ args, patterns, config, resolver, signal: io.signal });
  for (const line of out.lines) io.stdout(line);
  for (const line of out.errors) io.stderr(line);
  return out.exitCode;
}
