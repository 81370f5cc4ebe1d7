import type { LookupAction } from "./types";
import { DEFAULT_CATALOG_TTL, DEFAULT_ORDERS_TTL, DEFAULT_RATE_LIMIT } from "./config";

export interface CliArgs {
  items: string[];
  files: string[];
  action: LookupAction;
  cacheDir?: string;
  noCache: boolean;
  ttlItems?: string;
  ttlOrders?: string;
  rateLimit?: number;
  timeoutSeconds?: number;
  all: boolean;
  buyers: boolean;
  reverse: boolean;
  platform?: string;
  language?: string;
  verbose: number;
  quiet: number;
  debug?: number;
  help: boolean;
}

export interface ParsedArgs {
  args: CliArgs;
  errors: string[];
}

const ACTION_FLAGS: Record<string, LookupAction> = {
  "--clear-cache": "clear-cache",
  "-l": "list",
  "--list": "list",
  "-O": "orders",
  "--orders": "orders",
  "-s": "summary",
  "--summary": "summary",
};

export function parseArgs(argv: string[]): ParsedArgs {
  const args: CliArgs = {
    items: [],
    files: [],
    action: "orders",
    noCache: false,
    all: false,
    buyers: false,
    reverse: false,
    verbose: 0,
    quiet: 0,
    help: false,
  };
  const errors: string[] = [];
  let actionFlag: string | undefined;
  let positionalOnly = false;

  for (let i = 0; i < argv.length; i++) {
    let arg = argv[i];
    let inlineValue: string | undefined;

    if (positionalOnly || arg === "-" || !arg.startsWith("-")) {
      args.items.push(arg);
      continue;
    }
    if (arg === "--") {
      positionalOnly = true;
      continue;
    }
    if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      inlineValue = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }

    const nextValue = (flag: string): string | undefined => {
      if (inlineValue !== undefined) return inlineValue;
      if (i + 1 >= argv.length) {
        errors.push(`argument ${flag}: expected one argument`);
        return undefined;
      }
      return argv[++i];
    };

    const nextNumber = (flag: string, integer: boolean): number | undefined => {
      const value = nextValue(flag);
      if (value === undefined) return undefined;
      const n = Number(value);
      if (value.trim() === "" || !Number.isFinite(n) || (integer && !Number.isInteger(n))) {
        errors.push(`argument ${flag}: invalid ${integer ? "int" : "number"} value: '${value}'`);
        return undefined;
      }
      return n;
    };

    // Stacked counters such as -vv or -qq
    if (/^-(v+|q+)$/.test(arg)) {
      const count = arg.length - 1;
      if (arg[1] === "v") args.verbose += count;
      else args.quiet += count;
      continue;
    }

    const action = ACTION_FLAGS[arg];
    if (action !== undefined) {
      if (actionFlag !== undefined && ACTION_FLAGS[actionFlag] !== action) {
        errors.push(`argument ${arg}: not allowed with argument ${actionFlag}`);
      } else {
        actionFlag = arg;
        args.action = action;
      }
      continue;
    }

    switch (arg) {
      case "-f":
      case "--file": {
        const value = nextValue(arg);
        if (value) args.files.push(value);
        break;
      }
      case "-C":
      case "--cache-dir": {
        const value = nextValue(arg);
        if (value) args.cacheDir = value;
        break;
      }
      case "--no-cache":
        args.noCache = true;
        break;
      case "--ttl-items": {
        const value = nextValue(arg);
        if (value !== undefined) args.ttlItems = value;
        break;
      }
      case "--ttl-orders": {
        const value = nextValue(arg);
        if (value !== undefined) args.ttlOrders = value;
        break;
      }
      case "--rate-limit": {
        const value = nextNumber(arg, true);
        if (value !== undefined) args.rateLimit = value;
        break;
      }
      case "--timeout": {
        const value = nextNumber(arg, false);
        if (value !== undefined) args.timeoutSeconds = value;
        break;
      }
      case "-a":
      case "--all":
        args.all = true;
        break;
      case "-b":
      case "--buyers":
        args.buyers = true;
        break;
      case "-r":
      case "--reverse":
        args.reverse = true;
        break;
      case "-P":
      case "--platform": {
        const value = nextValue(arg);
        if (value !== undefined) args.platform = value;
        break;
      }
      case "-L":
      case "--language": {
        const value = nextValue(arg);
        if (value !== undefined) args.language = value;
        break;
      }
      case "--verbose":
        args.verbose++;
        break;
      case "--quiet":
        args.quiet++;
        break;
      case "-d":
      case "--debug": {
        const value = nextNumber(arg, true);
        if (value !== undefined) args.debug = value;
        break;
      }
      case "-h":
      case "--help":
        args.help = true;
        break;
      default:
        errors.push(`unrecognized arguments: ${arg}`);
    }
  }

  if (!args.help && args.action !== "clear-cache" && args.items.length === 0 && args.files.length === 0) {
    errors.push("-f or item arguments are required");
  }

  return { args, errors };
}

export function renderHelp(): string {
  return `wfm-lookup - Look up item prices on warframe.market

Usage:
  wfm-lookup [options] [item ...]

Items are not case-sensitive and may contain the wildcards *, ?, and []
(which behave like bash). Short words such as "p", "bp" or "neur" expand to
Prime, Blueprint and Neuroptics when a pattern matches nothing as typed.

Actions (mutually exclusive):
  --clear-cache              Delete the contents of the local disk cache
  -l, --list                 List items matching the specified name patterns
  -O, --orders               List an item's current orders (the default)
  -s, --summary              Show only a summary of the item's prices

Cache options:
  -C, --cache-dir <dir>      Directory for the local disk cache
  --no-cache                 Disable the local disk cache
  --ttl-items <ttl>          How long to cache the item list (default: ${DEFAULT_CATALOG_TTL})
  --ttl-orders <ttl>         How long to cache an item's orders (default: ${DEFAULT_ORDERS_TTL})
  --rate-limit <n>           API requests per minute (default: ${DEFAULT_RATE_LIMIT})
  --timeout <seconds>        Per-request timeout (default: 15)

Miscellaneous options:
  -a, --all                  Show all matching users (not just the top 5)
  -b, --buyers               Show only users looking to buy the item
  -f, --file <file>          Read items from a file, one per line (repeatable)
  -P, --platform <name>      pc, ps4, switch or xbox (default: pc)
  -L, --language <code>      Language code, e.g. de, en, fr, ko, ru, sv, zh (default: en)
  -r, --reverse              Reverse the sorting order
  -v, --verbose              Print more messages (repeatable)
  -q, --quiet                Print fewer messages (repeatable)
  -d, --debug <level>        Set the log level directly (0 silent .. 4 debug)
  -h, --help                 Show help

TTL values look like 1d, 24h, 1440m, 86400s or 86400 (seconds).

Examples:
  wfm-lookup "ammo drum"             Current sell prices for the Ammo Drum mod
  wfm-lookup -s -b "Ember Prime*"    Buy price summary for all Ember Prime items
  wfm-lookup -l "*rubedo*"           List items with "rubedo" in their name
  wfm-lookup -l "xiphos [!s]*"       List Xiphos parts, but not the set
`;
}
