import type { ItemDescriptor } from "../types";

/**
 * Standalone-word abbreviations accepted in item patterns, e.g.
 *   trinity p bp  -> Trinity Prime Blueprint
 *   banshee?p?set -> Banshee Prime Set
 *   brat*brl      -> Braton Prime Barrel
 */
const ABBREVIATIONS: ReadonlyArray<readonly [RegExp, string]> = [
  ["brl", "Barrel"],
  ["bld", "Blade"],
  ["bp", "Blueprint"],
  ["cara?", "Carapace"],
  ["cere?", "Cerebrum"],
  ["chas?s?", "Chassis"],
  ["gtl?t?", "Gauntlet"],
  ["hn?dl", "Handle"],
  ["neur?", "Neuroptics"],
  ["p", "Prime"],
  ["rec", "Receiver"],
  ["scul?", "Sculpture"],
  ["stk", "Stock"],
  ["str", "String"],
  ["sys", "Systems"],
].map(([word, full]) => [new RegExp(`\\b${word}\\b`, "gi"), full] as const);

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

/**
 * Translate a shell-style wildcard pattern into an anchored regular
 * expression: `*`, `?`, `[abc]`, `[a-f]` and `[!abc]`. An unclosed `[`
 * is literal.
 */
export function globToRegExp(pattern: string): RegExp {
  let out = "";
  let i = 0;
  const n = pattern.length;
  while (i < n) {
    const c = pattern[i++];
    if (c === "*") {
      out += ".*";
    } else if (c === "?") {
      out += ".";
    } else if (c === "[") {
      let j = i;
      if (j < n && pattern[j] === "!") j++;
      if (j < n && pattern[j] === "]") j++;
      while (j < n && pattern[j] !== "]") j++;
      if (j >= n) {
        out += "\\[";
        continue;
      }
      let stuff = pattern.slice(i, j).replace(/\\/g, "\\\\");
      i = j + 1;
      if (stuff.startsWith("!")) stuff = "^" + stuff.slice(1);
      else if (stuff.startsWith("^")) stuff = "\\" + stuff;
      out += `[${stuff}]`;
    } else {
      out += escapeRegExp(c);
    }
  }
  return new RegExp(`^(?:${out})$`, "is");
}

export function expandAbbreviations(pattern: string): string {
  let expanded = pattern;
  for (const [re, full] of ABBREVIATIONS) expanded = expanded.replace(re, full);
  return expanded;
}

function matchGlob(catalog: readonly ItemDescriptor[], pattern: string): ItemDescriptor[] {
  const re = globToRegExp(pattern);
  return catalog.filter((item) => re.test(item.name));
}

/**
 * Items whose name matches the pattern (case-insensitive). If nothing
 * matches, abbreviations are expanded and the match is retried.
 */
export function matchPatterns(catalog: readonly ItemDescriptor[], pattern: string): ItemDescriptor[] {
  const matches = matchGlob(catalog, pattern);
  if (matches.length > 0) return matches;
  const expanded = expandAbbreviations(pattern);
  return expanded === pattern ? [] : matchGlob(catalog, expanded);
}

export interface ExpandedPatterns {
  /** Matched items, de-duplicated, in pattern order */
  items: ItemDescriptor[];
  /** Patterns that matched nothing */
  unmatched: string[];
}

export function expandPatterns(
  catalog: readonly ItemDescriptor[],
  patterns: readonly string[],
): ExpandedPatterns {
  const seen = new Set<string>();
  const items: ItemDescriptor[] = [];
  const unmatched: string[] = [];
  for (const pattern of patterns) {
    const matches = matchPatterns(catalog, pattern);
    if (matches.length === 0) unmatched.push(pattern);
    for (const m of matches) {
      if (seen.has(m.name)) continue;
      seen.add(m.name);
      items.push(m);
    }
  }
  return { items, unmatched };
}
