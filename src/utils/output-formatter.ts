import type { Order, OrderType } from "../types";
import type { OrderSummary } from "../lookup/orders";

export type Align = "left" | "right";

export interface Column {
  header: string;
  align: Align;
}

type Cell = string | number | null;

const cellText = (c: Cell) => (c === null ? "N/A" : String(c));

/**
 * Borderless text table: a header row, then one row per entry, columns
 * separated by two spaces. Trailing whitespace is trimmed.
 */
export function formatTable(columns: readonly Column[], rows: readonly Cell[][]): string[] {
  const text = rows.map((r) => columns.map((_, i) => cellText(r[i] ?? null)));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...text.map((r) => r[i].length)),
  );

  const render = (cells: readonly string[]) =>
    cells
      .map((c, i) => (columns[i].align === "left" ? c.padEnd(widths[i]) : c.padStart(widths[i])))
      .join("  ")
      .trimEnd();

  return [render(columns.map((c) => c.header)), ...text.map(render)];
}

const LISTING_COLUMNS: Column[] = [
  { header: "Username", align: "left" },
  { header: "Price", align: "right" },
  { header: "Count", align: "right" },
];

const SUMMARY_COLUMNS: Column[] = [
  { header: "Item", align: "left" },
  { header: "Min", align: "right" },
  { header: "Avg5", align: "right" },
  { header: "Max", align: "right" },
  { header: "StDev5", align: "right" },
  { header: "Count", align: "right" },
];

/** Heading plus a table of one item's orders, followed by a blank line. */
export function formatOrderListing(itemName: string, side: OrderType, orders: readonly Order[]): string[] {
  const who = side === "buy" ? "Buyers" : "Sellers";
  const rows = orders.map((o) => [o.userName, o.pricePerUnit, o.quantity]);
  return [`--- ${itemName} ${who} ---`, ...formatTable(LISTING_COLUMNS, rows), ""];
}

/** One row per item, sorted by item name. */
export function formatSummary(summaries: readonly OrderSummary[]): string[] {
  const sorted = [...summaries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const rows = sorted.map((s) => [s.name, s.min, s.avg5, s.max, s.stdev5, s.count]);
  return formatTable(SUMMARY_COLUMNS, rows);
}
