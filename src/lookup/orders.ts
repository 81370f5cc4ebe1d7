import type { Order, OrderType } from "../types";

export interface OrderFilter {
  side: OrderType;
  platform: string;
  /** Language region; orders posted in other regions are dropped */
  language: string;
}

export interface OrderSummary {
  name: string;
  min: number | null;
  avg5: number | null;
  max: number | null;
  stdev5: number | null;
  count: number;
}

/** Orders on one side of the book from users who are not offline. */
export function selectOrders(orders: readonly Order[], filter: OrderFilter): Order[] {
  return orders.filter(
    (o) =>
      o.orderType === filter.side &&
      o.onlineStatus !== "offline" &&
      o.platform === filter.platform &&
      o.region === filter.language,
  );
}

/**
 * Best price first: cheapest sellers, highest buyers. `reverse` flips the
 * direction. Orders with equal prices keep their relative order.
 */
export function sortOrders(orders: readonly Order[], side: OrderType, reverse = false): Order[] {
  const descending = (side === "buy") !== reverse;
  return [...orders].sort((a, b) =>
    descending ? b.pricePerUnit - a.pricePerUnit : a.pricePerUnit - b.pricePerUnit,
  );
}

function mean(xs: readonly number[]): number {
  return xs.reduce((s, x) => s + x, 0) / xs.length;
}

function sampleStdev(xs: readonly number[]): number {
  const m = mean(xs);
  const ss = xs.reduce((s, x) => s + (x - m) ** 2, 0);
  return Math.sqrt(ss / (xs.length - 1));
}

/**
 * Price statistics over already sorted orders. avg5 and stdev5 use the
 * first five orders only; stdev5 needs at least two.
 */
export function summarizeOrders(name: string, orders: readonly Order[]): OrderSummary {
  const count = orders.length;
  if (count === 0) return { name, min: null, avg5: null, max: null, stdev5: null, count };

  const prices = orders.map((o) => o.pricePerUnit);
  const top5 = prices.slice(0, 5);
  return {
    name,
    min: Math.min(...prices),
    avg5: Math.round(mean(top5)),
    max: Math.max(...prices),
    stdev5: count > 1 ? Math.round(sampleStdev(top5)) : null,
    count,
  };
}
