import type { ItemDescriptor, Order } from "../types";

// Shape checks for values read back from the cache, which may have been
// written by another version of this tool or edited by hand.

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function isItemDescriptor(v: unknown): v is ItemDescriptor {
  return (
    isRecord(v) &&
    typeof v.id === "string" &&
    typeof v.name === "string" &&
    typeof v.urlName === "string"
  );
}

export function isOrder(v: unknown): v is Order {
  return (
    isRecord(v) &&
    typeof v.userName === "string" &&
    typeof v.platform === "string" &&
    typeof v.region === "string" &&
    (v.orderType === "buy" || v.orderType === "sell") &&
    typeof v.pricePerUnit === "number" &&
    typeof v.quantity === "number" &&
    (v.onlineStatus === "online" || v.onlineStatus === "ingame" || v.onlineStatus === "offline")
  );
}

export function isItemList(v: unknown): v is ItemDescriptor[] {
  return Array.isArray(v) && v.every(isItemDescriptor);
}

export function isOrderList(v: unknown): v is Order[] {
  return Array.isArray(v) && v.every(isOrder);
}
