import { parseNumber } from "@/lib/store/cells";
import type { TableStore } from "@/lib/store/table-store";
import type { RawInventoryRow, ReadyProductRow } from "@/lib/store/schema";

/** An item is low once its level is at or below a positive threshold. */
export function isLow(level: string, threshold: string): boolean {
  const t = parseNumber(threshold);
  return t > 0 && parseNumber(level) <= t;
}

export async function lowReadyProducts(store: TableStore): Promise<ReadyProductRow[]> {
  return (await store.read("ready_products")).filter((r) => isLow(r.quantity, r.threshold));
}

export async function lowRawItems(store: TableStore): Promise<RawInventoryRow[]> {
  return (await store.read("raw_inventory")).filter((r) => isLow(r.stock, r.threshold));
}
