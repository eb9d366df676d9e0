/**
 * Raw materials. Stock normally grows through purchases; these calls cover
 * manual setup and corrections.
 */

import { NotFoundError } from "@/lib/errors";
import { formatMoney, formatQty } from "@/lib/units";
import { genId } from "@/lib/store/ids";
import { parseNumber } from "@/lib/store/cells";
import { completeRow, type RawInventoryRow } from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";
import {
  ensureCategory,
  ensureNonEmpty,
  ensureNonNegative,
  ensureSubcategory,
  ensureUnit,
} from "@/lib/inventory/validate";

export interface RawItemInput {
  name: string;
  category: string;
  subcategory: string;
  unit: string;
  unit_cost?: number;
  stock?: number;
  threshold?: number;
}

export type RawItemPatch = Partial<RawItemInput>;

export interface RawItemView {
  id: string;
  name: string;
  category: string;
  subcategory: string;
  unit: string;
  unit_cost: number;
  stock: number;
  threshold: number;
}

export function toRawItemView(row: RawInventoryRow): RawItemView {
  return {
    ...row,
    unit_cost: parseNumber(row.unit_cost),
    stock: parseNumber(row.stock),
    threshold: parseNumber(row.threshold),
  };
}

export async function listRawInventory(store: TableStore): Promise<RawItemView[]> {
  return (await store.read("raw_inventory")).map(toRawItemView);
}

export async function addRawItem(store: TableStore, input: RawItemInput): Promise<string> {
  const row = completeRow("raw_inventory", {
    id: genId(),
    name: ensureNonEmpty(input.name, "name"),
    category: ensureCategory(input.category),
    subcategory: ensureSubcategory(input.subcategory),
    unit: ensureUnit(input.unit),
    unit_cost: formatMoney(ensureNonNegative(input.unit_cost ?? 0, "unit_cost")),
    stock: formatQty(ensureNonNegative(input.stock ?? 0, "stock")),
    threshold: formatQty(ensureNonNegative(input.threshold ?? 0, "threshold")),
  });
  await store.append("raw_inventory", row);
  return row.id;
}

export async function updateRawItem(
  store: TableStore,
  id: string,
  patch: RawItemPatch,
): Promise<RawInventoryRow> {
  return store.transaction(["raw_inventory"], async (tx) => {
    const rows = await tx.read("raw_inventory");
    const row = rows.find((r) => r.id === id);
    if (!row) throw new NotFoundError("Raw item");

    if (patch.name !== undefined) row.name = ensureNonEmpty(patch.name, "name");
    if (patch.category !== undefined) row.category = ensureCategory(patch.category);
    if (patch.subcategory !== undefined) {
      row.subcategory = ensureSubcategory(patch.subcategory);
    }
    if (patch.unit !== undefined) row.unit = ensureUnit(patch.unit);
    if (patch.unit_cost !== undefined) {
      row.unit_cost = formatMoney(ensureNonNegative(patch.unit_cost, "unit_cost"));
    }
    if (patch.stock !== undefined) {
      row.stock = formatQty(ensureNonNegative(patch.stock, "stock"));
    }
    if (patch.threshold !== undefined) {
      row.threshold = formatQty(ensureNonNegative(patch.threshold, "threshold"));
    }

    await tx.write("raw_inventory", rows);
    return row;
  });
}

export async function deleteRawItem(store: TableStore, id: string): Promise<void> {
  await store.transaction(["raw_inventory"], async (tx) => {
    const rows = await tx.read("raw_inventory");
    const kept = rows.filter((r) => r.id !== id);
    if (kept.length === rows.length) throw new NotFoundError("Raw item");
    await tx.write("raw_inventory", kept);
  });
}
