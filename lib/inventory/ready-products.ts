/**
 * Ready product catalog: finished goods with a live quantity, a sale price
 * and an optional short code.
 */

import { NotFoundError, ValidationError } from "@/lib/errors";
import { formatMoney, formatQty, roundQty } from "@/lib/units";
import { genId } from "@/lib/store/ids";
import { parseNumber } from "@/lib/store/cells";
import { completeRow, type ReadyProductRow } from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";
import { assignCode, ensureCodeAvailable, normalizeCode } from "@/lib/inventory/codes";
import {
  ensureCategory,
  ensureNonEmpty,
  ensureNonNegative,
  ensureUnit,
} from "@/lib/inventory/validate";

export interface ReadyProductInput {
  name: string;
  category: string;
  unit: string;
  unit_cost?: number;
  price?: number;
  quantity?: number;
  threshold?: number;
  item_category?: string;
  /** Explicit code; generated when blank. */
  code?: string;
}

export type ReadyProductPatch = Partial<ReadyProductInput>;

export interface ReadyProductView {
  id: string;
  name: string;
  category: string;
  item_category: string;
  code: string;
  /** Same as `code`; the POS screens read this name. */
  item_code: string;
  unit: string;
  unit_cost: number;
  price: number;
  quantity: number;
  threshold: number;
}

export function toReadyProductView(row: ReadyProductRow): ReadyProductView {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    item_category: row.item_category,
    code: row.code,
    item_code: row.code,
    unit: row.unit,
    unit_cost: parseNumber(row.unit_cost),
    price: parseNumber(row.price),
    quantity: parseNumber(row.quantity),
    threshold: parseNumber(row.threshold),
  };
}

export async function listReadyProducts(store: TableStore): Promise<ReadyProductView[]> {
  return (await store.read("ready_products")).map(toReadyProductView);
}

export async function addReadyProduct(
  store: TableStore,
  input: ReadyProductInput,
): Promise<{ id: string; code: string }> {
  const name = ensureNonEmpty(input.name, "name");
  const category = ensureCategory(input.category);
  const unit = ensureUnit(input.unit);
  const itemCategory = (input.item_category ?? "").trim();

  return store.transaction(["ready_products"], async (tx) => {
    const rows = await tx.read("ready_products");

    let code = normalizeCode(input.code ?? "");
    if (code) {
      ensureCodeAvailable(code, rows);
    } else {
      code = assignCode(name, itemCategory, rows.map((r) => r.code));
    }

    const row = completeRow("ready_products", {
      id: genId(),
      name,
      category,
      item_category: itemCategory,
      code,
      unit,
      unit_cost: formatMoney(ensureNonNegative(input.unit_cost ?? 0, "unit_cost")),
      price: formatMoney(ensureNonNegative(input.price ?? 0, "price")),
      quantity: formatQty(ensureNonNegative(input.quantity ?? 0, "quantity")),
      threshold: formatQty(ensureNonNegative(input.threshold ?? 0, "threshold")),
    });

    await tx.write("ready_products", [...rows, row]);
    return { id: row.id, code };
  });
}

/**
 * Apply a partial update. A blank `code` clears it; a new code must be free
 * among the other products.
 */
export async function updateReadyProduct(
  store: TableStore,
  id: string,
  patch: ReadyProductPatch,
): Promise<ReadyProductRow> {
  return store.transaction(["ready_products"], async (tx) => {
    const rows = await tx.read("ready_products");
    const row = rows.find((r) => r.id === id);
    if (!row) throw new NotFoundError("Ready product");

    if (patch.name !== undefined) row.name = ensureNonEmpty(patch.name, "name");
    if (patch.category !== undefined) row.category = ensureCategory(patch.category);
    if (patch.unit !== undefined) row.unit = ensureUnit(patch.unit);
    if (patch.item_category !== undefined) row.item_category = patch.item_category.trim();
    if (patch.unit_cost !== undefined) {
      row.unit_cost = formatMoney(ensureNonNegative(patch.unit_cost, "unit_cost"));
    }
    if (patch.price !== undefined) {
      row.price = formatMoney(ensureNonNegative(patch.price, "price"));
    }
    if (patch.quantity !== undefined) {
      row.quantity = formatQty(ensureNonNegative(patch.quantity, "quantity"));
    }
    if (patch.threshold !== undefined) {
      row.threshold = formatQty(ensureNonNegative(patch.threshold, "threshold"));
    }
    if (patch.code !== undefined) {
      const code = normalizeCode(patch.code);
      if (code) ensureCodeAvailable(code, rows, id);
      row.code = code;
    }

    await tx.write("ready_products", rows);
    return row;
  });
}

export async function deleteReadyProduct(store: TableStore, id: string): Promise<void> {
  await store.transaction(["ready_products"], async (tx) => {
    const rows = await tx.read("ready_products");
    const kept = rows.filter((r) => r.id !== id);
    if (kept.length === rows.length) throw new NotFoundError("Ready product");
    await tx.write("ready_products", kept);
  });
}

/** Manual stock correction by a signed delta. */
export async function adjustReadyStock(
  store: TableStore,
  id: string,
  delta: number,
): Promise<number> {
  if (!Number.isFinite(delta)) {
    throw new ValidationError("delta must be a number", "delta");
  }

  return store.transaction(["ready_products"], async (tx) => {
    const rows = await tx.read("ready_products");
    const row = rows.find((r) => r.id === id);
    if (!row) throw new NotFoundError("Ready product");

    const quantity = roundQty(parseNumber(row.quantity) + delta);
    if (quantity < 0) {
      throw new ValidationError("Resulting stock would be negative", "delta");
    }
    row.quantity = formatQty(quantity);

    await tx.write("ready_products", rows);
    return quantity;
  });
}
