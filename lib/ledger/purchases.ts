/**
 * Receiving stock.
 *
 * A purchase adds to the matching raw inventory item (creating it on first
 * purchase) and appends an immutable row to the purchases ledger. Both
 * happen under one transaction on the two tables.
 */

import { NotFoundError, ValidationError } from "@/lib/errors";
import { convertQty, formatMoney, formatQty, roundQty } from "@/lib/units";
import { genId } from "@/lib/store/ids";
import { parseNumber } from "@/lib/store/cells";
import { completeRow, type RawInventoryRow } from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";
import { commitWithLedger } from "@/lib/ledger/commit";
import {
  ensureCategory,
  ensureIsoDate,
  ensureNonEmpty,
  ensureNonNegative,
  ensurePositive,
  ensureSubcategory,
  ensureUnit,
} from "@/lib/inventory/validate";

export interface PurchaseInput {
  category: string;
  subcategory: string;
  item: string;
  unit: string;
  qty: number;
  unit_cost: number;
  /** YYYY-MM-DD; defaults to the active snapshot's date. */
  date?: string | null;
  notes?: string | null;
}

export interface PurchaseResult {
  id: string;
  /** Stock after the purchase, in `unit`. */
  new_stock: number;
  /** The raw item's stored unit, which may differ from the purchase's. */
  unit: string;
}

export async function receivePurchase(
  store: TableStore,
  input: PurchaseInput,
): Promise<PurchaseResult> {
  const category = ensureCategory(input.category);
  const subcategory = ensureSubcategory(input.subcategory);
  const unit = ensureUnit(input.unit);
  const item = ensureNonEmpty(input.item, "item");
  const qty = ensurePositive(input.qty, "qty");
  const unitCost = ensureNonNegative(input.unit_cost, "unit_cost");
  const date = input.date ? ensureIsoDate(input.date) : null;

  return store.transaction(["raw_inventory", "purchases"], async (tx) => {
    const inventory = await tx.read("raw_inventory");

    let target = inventory.find(
      (r) =>
        r.name.trim().toLowerCase() === item.toLowerCase() &&
        r.category === category &&
        r.subcategory === subcategory,
    );
    const next: RawInventoryRow[] = inventory.map((r) => ({ ...r }));
    if (target) {
      target = next[inventory.indexOf(target)];
    } else {
      target = completeRow("raw_inventory", {
        id: genId(),
        name: item,
        category,
        subcategory,
        unit,
        unit_cost: formatMoney(unitCost),
        stock: formatQty(0),
        threshold: formatQty(0),
      });
      next.push(target);
    }

    const added = convertQty(qty, unit, target.unit);
    if (added === null) {
      throw new ValidationError(
        `Unit mismatch: cannot convert ${unit} -> ${target.unit}`,
        "unit",
      );
    }

    const stock = roundQty(parseNumber(target.stock) + added);
    target.stock = formatQty(stock);
    target.unit_cost = formatMoney(unitCost);

    const purchase = completeRow("purchases", {
      id: genId(),
      date: date ?? tx.snapshot.date,
      category,
      subcategory,
      item,
      unit,
      qty: formatQty(qty),
      unit_cost: formatMoney(unitCost),
      total_cost: formatMoney(qty * unitCost),
      notes: input.notes ?? "",
    });

    await commitWithLedger(tx, {
      stateTable: "raw_inventory",
      before: inventory,
      after: next,
      ledgerTable: "purchases",
      entry: purchase,
    });

    return { id: purchase.id, new_stock: stock, unit: target.unit };
  });
}

/** Remove a purchase row. Stock already received is not taken back. */
export async function deletePurchase(store: TableStore, id: string): Promise<void> {
  await store.transaction(["purchases"], async (tx) => {
    const rows = await tx.read("purchases");
    const kept = rows.filter((r) => r.id !== id);
    if (kept.length === rows.length) throw new NotFoundError("Purchase");
    await tx.write("purchases", kept);
  });
}

export async function listPurchases(store: TableStore) {
  return store.read("purchases");
}
