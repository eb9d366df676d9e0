/**
 * Point-of-sale transactions.
 *
 * A sale deducts from a ready product's quantity and appends a row to the
 * sales ledger. Products are matched by name (case-insensitive) and
 * category; a sale never creates a product and never converts units.
 */

import {
  InsufficientStockError,
  NotFoundError,
  ValidationError,
} from "@/lib/errors";
import { formatMoney, formatQty, roundQty } from "@/lib/units";
import { genId } from "@/lib/store/ids";
import { parseNumber } from "@/lib/store/cells";
import { completeRow, type ReadyProductRow, type SaleRow } from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";
import type { OrderSequence } from "@/lib/store/sequence";
import { commitWithLedger } from "@/lib/ledger/commit";
import type { PaymentStatus } from "@/lib/inventory/catalog";
import {
  ensureCategory,
  ensureIsoDate,
  ensureNonEmpty,
  ensureNonNegative,
  ensurePaymentMode,
  ensurePaymentStatus,
  ensurePositive,
  ensureUnit,
} from "@/lib/inventory/validate";

export interface SaleInput {
  category: string;
  item: string;
  unit: string;
  qty: number;
  branch?: string | null;
  /** Use this order number instead of drawing one from the sequence. */
  order_id?: number | null;
  /** Overrides the product's current price. */
  unit_price?: number | null;
  discount?: number | null;
  customer_name?: string | null;
  customer_phone?: string | null;
  table_no?: string | null;
  payment_status?: string | null;
  payment_mode?: string | null;
  payment_note?: string | null;
  date?: string | null;
  notes?: string | null;
}

export interface SaleResult {
  id: string;
  order_id: number;
  remaining_stock: number;
}

export interface SalesDeps {
  store: TableStore;
  sequence: OrderSequence;
}

/** Line total: quantity times price less discount, never below zero. */
export function saleTotal(qty: number, unitPrice: number, discount: number): number {
  return Math.max(0, qty * unitPrice - Math.max(0, discount));
}

export async function recordSale(
  { store, sequence }: SalesDeps,
  input: SaleInput,
): Promise<SaleResult> {
  const category = ensureCategory(input.category);
  const unit = ensureUnit(input.unit);
  const item = ensureNonEmpty(input.item, "item");
  const qty = ensurePositive(input.qty, "qty");
  const date = input.date ? ensureIsoDate(input.date) : null;
  const paymentStatus = ensurePaymentStatus(input.payment_status || "Live");
  const paymentMode = resolvePaymentMode(paymentStatus, input.payment_mode ?? "");
  const discount = Math.max(0, input.discount ?? 0);
  if (!Number.isFinite(discount)) {
    throw new ValidationError("discount must be a number", "discount");
  }
  if (input.unit_price != null) ensureNonNegative(input.unit_price, "unit_price");
  if (input.order_id != null && (!Number.isInteger(input.order_id) || input.order_id < 1)) {
    throw new ValidationError("order_id must be a positive integer", "order_id");
  }

  return store.transaction(["ready_products", "sales"], async (tx) => {
    const products = await tx.read("ready_products");
    const index = products.findIndex(
      (r) => r.name.trim().toLowerCase() === item.toLowerCase() && r.category === category,
    );
    if (index === -1) {
      throw new ValidationError("Ready product not found (match by name & category)", "item");
    }
    const product = products[index];

    if (unit !== product.unit) {
      throw new ValidationError(
        `Sale unit '${unit}' must match product unit '${product.unit}'`,
        "unit",
      );
    }

    const price = input.unit_price ?? parseNumber(product.price);
    const total = saleTotal(qty, price, discount);

    const available = parseNumber(product.quantity);
    if (qty > available) throw new InsufficientStockError(available, qty);

    const remaining = roundQty(available - qty);
    const next: ReadyProductRow[] = products.map((r, i) =>
      i === index ? { ...r, quantity: formatQty(remaining) } : r,
    );

    const orderId = input.order_id ?? (await sequence.next(false));

    const sale = completeRow("sales", {
      id: genId(),
      date: date ?? tx.snapshot.date,
      category,
      branch: input.branch ?? "",
      order_id: String(orderId),
      item: product.name,
      unit,
      qty: formatQty(qty),
      unit_price: formatMoney(price),
      discount: formatMoney(discount),
      total_price: formatMoney(total),
      customer_name: input.customer_name ?? "",
      customer_phone: input.customer_phone ?? "",
      table_no: input.table_no ?? "",
      payment_status: paymentStatus,
      payment_mode: paymentMode,
      payment_note: input.payment_note ?? "",
      notes: input.notes ?? "",
    });

    await commitWithLedger(tx, {
      stateTable: "ready_products",
      before: products,
      after: next,
      ledgerTable: "sales",
      entry: sale,
    });

    return { id: sale.id, order_id: orderId, remaining_stock: remaining };
  });
}

/** A payment mode only sticks to a paid sale; otherwise it is blanked. */
function resolvePaymentMode(status: PaymentStatus, mode: string): string {
  if (mode === "") return "";
  const valid = ensurePaymentMode(mode);
  return status === "Paid" ? valid : "";
}

export interface PaymentPatch {
  id: string;
  payment_status?: string | null;
  payment_mode?: string | null;
}

/**
 * Settle or reopen a sale. The status is applied first, so a patch that
 * marks a sale Paid can set its mode in the same call. A sale that ends up
 * unpaid carries no mode.
 */
export async function updateSalePayment(
  store: TableStore,
  patch: PaymentPatch,
): Promise<SaleRow> {
  return store.transaction(["sales"], async (tx) => {
    const rows = await tx.read("sales");
    const sale = rows.find((r) => r.id === patch.id);
    if (!sale) throw new NotFoundError("Sale");

    if (patch.payment_status != null) {
      sale.payment_status = ensurePaymentStatus(patch.payment_status);
    }

    if (patch.payment_mode != null) {
      const mode = patch.payment_mode;
      if (mode !== "") ensurePaymentMode(mode);
      sale.payment_mode = mode;
    }
    if (sale.payment_status !== "Paid") sale.payment_mode = "";

    await tx.write("sales", rows);
    return sale;
  });
}

export async function findSale(store: TableStore, id: string): Promise<SaleRow> {
  const sale = (await store.read("sales")).find((r) => r.id === id);
  if (!sale) throw new NotFoundError("Sale");
  return sale;
}

export async function listSales(store: TableStore): Promise<SaleRow[]> {
  return store.read("sales");
}

/**
 * Open orders per table for one branch, for the live table view.
 * Blank table numbers are grouped under "—".
 */
export async function branchTableSummary(
  store: TableStore,
  branch: string,
  status = "Live",
): Promise<{ table_no: string; open_orders: number }[]> {
  const counts = new Map<string, number>();
  for (const r of await store.read("sales")) {
    if (r.branch === branch && r.payment_status === status) {
      const table = r.table_no || "—";
      counts.set(table, (counts.get(table) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([table_no, open_orders]) => ({ table_no, open_orders }));
}
