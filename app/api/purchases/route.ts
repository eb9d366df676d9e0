import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { optionalString, readJsonBody, requireNumber, requireString } from "@/lib/server/body";
import { listPurchases, receivePurchase } from "@/lib/ledger/purchases";

/**
 * GET /api/purchases
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await listPurchases(store) });
  } catch (error) {
    return errorResponse(error, "Purchases");
  }
}

/**
 * POST /api/purchases
 *
 * Receives stock into raw inventory and records the purchase. A KG purchase
 * of a GM item (or the reverse) is converted; any other unit mismatch is a
 * 400. The response's `new_stock` is in the item's stored unit.
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { store } = await getServices();

    const result = await receivePurchase(store, {
      date: optionalString(body, "date"),
      category: requireString(body, "category"),
      subcategory: requireString(body, "subcategory"),
      item: requireString(body, "item"),
      unit: requireString(body, "unit"),
      qty: requireNumber(body, "qty"),
      unit_cost: requireNumber(body, "unit_cost"),
      notes: optionalString(body, "notes"),
    });

    return NextResponse.json({ ok: true, ...result });
  } catch (error) {
    return errorResponse(error, "Purchase");
  }
}
