import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { optionalNumber, optionalString, readJsonBody, requireString } from "@/lib/server/body";
import { addReadyProduct, listReadyProducts } from "@/lib/inventory/ready-products";

/**
 * GET /api/ready_products
 *
 * Numeric columns come back as numbers; `item_code` mirrors `code`.
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await listReadyProducts(store) });
  } catch (error) {
    return errorResponse(error, "Ready products");
  }
}

/**
 * POST /api/ready_products
 *
 * Adds a product. Without an explicit `code`, one is generated from the
 * item category and name.
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { store } = await getServices();

    const { id, code } = await addReadyProduct(store, {
      name: requireString(body, "name"),
      category: requireString(body, "category"),
      unit: requireString(body, "unit"),
      unit_cost: optionalNumber(body, "unit_cost"),
      price: optionalNumber(body, "price"),
      quantity: optionalNumber(body, "quantity"),
      threshold: optionalNumber(body, "threshold"),
      item_category: optionalString(body, "item_category"),
      code: optionalString(body, "code"),
    });

    return NextResponse.json({ ok: true, id, code });
  } catch (error) {
    return errorResponse(error, "Add ready product");
  }
}
