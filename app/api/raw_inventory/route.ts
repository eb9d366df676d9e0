import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { optionalNumber, readJsonBody, requireString } from "@/lib/server/body";
import { addRawItem, listRawInventory } from "@/lib/inventory/raw-inventory";

/**
 * GET /api/raw_inventory
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await listRawInventory(store) });
  } catch (error) {
    return errorResponse(error, "Raw inventory");
  }
}

/**
 * POST /api/raw_inventory
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { store } = await getServices();

    const id = await addRawItem(store, {
      name: requireString(body, "name"),
      category: requireString(body, "category"),
      subcategory: requireString(body, "subcategory"),
      unit: requireString(body, "unit"),
      unit_cost: optionalNumber(body, "unit_cost"),
      stock: optionalNumber(body, "stock"),
      threshold: optionalNumber(body, "threshold"),
    });

    return NextResponse.json({ ok: true, id });
  } catch (error) {
    return errorResponse(error, "Add raw item");
  }
}
