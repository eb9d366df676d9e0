import { NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { lowRawItems } from "@/lib/inventory/alerts";

/**
 * GET /api/alerts/low/raw
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await lowRawItems(store) });
  } catch (error) {
    return errorResponse(error, "Low stock alerts");
  }
}
