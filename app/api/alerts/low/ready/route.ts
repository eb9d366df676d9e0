import { NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { lowReadyProducts } from "@/lib/inventory/alerts";

/**
 * GET /api/alerts/low/ready
 *
 * Ready products at or below their (positive) threshold.
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await lowReadyProducts(store) });
  } catch (error) {
    return errorResponse(error, "Low stock alerts");
  }
}
