import { NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";

/**
 * GET /api/sales/next_order
 *
 * Preview of the next order number. Nothing is consumed.
 */
export async function GET() {
  try {
    const { sequence } = await getServices();
    return NextResponse.json({ next_order_id: await sequence.next(true) });
  } catch (error) {
    return errorResponse(error, "Next order");
  }
}
