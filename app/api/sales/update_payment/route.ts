import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { optionalString, readJsonBody, requireString } from "@/lib/server/body";
import { updateSalePayment } from "@/lib/ledger/sales";

/**
 * POST /api/sales/update_payment
 *
 * Body: `{ id, payment_status?, payment_mode? }`. A mode only sticks when
 * the sale is Paid.
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { store } = await getServices();
    await updateSalePayment(store, {
      id: requireString(body, "id"),
      payment_status: optionalString(body, "payment_status"),
      payment_mode: optionalString(body, "payment_mode"),
    });
    return NextResponse.json({ ok: true });
  } catch (error) {
    return errorResponse(error, "Update payment");
  }
}
