import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import {
  optionalInteger,
  optionalNumber,
  optionalString,
  readJsonBody,
  requireNumber,
  requireString,
} from "@/lib/server/body";
import { listSales, recordSale } from "@/lib/ledger/sales";

/**
 * GET /api/sales
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await listSales(store) });
  } catch (error) {
    return errorResponse(error, "Sales");
  }
}

/**
 * POST /api/sales
 *
 * Records a POS sale against a ready product (matched by name and
 * category), deducting stock. Without `order_id` the next order number is
 * drawn from the sequence.
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const services = await getServices();

    const result = await recordSale(services, {
      date: optionalString(body, "date"),
      category: requireString(body, "category"),
      branch: optionalString(body, "branch"),
      order_id: optionalInteger(body, "order_id"),
      item: requireString(body, "item"),
      unit: requireString(body, "unit"),
      qty: requireNumber(body, "qty"),
      unit_price: optionalNumber(body, "unit_price"),
      discount: optionalNumber(body, "discount"),
      customer_name: optionalString(body, "customer_name"),
      customer_phone: optionalString(body, "customer_phone"),
      table_no: optionalString(body, "table_no"),
      payment_status: optionalString(body, "payment_status"),
      payment_mode: optionalString(body, "payment_mode"),
      payment_note: optionalString(body, "payment_note"),
      notes: optionalString(body, "notes"),
    });

    return NextResponse.json({
      ok: true,
      ...result,
      bill_url: `/api/sales/${result.id}/bill`,
    });
  } catch (error) {
    return errorResponse(error, "Sale");
  }
}
