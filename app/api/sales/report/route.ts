import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { salesReport } from "@/lib/reports/summaries";

/**
 * GET /api/sales/report?period=&category=&item=&branch=&payment_status=&start=&end=
 */
export async function GET(request: NextRequest) {
  try {
    const params = request.nextUrl.searchParams;
    const { store, today } = await getServices();

    const report = await salesReport(
      store,
      {
        period: params.get("period") || "last30",
        category: params.get("category"),
        item: params.get("item"),
        branch: params.get("branch"),
        payment_status: params.get("payment_status"),
        start: params.get("start"),
        end: params.get("end"),
      },
      today(),
    );

    return NextResponse.json(report);
  } catch (error) {
    return errorResponse(error, "Sales report");
  }
}
