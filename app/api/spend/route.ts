import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { spendReport } from "@/lib/reports/summaries";

/**
 * GET /api/spend?period=last30&category=&item=&start=&end=
 *
 * Purchase spend over a period, with per-category and per-item totals.
 */
export async function GET(request: NextRequest) {
  try {
    const params = request.nextUrl.searchParams;
    const { store, today } = await getServices();

    const report = await spendReport(
      store,
      {
        period: params.get("period") || "last30",
        category: params.get("category"),
        item: params.get("item"),
        start: params.get("start"),
        end: params.get("end"),
      },
      today(),
    );

    return NextResponse.json(report);
  } catch (error) {
    return errorResponse(error, "Spend report");
  }
}
