import { NextRequest, NextResponse } from "next/server";
import { ValidationError } from "@/lib/errors";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { branchTableSummary } from "@/lib/ledger/sales";

/**
 * GET /api/branch_tables?branch=...&status=Live
 *
 * Open order count per table for one branch.
 */
export async function GET(request: NextRequest) {
  try {
    const params = request.nextUrl.searchParams;
    const branch = params.get("branch");
    if (!branch) throw new ValidationError("branch is required", "branch");

    const { store } = await getServices();
    const rows = await branchTableSummary(store, branch, params.get("status") || "Live");
    return NextResponse.json({ rows });
  } catch (error) {
    return errorResponse(error, "Branch tables");
  }
}
