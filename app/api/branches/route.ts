import { NextRequest, NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { optionalBoolean, readJsonBody, requireString } from "@/lib/server/body";
import { addBranch, listBranches } from "@/lib/inventory/branches";

/**
 * GET /api/branches
 */
export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json({ rows: await listBranches(store) });
  } catch (error) {
    return errorResponse(error, "Branches");
  }
}

/**
 * POST /api/branches
 *
 * Idempotent by name (case-insensitive): an existing branch's id is returned.
 */
export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { store } = await getServices();
    const { id } = await addBranch(store, {
      name: requireString(body, "name"),
      is_active: optionalBoolean(body, "is_active"),
    });
    return NextResponse.json({ ok: true, id });
  } catch (error) {
    return errorResponse(error, "Add branch");
  }
}
