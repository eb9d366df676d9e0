import { NextRequest, NextResponse } from "next/server";
import { ValidationError } from "@/lib/errors";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";
import { importTable } from "@/lib/store/import-export";

/**
 * POST /import
 *
 * Multipart form: `kind` (table name) and `file` (CSV whose header matches
 * the table's columns exactly). Replaces the table in today's snapshot.
 */
export async function POST(request: NextRequest) {
  try {
    const form = await request.formData();
    const kind = form.get("kind");
    const file = form.get("file");

    if (typeof kind !== "string") throw new ValidationError("kind is required", "kind");
    if (!(file instanceof Blob)) throw new ValidationError("No file provided", "file");

    const { store } = await getServices();
    const result = await importTable(store, kind, await file.text());
    return NextResponse.json({ ok: true, ...result });
  } catch (error) {
    return errorResponse(error, "Import");
  }
}
