import { NextResponse } from "next/server";
import { getServices } from "@/lib/server/services";
import { errorResponse } from "@/lib/server/respond";

/**
 * GET /api/config
 */
export async function GET() {
  try {
    const { config } = await getServices();
    return NextResponse.json({ full_invent: config.fullInvent });
  } catch (error) {
    return errorResponse(error, "Config");
  }
}
