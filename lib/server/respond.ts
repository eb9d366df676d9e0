import { NextResponse } from "next/server";
import { DomainError, ValidationError } from "@/lib/errors";

/**
 * Map an error thrown by a handler to a JSON response. Client errors carry
 * their message (and the offending field); anything unexpected is logged
 * and reported as a 500.
 */
export function errorResponse(error: unknown, context: string): NextResponse {
  if (error instanceof DomainError) {
    if (error.status >= 500) console.error(`${context} error:`, error);
    return NextResponse.json(
      {
        error: error.message,
        code: error.code,
        ...(error instanceof ValidationError && error.field ? { field: error.field } : {}),
      },
      { status: error.status },
    );
  }

  console.error(`${context} error:`, error);
  return NextResponse.json(
    { error: `${context} failed`, details: String(error) },
    { status: 500 },
  );
}
