/**
 * Readers for JSON request bodies. Each one pulls a field out of an
 * untyped body and throws a ValidationError naming the field when it has
 * the wrong shape.
 */

import { ValidationError } from "@/lib/errors";

export type Body = Record<string, unknown>;

export async function readJsonBody(request: Request): Promise<Body> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ValidationError("Request body must be JSON");
  }
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ValidationError("Request body must be a JSON object");
  }
  return Object.fromEntries(Object.entries(body));
}

export function requireString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== "string") throw new ValidationError(`${field} is required`, field);
  return value;
}

/** Absent or null → undefined. */
export function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ValidationError(`${field} must be a string`, field);
  return value;
}

function toNumber(value: unknown, field: string): number {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new ValidationError(`${field} must be a number`, field);
  }
  return n;
}

export function requireNumber(body: Body, field: string): number {
  if (body[field] === undefined || body[field] === null) {
    throw new ValidationError(`${field} is required`, field);
  }
  return toNumber(body[field], field);
}

export function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === "") return undefined;
  return toNumber(value, field);
}

export function optionalInteger(body: Body, field: string): number | undefined {
  const n = optionalNumber(body, field);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new ValidationError(`${field} must be a whole number`, field);
  }
  return n;
}

export function optionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ValidationError(`${field} must be true or false`, field);
  return value;
}
