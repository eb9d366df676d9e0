/**
 * Domain errors raised by the store and ledger layers.
 *
 * Route handlers turn these into JSON responses with `errorResponse()`;
 * anything that is not a DomainError is treated as an unexpected 500.
 */

export type ErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "CODE_EXHAUSTED"
  | "STORAGE"
  | "CONSISTENCY";

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Client-caused: bad enum value, malformed code, unit mismatch, etc. */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "VALIDATION", 400);
  }
}

export class InsufficientStockError extends ValidationError {
  constructor(
    public readonly available: number,
    public readonly requested: number,
  ) {
    super(`Not enough stock. Available: ${available}`, "qty");
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string) {
    super(`${entity} not found`, "NOT_FOUND", 404);
  }
}

export class CodeSpaceExhaustedError extends DomainError {
  constructor(prefix: string) {
    super(
      `No free product code left for prefix '${prefix}'; supply a code explicitly`,
      "CODE_EXHAUSTED",
      409,
    );
  }
}

/** Filesystem failure while resolving a snapshot or reading/writing a table. */
export class StorageError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE", 500, { cause });
  }
}

/** A write could not be applied or undone without leaving tables out of step. */
export class ConsistencyError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONSISTENCY", 500, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
