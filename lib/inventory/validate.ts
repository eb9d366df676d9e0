import { ValidationError } from "@/lib/errors";
import { isIsoDate } from "@/lib/business-day";
import { UNITS, type Unit } from "@/lib/units";
import {
  CATEGORIES,
  PAYMENT_MODES,
  PAYMENT_STATUSES,
  SUBCATEGORIES,
  type Category,
  type PaymentMode,
  type PaymentStatus,
  type Subcategory,
} from "@/lib/inventory/catalog";

export function ensureOneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  field: string,
): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of ${allowed.join(", ")}`, field);
  }
  return match;
}

export const ensureCategory = (value: string): Category =>
  ensureOneOf(value, CATEGORIES, "category");

export const ensureSubcategory = (value: string): Subcategory =>
  ensureOneOf(value, SUBCATEGORIES, "subcategory");

export const ensureUnit = (value: string): Unit => ensureOneOf(value, UNITS, "unit");

export const ensurePaymentStatus = (value: string): PaymentStatus =>
  ensureOneOf(value, PAYMENT_STATUSES, "payment_status");

export const ensurePaymentMode = (value: string): PaymentMode =>
  ensureOneOf(value, PAYMENT_MODES, "payment_mode");

export function ensurePositive(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be greater than 0`, field);
  }
  return value;
}

export function ensureNonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must not be negative`, field);
  }
  return value;
}

export function ensureIsoDate(value: string, field = "date"): string {
  if (!isIsoDate(value)) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD form`, field);
  }
  return value.trim();
}

export function ensureNonEmpty(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ValidationError(`${field} is required`, field);
  return trimmed;
}
