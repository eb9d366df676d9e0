import { ValidationError } from "@/lib/errors";
import { addDays, isIsoDate } from "@/lib/business-day";

export type ReportPeriod =
  | "today"
  | "week"
  | "month"
  | "last30"
  | "last90"
  | "last180"
  | "daterange";

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
}

/**
 * Resolve a report period against `today` (YYYY-MM-DD, business-local).
 *
 * "week" and the "lastN" presets count today as the last day, so "week" is
 * the 7 days ending today. "daterange" needs both bounds; without them, and
 * for any unknown period, the last 30 days are used.
 */
export function getReportRange(
  period: string,
  today: string,
  custom: { start?: string | null; end?: string | null } = {},
): DateRange {
  switch (period) {
    case "today":
      return { start: today, end: today };

    case "week":
      return { start: addDays(today, -6), end: today };

    case "month":
      return { start: `${today.slice(0, 8)}01`, end: today };

    case "last90":
      return { start: addDays(today, -89), end: today };

    case "last180":
      return { start: addDays(today, -179), end: today };

    case "daterange":
      if (custom.start && custom.end) {
        for (const field of ["start", "end"] as const) {
          if (!isIsoDate(custom[field] ?? "")) {
            throw new ValidationError(`${field} must be a date in YYYY-MM-DD form`, field);
          }
        }
        return { start: custom.start.trim(), end: custom.end.trim() };
      }
      return { start: addDays(today, -29), end: today };

    default:
      return { start: addDays(today, -29), end: today };
  }
}

/** Dates are compared as strings; rows with malformed dates never match. */
export function inRange(date: string, range: DateRange): boolean {
  return isIsoDate(date) && date >= range.start && date <= range.end;
}
