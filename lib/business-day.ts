/**
 * Calendar-day helpers. Snapshot directories and ledger dates use the
 * business's local date, not the UTC date.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Get a YYYY-MM-DD date string in the given timezone, optionally offset
 * by a number of days (e.g., -1 for yesterday).
 */
export function getLocalDateStr(
  tz: string,
  daysOffset = 0,
  now: Date = new Date(),
): string {
  // en-CA locale produces YYYY-MM-DD format
  const todayStr = new Intl.DateTimeFormat("en-CA", {
    timeZone: tz,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);

  if (daysOffset === 0) return todayStr;

  const [y, m, d] = todayStr.split("-").map(Number);
  return formatDate(new Date(y, m - 1, d + daysOffset));
}

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

/**
 * Parse YYYY-MM-DD into a local-midnight Date. Returns null for anything
 * else, including impossible dates such as 2026-02-30.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;

  const [y, m, d] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(y, m - 1, d);
  if (date.getFullYear() !== y || date.getMonth() !== m - 1 || date.getDate() !== d) {
    return null;
  }
  return date;
}

/** Add whole days to a YYYY-MM-DD string. */
export function addDays(dateStr: string, days: number): string {
  const [y, m, d] = dateStr.split("-").map(Number);
  return formatDate(new Date(y, m - 1, d + days));
}

export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}-${String(d.getDate()).padStart(2, "0")}`;
}
