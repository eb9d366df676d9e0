/**
 * Stock units and the one conversion the store allows.
 *
 * Purchases may be entered in KG while the raw item is kept in GM (or the
 * other way round). No other pair converts, and sales never convert.
 */

export const UNITS = ["KG", "GM", "Pieces", "Batch", "Plates", "Portion"] as const;

export type Unit = (typeof UNITS)[number];

const GM_PER: Partial<Record<Unit, number>> = {
  KG: 1000,
  GM: 1,
};

export function isUnit(value: string): value is Unit {
  return UNITS.some((u) => u === value);
}

/**
 * Convert a quantity between two units.
 * Returns null when the pair has no defined conversion.
 */
export function convertQty(qty: number, fromUnit: string, toUnit: string): number | null {
  if (fromUnit === toUnit) return qty;

  const from = isUnit(fromUnit) ? GM_PER[fromUnit] : undefined;
  const to = isUnit(toUnit) ? GM_PER[toUnit] : undefined;
  if (from === undefined || to === undefined) return null;

  return (qty * from) / to;
}

/** Round to the 3 decimals quantities are stored with. */
export function roundQty(qty: number): number {
  return Math.round(qty * 1000) / 1000;
}

export function formatQty(qty: number): string {
  return qty.toFixed(3);
}

export function formatMoney(amount: number): string {
  return amount.toFixed(2);
}
