/** Parse a stored numeric cell; blank or junk counts as 0. */
export function parseNumber(cell: string): number {
  const n = parseFloat(cell);
  return Number.isFinite(n) ? n : 0;
}
