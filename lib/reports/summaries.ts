/**
 * Date-range reports over the purchases and sales ledgers of the active
 * snapshot. Each is a straight filter-and-sum; amounts are rounded to
 * 2 decimals at the end, not per row.
 */

import { parseNumber } from "@/lib/store/cells";
import type { PurchaseRow, SaleRow } from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";
import { getReportRange, inRange, type DateRange } from "@/lib/reports/date-range";

export interface ReportQuery {
  period?: string | null;
  start?: string | null;
  end?: string | null;
  category?: string | null;
  item?: string | null;
}

export interface SalesReportQuery extends ReportQuery {
  branch?: string | null;
  payment_status?: string | null;
}

export interface SpendReport {
  period: DateRange;
  total_spend: number;
  by_category: Record<string, number>;
  by_item: Record<string, number>;
  rows: PurchaseRow[];
}

export interface SalesReport {
  period: DateRange;
  total_sales: number;
  by_category: Record<string, number>;
  by_item: Record<string, number>;
  by_branch: Record<string, number>;
  rows: SaleRow[];
}

const round2 = (n: number) => Math.round(n * 100) / 100;

function bump(totals: Map<string, number>, key: string, amount: number) {
  totals.set(key, (totals.get(key) ?? 0) + amount);
}

function rounded(totals: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...totals].map(([k, v]) => [k, round2(v)]));
}

const sameItem = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();

export function summarizeSpend(
  rows: readonly PurchaseRow[],
  query: ReportQuery,
  today: string,
): SpendReport {
  const period = getReportRange(query.period ?? "last30", today, query);
  const byCategory = new Map<string, number>();
  const byItem = new Map<string, number>();
  const matched: PurchaseRow[] = [];
  let total = 0;

  for (const r of rows) {
    if (!inRange(r.date, period)) continue;
    if (query.category && r.category !== query.category) continue;
    if (query.item && !sameItem(r.item, query.item)) continue;

    const cost = parseNumber(r.total_cost);
    total += cost;
    bump(byCategory, r.category, cost);
    bump(byItem, r.item.trim(), cost);
    matched.push(r);
  }

  return {
    period,
    total_spend: round2(total),
    by_category: rounded(byCategory),
    by_item: rounded(byItem),
    rows: matched,
  };
}

export function summarizeSales(
  rows: readonly SaleRow[],
  query: SalesReportQuery,
  today: string,
): SalesReport {
  const period = getReportRange(query.period ?? "last30", today, query);
  const byCategory = new Map<string, number>();
  const byItem = new Map<string, number>();
  const byBranch = new Map<string, number>();
  const matched: SaleRow[] = [];
  let total = 0;

  for (const r of rows) {
    if (!inRange(r.date, period)) continue;
    if (query.category && r.category !== query.category) continue;
    if (query.item && !sameItem(r.item, query.item)) continue;
    if (query.branch && r.branch !== query.branch) continue;
    if (query.payment_status && r.payment_status !== query.payment_status) continue;

    const amount = parseNumber(r.total_price);
    total += amount;
    bump(byCategory, r.category, amount);
    bump(byItem, r.item, amount);
    bump(byBranch, r.branch, amount);
    matched.push(r);
  }

  return {
    period,
    total_sales: round2(total),
    by_category: rounded(byCategory),
    by_item: rounded(byItem),
    by_branch: rounded(byBranch),
    rows: matched,
  };
}

export async function spendReport(
  store: TableStore,
  query: ReportQuery,
  today: string,
): Promise<SpendReport> {
  return summarizeSpend(await store.read("purchases"), query, today);
}

export async function salesReport(
  store: TableStore,
  query: SalesReportQuery,
  today: string,
): Promise<SalesReport> {
  return summarizeSales(await store.read("sales"), query, today);
}
