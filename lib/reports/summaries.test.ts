import { describe, it, expect } from "vitest";
import { completeRow } from "@/lib/store/schema";
import { summarizeSales, summarizeSpend } from "./summaries";

const today = "2026-03-15";

const purchase = (date: string, category: string, item: string, total_cost: string) =>
  completeRow("purchases", { id: `${date}-${item}`, date, category, item, total_cost });

const sale = (
  date: string,
  item: string,
  total_price: string,
  extra: Partial<Record<string, string>> = {},
) =>
  completeRow("sales", {
    id: `${date}-${item}`,
    date,
    category: "SFH",
    branch: "Main",
    item,
    total_price,
    payment_status: "Paid",
    ...extra,
  });

describe("summarizeSpend", () => {
  const rows = [
    purchase("2026-03-14", "Home Delivery", "Chicken", "2000.00"),
    purchase("2026-03-15", "Home Delivery", "Chicken ", "0.10"),
    purchase("2026-03-15", "SFH", "Onion", "0.20"),
    purchase("2026-01-01", "SFH", "Onion", "500.00"),
    purchase("not a date", "SFH", "Onion", "9.00"),
  ];

  it("totals the period by category and item", () => {
    const report = summarizeSpend(rows, { period: "week" }, today);

    expect(report.period).toEqual({ start: "2026-03-09", end: today });
    expect(report.total_spend).toBe(2000.3);
    expect(report.by_category).toEqual({ "Home Delivery": 2000.1, SFH: 0.2 });
    expect(report.by_item).toEqual({ Chicken: 2000.1, Onion: 0.2 });
    expect(report.rows).toHaveLength(3);
  });

  it("filters by category and by item ignoring case", () => {
    expect(summarizeSpend(rows, { period: "week", category: "SFH" }, today).total_spend).toBe(0.2);
    expect(summarizeSpend(rows, { period: "week", item: "CHICKEN" }, today).total_spend).toBe(
      2000.1,
    );
  });
});

describe("summarizeSales", () => {
  const rows = [
    sale("2026-03-15", "Burger", "290.00"),
    sale("2026-03-15", "Burger", "100.00", { branch: "Annex", payment_status: "Live" }),
    sale("2026-03-02", "Momo", "120.00"),
    sale("2026-02-01", "Momo", "120.00"),
  ];

  it("totals the month by category, item and branch", () => {
    const report = summarizeSales(rows, { period: "month" }, today);

    expect(report.total_sales).toBe(510);
    expect(report.by_category).toEqual({ SFH: 510 });
    expect(report.by_item).toEqual({ Burger: 390, Momo: 120 });
    expect(report.by_branch).toEqual({ Main: 410, Annex: 100 });
  });

  it("filters by branch and payment status", () => {
    expect(
      summarizeSales(rows, { period: "month", branch: "Main" }, today).total_sales,
    ).toBe(410);
    expect(
      summarizeSales(rows, { period: "month", payment_status: "Live" }, today).rows,
    ).toEqual([rows[1]]);
  });

  it("covers the last 30 days when no period is given", () => {
    expect(summarizeSales(rows, {}, today).total_sales).toBe(510);
  });
});
