import { describe, it, expect, afterEach, vi } from "vitest";
import { InsufficientStockError, NotFoundError, ValidationError } from "@/lib/errors";
import { addReadyProduct } from "@/lib/inventory/ready-products";
import { makeTestServices, removeTempDir, type TestServices } from "@/lib/test-helpers";
import {
  branchTableSummary,
  findSale,
  listSales,
  recordSale,
  saleTotal,
  updateSalePayment,
  type SaleInput,
} from "./sales";

const burgerSale: SaleInput = { category: "SFH", item: "burger", unit: "Plates", qty: 3 };

describe("saleTotal", () => {
  it("subtracts the discount and never goes below zero", () => {
    expect(saleTotal(3, 100, 10)).toBe(290);
    expect(saleTotal(1, 100, 150)).toBe(0);
    expect(saleTotal(2, 50, -5)).toBe(100);
  });
});

describe("recordSale", () => {
  let services: TestServices;

  async function setup() {
    vi.spyOn(console, "log").mockImplementation(() => {});
    services = await makeTestServices("2026-03-01");
    await addReadyProduct(services.store, {
      name: "Burger",
      category: "SFH",
      unit: "Plates",
      price: 100,
      quantity: 20,
    });
    return services;
  }

  const stockOf = async (name: string) =>
    (await services.store.read("ready_products")).find((r) => r.name === name)?.quantity;

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(services.root);
  });

  it("deducts stock and records the sale with the next order number", async () => {
    const s = await setup();

    const result = await recordSale(s, { ...burgerSale, discount: 10, table_no: "4" });

    expect(result).toEqual({ id: expect.any(String), order_id: 1, remaining_stock: 17 });
    expect(await stockOf("Burger")).toBe("17.000");
    expect(await findSale(s.store, result.id)).toEqual({
      id: result.id,
      date: "2026-03-01",
      category: "SFH",
      branch: "",
      order_id: "1",
      item: "Burger",
      unit: "Plates",
      qty: "3.000",
      unit_price: "100.00",
      discount: "10.00",
      total_price: "290.00",
      customer_name: "",
      customer_phone: "",
      table_no: "4",
      payment_status: "Live",
      payment_mode: "",
      payment_note: "",
      notes: "",
    });
  });

  it("rejects a sale larger than the stock and leaves everything as it was", async () => {
    const s = await setup();
    await recordSale(s, burgerSale);

    const err = await recordSale(s, { ...burgerSale, qty: 20 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InsufficientStockError);
    expect(err).toHaveProperty("message", "Not enough stock. Available: 17");
    expect(await stockOf("Burger")).toBe("17.000");
    expect(await listSales(s.store)).toHaveLength(1);
    expect(await s.sequence.next(true)).toBe(2);
  });

  it("uses an explicit order id without advancing the sequence", async () => {
    const s = await setup();

    const result = await recordSale(s, { ...burgerSale, order_id: 50 });

    expect(result.order_id).toBe(50);
    expect(await s.sequence.next(true)).toBe(51);
  });

  it("uses the given unit price over the product's", async () => {
    const s = await setup();
    const { id } = await recordSale(s, { ...burgerSale, qty: 2, unit_price: 80 });

    expect(await findSale(s.store, id)).toMatchObject({
      unit_price: "80.00",
      total_price: "160.00",
    });
  });

  it("requires the sale unit to match the product", async () => {
    const s = await setup();
    await expect(recordSale(s, { ...burgerSale, unit: "Portion" })).rejects.toThrow(
      "Sale unit 'Portion' must match product unit 'Plates'",
    );
  });

  it("matches the product by category as well as name", async () => {
    const s = await setup();
    const err = await recordSale(s, { ...burgerSale, category: "Home Delivery" }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toHaveProperty("message", "Ready product not found (match by name & category)");
    expect(err).toHaveProperty("field", "item");
  });

  it("keeps the payment mode only on paid sales", async () => {
    const s = await setup();
    const paid = await recordSale(s, {
      ...burgerSale,
      payment_status: "Paid",
      payment_mode: "Cash",
    });
    const live = await recordSale(s, { ...burgerSale, payment_mode: "Cash" });

    expect((await findSale(s.store, paid.id)).payment_mode).toBe("Cash");
    expect((await findSale(s.store, live.id)).payment_mode).toBe("");
    await expect(
      recordSale(s, { ...burgerSale, payment_status: "Paid", payment_mode: "Cheque" }),
    ).rejects.toThrow("payment_mode must be one of");
  });

  it("serializes concurrent sales of the same product", async () => {
    const s = await setup();

    const results = await Promise.all(
      Array.from({ length: 5 }, () => recordSale(s, { ...burgerSale, qty: 1 })),
    );

    expect(results.map((r) => r.order_id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
    expect(results.map((r) => r.remaining_stock).sort((a, b) => a - b)).toEqual([
      15, 16, 17, 18, 19,
    ]);
    expect(await stockOf("Burger")).toBe("15.000");
    expect(await listSales(s.store)).toHaveLength(5);
  });
});

describe("updateSalePayment", () => {
  let services: TestServices;

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(services.root);
  });

  async function setupWithSale() {
    vi.spyOn(console, "log").mockImplementation(() => {});
    services = await makeTestServices();
    await addReadyProduct(services.store, {
      name: "Burger",
      category: "SFH",
      unit: "Plates",
      price: 100,
      quantity: 5,
    });
    const { id } = await recordSale(services, burgerSale);
    return { ...services, id };
  }

  it("marks a sale paid and sets its mode in one call", async () => {
    const { store, id } = await setupWithSale();

    const sale = await updateSalePayment(store, { id, payment_status: "Paid", payment_mode: "Card" });

    expect(sale).toMatchObject({ payment_status: "Paid", payment_mode: "Card" });
    expect(await findSale(store, id)).toMatchObject({ payment_status: "Paid", payment_mode: "Card" });
  });

  it("blanks the mode of an unpaid sale", async () => {
    const { store, id } = await setupWithSale();

    const sale = await updateSalePayment(store, { id, payment_status: "Due", payment_mode: "Cash" });

    expect(sale).toMatchObject({ payment_status: "Due", payment_mode: "" });
  });

  it("clears the mode when a paid sale is reopened without one", async () => {
    const { store, id } = await setupWithSale();
    await updateSalePayment(store, { id, payment_status: "Paid", payment_mode: "Cash" });

    await updateSalePayment(store, { id, payment_status: "Due" });

    expect(await findSale(store, id)).toMatchObject({ payment_status: "Due", payment_mode: "" });
  });

  it("rejects unknown sales and statuses", async () => {
    const { store, id } = await setupWithSale();

    await expect(updateSalePayment(store, { id: "missing" })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(updateSalePayment(store, { id, payment_status: "Settled" })).rejects.toThrow(
      "payment_status must be one of Live, Due, Paid",
    );
  });
});

describe("branchTableSummary", () => {
  let services: TestServices;

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(services.root);
  });

  it("counts open orders per table for one branch", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    services = await makeTestServices();
    await addReadyProduct(services.store, {
      name: "Burger",
      category: "SFH",
      unit: "Plates",
      price: 100,
      quantity: 10,
    });
    const sale = (table_no: string, branch = "Main", payment_status = "Live") =>
      recordSale(services, { ...burgerSale, qty: 1, table_no, branch, payment_status });

    await sale("2");
    await sale("10");
    await sale("2");
    await sale("");
    await sale("2", "Annex");
    await sale("3", "Main", "Paid");

    expect(await branchTableSummary(services.store, "Main")).toEqual([
      { table_no: "10", open_orders: 1 },
      { table_no: "2", open_orders: 2 },
      { table_no: "—", open_orders: 1 },
    ]);
  });
});
