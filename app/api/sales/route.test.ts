import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import path from "path";
import { NextRequest } from "next/server";
import { resetServices } from "@/lib/server/services";
import { makeTempDir, removeTempDir } from "@/lib/test-helpers";
import { POST as addProduct } from "@/app/api/ready_products/route";
import { GET as nextOrder } from "./next_order/route";
import { GET as bill } from "./[id]/bill/route";
import { POST as recordSale } from "./route";

const ENV_KEYS = ["DATA_ROOT", "CONF_DIR", "BACKUP_ROOT", "BUSINESS_TIMEZONE", "BILL_TITLE"];

function jsonRequest(url: string, body: unknown): NextRequest {
  return new NextRequest(`http://localhost${url}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("sales routes", () => {
  let root = "";
  const saved: Record<string, string | undefined> = {};

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    root = await makeTempDir();
    for (const key of ENV_KEYS) saved[key] = process.env[key];
    process.env.DATA_ROOT = path.join(root, "data");
    process.env.CONF_DIR = path.join(root, "conf");
    process.env.BACKUP_ROOT = path.join(root, "backup");
    process.env.BUSINESS_TIMEZONE = "UTC";
    process.env.BILL_TITLE = "Corner Kitchen";
    resetServices();

    const res = await addProduct(
      jsonRequest("/api/ready_products", {
        name: "Burger",
        category: "SFH",
        unit: "Plates",
        price: "100",
        quantity: 20,
      }),
    );
    expect(await res.json()).toEqual({ ok: true, id: expect.any(String), code: "1BB" });
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetServices();
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it("records a sale and links its bill", async () => {
    const res = await recordSale(
      jsonRequest("/api/sales", {
        category: "SFH",
        item: "Burger",
        unit: "Plates",
        qty: 3,
        discount: 10,
        table_no: "4",
      }),
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({
      ok: true,
      id: expect.any(String),
      order_id: 1,
      remaining_stock: 17,
      bill_url: `/api/sales/${body.id}/bill`,
    });

    const billRes = await bill(new NextRequest(`http://localhost${body.bill_url}`), {
      params: Promise.resolve({ id: body.id }),
    });
    const text = await billRes.text();
    expect(billRes.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(text.split("\n")[0]).toBe("Corner Kitchen");
    expect(text).toContain("\nTotal: ₹290.00\n");
  });

  it("answers 400 with the field for a sale larger than the stock", async () => {
    const res = await recordSale(
      jsonRequest("/api/sales", { category: "SFH", item: "Burger", unit: "Plates", qty: 50 }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Not enough stock. Available: 20",
      code: "VALIDATION",
      field: "qty",
    });
  });

  it("answers 400 for a body that is not JSON", async () => {
    const res = await recordSale(
      new NextRequest("http://localhost/api/sales", { method: "POST", body: "qty=3" }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be JSON", code: "VALIDATION" });
  });

  it("previews the next order number without consuming it", async () => {
    expect(await (await nextOrder()).json()).toEqual({ next_order_id: 1 });
    expect(await (await nextOrder()).json()).toEqual({ next_order_id: 1 });
  });

  it("answers 404 for the bill of an unknown sale", async () => {
    const res = await bill(new NextRequest("http://localhost/api/sales/nope/bill"), {
      params: Promise.resolve({ id: "nope" }),
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Sale not found", code: "NOT_FOUND" });
  });
});
