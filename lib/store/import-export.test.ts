import { describe, it, expect, afterEach, vi } from "vitest";
import { NotFoundError } from "@/lib/errors";
import { makeTestServices, removeTempDir, type TestServices } from "@/lib/test-helpers";
import { exportTable, importTable } from "./import-export";
import { completeRow } from "./schema";

describe("CSV import and export", () => {
  let services: TestServices;

  async function setup() {
    vi.spyOn(console, "log").mockImplementation(() => {});
    services = await makeTestServices();
    return services;
  }

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(services.root);
  });

  it("exports today's file for a table", async () => {
    const { store } = await setup();
    await store.write("branches", [completeRow("branches", { id: "b1", name: "Main", is_active: "1" })]);

    expect(await exportTable(store, "branches")).toEqual({
      fileName: "branches.csv",
      content: "id,name,is_active\nb1,Main,1\n",
    });
  });

  it("does not export unknown tables", async () => {
    const { store } = await setup();
    await expect(exportTable(store, "../conf/order_seq")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("replaces a table from an upload, padding short rows", async () => {
    const { store } = await setup();
    await store.write("branches", [completeRow("branches", { id: "old", name: "Gone" })]);

    const result = await importTable(store, "branches", "\uFEFFid,name,is_active\r\nb1,Main,1\r\nb2,Annex\r\n");

    expect(result).toEqual({ saved: "branches.csv", rows: 2 });
    expect(await store.read("branches")).toEqual([
      { id: "b1", name: "Main", is_active: "1" },
      { id: "b2", name: "Annex", is_active: "" },
    ]);
    expect(console.log).toHaveBeenCalledWith("[import] replaced branches with 2 rows");
  });

  it("requires the header to match the table exactly", async () => {
    const { store } = await setup();

    await expect(importTable(store, "branches", "id,is_active,name\nb1,1,Main\n")).rejects.toThrow(
      "CSV headers must be: id,name,is_active",
    );
    await expect(importTable(store, "branches", "")).rejects.toThrow(
      "CSV headers must be: id,name,is_active",
    );
  });

  it("rejects unknown kinds", async () => {
    const { store } = await setup();
    await expect(importTable(store, "customers", "id\n")).rejects.toThrow(
      "kind must be one of ready_products, raw_inventory, purchases, sales, branches",
    );
  });
});
