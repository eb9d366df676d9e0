/**
 * Fixed table schemas. The column lists here are authoritative: they are the
 * header row of every CSV file and the only keys a parsed row carries.
 */

export const TABLE_COLUMNS = {
  ready_products: [
    "id",
    "name",
    "category",
    "item_category",
    "code",
    "unit",
    "unit_cost",
    "price",
    "quantity",
    "threshold",
  ],
  raw_inventory: [
    "id",
    "name",
    "category",
    "subcategory",
    "unit",
    "unit_cost",
    "stock",
    "threshold",
  ],
  purchases: [
    "id",
    "date",
    "category",
    "subcategory",
    "item",
    "unit",
    "qty",
    "unit_cost",
    "total_cost",
    "notes",
  ],
  sales: [
    "id",
    "date",
    "category",
    "branch",
    "order_id",
    "item",
    "unit",
    "qty",
    "unit_price",
    "discount",
    "total_price",
    "customer_name",
    "customer_phone",
    "table_no",
    "payment_status",
    "payment_mode",
    "payment_note",
    "notes",
  ],
  branches: ["id", "name", "is_active"],
} as const;

export type TableName = keyof typeof TABLE_COLUMNS;

export type ColumnOf<T extends TableName> = (typeof TABLE_COLUMNS)[T][number];

/** A row as stored: every column present, every cell a string. */
export type Row<T extends TableName> = Record<ColumnOf<T>, string>;

export type ReadyProductRow = Row<"ready_products">;
export type RawInventoryRow = Row<"raw_inventory">;
export type PurchaseRow = Row<"purchases">;
export type SaleRow = Row<"sales">;
export type BranchRow = Row<"branches">;

export const TABLE_NAMES: readonly TableName[] = [
  "ready_products",
  "raw_inventory",
  "purchases",
  "sales",
  "branches",
];

export function isTableName(name: string): name is TableName {
  return Object.prototype.hasOwnProperty.call(TABLE_COLUMNS, name);
}

export function tableFileName(table: TableName): string {
  return `${table}.csv`;
}

/** Build a complete row from a partial one, defaulting absent cells to "". */
export function completeRow<T extends TableName>(
  table: T,
  values: Partial<Record<string, string>>,
): Row<T> {
  const row: Record<string, string> = {};
  for (const column of TABLE_COLUMNS[table]) {
    row[column] = values[column] ?? "";
  }
  return row as Row<T>;
}
