/**
 * Whole-table CSV download and upload for the active snapshot.
 */

import { promises as fs } from "fs";
import { NotFoundError, StorageError, ValidationError, describeError } from "@/lib/errors";
import { parseCSVRecords } from "@/lib/csv-parse";
import {
  TABLE_COLUMNS,
  TABLE_NAMES,
  completeRow,
  isTableName,
  tableFileName,
  type TableName,
} from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";

export async function exportTable(
  store: TableStore,
  name: string,
): Promise<{ fileName: string; content: string }> {
  if (!isTableName(name)) throw new NotFoundError("CSV table");

  const file = await store.filePath(name);
  try {
    return { fileName: tableFileName(name), content: await fs.readFile(file, "utf-8") };
  } catch (err) {
    throw new StorageError(`Could not read ${name}: ${describeError(err)}`, err);
  }
}

/**
 * Replace a table with an uploaded CSV. The header must list the table's
 * columns exactly, in order; rows are re-serialized through the schema.
 */
export async function importTable(
  store: TableStore,
  kind: string,
  text: string,
): Promise<{ saved: string; rows: number }> {
  if (!isTableName(kind)) {
    throw new ValidationError(`kind must be one of ${TABLE_NAMES.join(", ")}`, "kind");
  }
  const table: TableName = kind;

  const [header = [], ...records] = parseCSVRecords(text);
  const expected: readonly string[] = TABLE_COLUMNS[table];
  const actual = header.map((h) => h.trim());
  if (actual.length !== expected.length || actual.some((h, i) => h !== expected[i])) {
    throw new ValidationError(`CSV headers must be: ${expected.join(",")}`, "file");
  }

  const rows = records.map((values) =>
    completeRow(table, Object.fromEntries(expected.map((col, i) => [col, values[i] ?? ""]))),
  );
  await store.write(table, rows);
  console.log(`[import] replaced ${table} with ${rows.length} rows`);

  return { saved: tableFileName(table), rows: rows.length };
}
