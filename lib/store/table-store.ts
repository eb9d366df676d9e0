/**
 * Whole-table CSV storage on top of the active day snapshot.
 *
 * The unit of every read and write is an entire table file. Mutations are
 * serialized per table; `transaction()` holds several tables at once so a
 * read-modify-write across them can't interleave with another writer.
 */

import { promises as fs } from "fs";
import path from "path";
import { ConsistencyError, StorageError, describeError } from "@/lib/errors";
import { formatCSV, parseCSV } from "@/lib/csv-parse";
import { KeyedMutex } from "@/lib/store/mutex";
import { writeFileAtomic } from "@/lib/store/files";
import type { SnapshotHandle, SnapshotResolver } from "@/lib/store/snapshots";
import {
  TABLE_COLUMNS,
  completeRow,
  tableFileName,
  type Row,
  type TableName,
} from "@/lib/store/schema";

export interface TableReader {
  read<T extends TableName>(table: T): Promise<Row<T>[]>;
}

/** Scoped access handed to a `transaction()` callback. */
export interface TableTransaction extends TableReader {
  readonly snapshot: SnapshotHandle;
  write<T extends TableName>(table: T, rows: readonly Row<T>[]): Promise<void>;
  append<T extends TableName>(table: T, row: Row<T>): Promise<void>;
}

const lockKey = (table: TableName) => `table:${table}`;

export class TableStore implements TableReader {
  constructor(
    private readonly snapshots: SnapshotResolver,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
  ) {}

  /**
   * Parse the table from disk. Columns missing from the file come back as
   * "", columns the schema doesn't know are dropped.
   */
  async read<T extends TableName>(table: T): Promise<Row<T>[]> {
    const snapshot = await this.snapshots.resolveActiveSnapshot();
    return readTable(snapshot, table);
  }

  /** Replace the whole table with `rows`, in the order given. */
  async write<T extends TableName>(table: T, rows: readonly Row<T>[]): Promise<void> {
    await this.mutex.runExclusive(lockKey(table), async () => {
      const snapshot = await this.snapshots.resolveActiveSnapshot();
      await writeTable(snapshot, table, rows);
    });
  }

  async append<T extends TableName>(table: T, row: Row<T>): Promise<void> {
    await this.transaction([table], (tx) => tx.append(table, row));
  }

  /**
   * Run `fn` while holding every table in `tables`. All reads and writes
   * inside go to the same snapshot, even if the day changes meanwhile.
   */
  async transaction<R>(
    tables: readonly TableName[],
    fn: (tx: TableTransaction) => Promise<R>,
  ): Promise<R> {
    return this.mutex.runExclusiveAll(tables.map(lockKey), async () => {
      const snapshot = await this.snapshots.resolveActiveSnapshot();
      const held = new Set<TableName>(tables);

      const guard = (table: TableName) => {
        if (!held.has(table)) {
          throw new ConsistencyError(
            `Table '${table}' used inside a transaction that does not hold it`,
          );
        }
      };

      const tx: TableTransaction = {
        snapshot,
        async read<T extends TableName>(table: T) {
          guard(table);
          return readTable(snapshot, table);
        },
        async write<T extends TableName>(table: T, rows: readonly Row<T>[]) {
          guard(table);
          await writeTable(snapshot, table, rows);
        },
        async append<T extends TableName>(table: T, row: Row<T>) {
          guard(table);
          const rows = await readTable(snapshot, table);
          await writeTable(snapshot, table, [...rows, row]);
        },
      };

      return fn(tx);
    });
  }

  /** Location of a table's file in today's snapshot. */
  async filePath(table: TableName): Promise<string> {
    const snapshot = await this.snapshots.resolveActiveSnapshot();
    return tablePath(snapshot, table);
  }
}

function tablePath(snapshot: SnapshotHandle, table: TableName): string {
  return path.join(snapshot.dir, tableFileName(table));
}

async function readTable<T extends TableName>(
  snapshot: SnapshotHandle,
  table: T,
): Promise<Row<T>[]> {
  const file = tablePath(snapshot, table);
  let text: string;
  try {
    text = await fs.readFile(file, "utf-8");
  } catch (err) {
    throw new StorageError(`Could not read ${table}: ${describeError(err)}`, err);
  }
  return parseCSV(text).map((record) => completeRow(table, record));
}

async function writeTable<T extends TableName>(
  snapshot: SnapshotHandle,
  table: T,
  rows: readonly Row<T>[],
): Promise<void> {
  const file = tablePath(snapshot, table);
  try {
    await writeFileAtomic(file, formatCSV(TABLE_COLUMNS[table], rows));
  } catch (err) {
    throw new StorageError(`Could not write ${table}: ${describeError(err)}`, err);
  }
}
