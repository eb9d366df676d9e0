import { ConsistencyError, StorageError, describeError } from "@/lib/errors";
import type { Row, TableName } from "@/lib/store/schema";
import type { TableTransaction } from "@/lib/store/table-store";

export interface LedgerCommit<S extends TableName, L extends TableName> {
  /** Current-state table being changed. */
  stateTable: S;
  /** Its rows as read at the start of the transaction. */
  before: readonly Row<S>[];
  after: readonly Row<S>[];
  ledgerTable: L;
  entry: Row<L> & { id: string };
}

/**
 * Write the current-state table, then append the ledger row.
 *
 * If the append fails, the state table is put back to `before` so stock and
 * history stay in step, and the append's error is rethrown. Should the
 * restore fail too, the tables disagree and a ConsistencyError says so.
 */
export async function commitWithLedger<S extends TableName, L extends TableName>(
  tx: TableTransaction,
  commit: LedgerCommit<S, L>,
): Promise<void> {
  await tx.write(commit.stateTable, commit.after);

  try {
    await tx.append(commit.ledgerTable, commit.entry);
  } catch (appendErr) {
    try {
      await tx.write(commit.stateTable, commit.before);
    } catch (restoreErr) {
      console.error(
        `[ledger] ${commit.ledgerTable} row ${commit.entry.id} not recorded and ${commit.stateTable} could not be restored:`,
        restoreErr,
      );
      throw new ConsistencyError(
        `${commit.stateTable} was updated but the ${commit.ledgerTable} entry was not recorded ` +
          `(append: ${describeError(appendErr)}; restore: ${describeError(restoreErr)})`,
        restoreErr,
      );
    }
    if (appendErr instanceof StorageError) throw appendErr;
    throw new StorageError(
      `Could not record ${commit.ledgerTable} entry: ${describeError(appendErr)}`,
      appendErr,
    );
  }
}
