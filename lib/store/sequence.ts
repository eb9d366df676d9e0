import { promises as fs } from "fs";
import path from "path";
import { StorageError, describeError } from "@/lib/errors";
import { KeyedMutex } from "@/lib/store/mutex";
import { isErrnoException, writeFileAtomic } from "@/lib/store/files";
import type { TableReader } from "@/lib/store/table-store";
import type { SaleRow } from "@/lib/store/schema";

export const ORDER_SEQ_FILE_NAME = "order_seq.txt";

const SEQUENCE_LOCK = "sequence:order";

/**
 * POS order numbers.
 *
 * A single integer in `<confDir>/order_seq.txt`, outside the day snapshots,
 * so rotation never touches it. The file is seeded on first use from the
 * highest order id already recorded in the active snapshot's sales.
 */
export class OrderSequence {
  private readonly file: string;

  constructor(
    confDir: string,
    private readonly tables: TableReader,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
  ) {
    this.file = path.join(confDir, ORDER_SEQ_FILE_NAME);
  }

  /**
   * Next order number. With `peek` the value is only previewed: repeated
   * peeks return the same number until a non-peek call consumes it.
   */
  async next(peek = false): Promise<number> {
    return this.mutex.runExclusive(SEQUENCE_LOCK, async () => {
      const current = await this.current();
      const next = current + 1;
      if (!peek) await this.persist(next);
      return next;
    });
  }

  private async current(): Promise<number> {
    let text: string;
    try {
      text = await fs.readFile(this.file, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        const seed = maxOrderId(await this.tables.read("sales"));
        await this.persist(seed);
        console.log(`[sequence] initialized order sequence at ${seed}`);
        return seed;
      }
      throw new StorageError(`Could not read order sequence: ${describeError(err)}`, err);
    }

    const trimmed = text.trim();
    if (trimmed === "") return 0;
    if (!/^\d+$/.test(trimmed)) {
      throw new StorageError(`Order sequence file holds '${trimmed}', not an integer`);
    }
    return Number(trimmed);
  }

  private async persist(value: number): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await writeFileAtomic(this.file, String(value));
    } catch (err) {
      throw new StorageError(`Could not write order sequence: ${describeError(err)}`, err);
    }
  }
}

/** Highest parseable order id; rows with junk in `order_id` are skipped. */
export function maxOrderId(rows: readonly SaleRow[]): number {
  let max = 0;
  for (const row of rows) {
    const raw = row.order_id.trim();
    if (!/^\d+$/.test(raw)) continue;
    max = Math.max(max, Number(raw));
  }
  return max;
}
