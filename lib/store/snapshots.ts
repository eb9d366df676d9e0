/**
 * Day snapshot manager.
 *
 * The data root holds one directory per calendar day. The first access on a
 * new day copies the most recent day's directory forward, so today's tables
 * start where the last business day ended. Ledger rows come along with the
 * copy, which keeps each day directory a complete picture as of that day.
 */

import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { StorageError, describeError } from "@/lib/errors";
import { formatCSV } from "@/lib/csv-parse";
import { KeyedMutex } from "@/lib/store/mutex";
import { copyDir, isErrnoException, pathExists } from "@/lib/store/files";
import { TABLE_COLUMNS, TABLE_NAMES, tableFileName } from "@/lib/store/schema";

export interface SnapshotHandle {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly dir: string;
}

/** What the table store needs from a snapshot manager. */
export interface SnapshotResolver {
  resolveActiveSnapshot(): Promise<SnapshotHandle>;
}

const DAY_DIR = /^\d{4}-\d{2}-\d{2}$/;
const STAGING_PREFIX = ".staging-";
const ROTATION_LOCK = "snapshot:rotation";

export class DaySnapshotManager implements SnapshotResolver {
  constructor(
    private readonly dataRoot: string,
    private readonly today: () => string,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
  ) {}

  /**
   * Return today's snapshot, creating it on first use of the day. Safe to call
   * on every request: concurrent callers on a new day share one rotation.
   */
  async resolveActiveSnapshot(): Promise<SnapshotHandle> {
    const date = this.today();
    return this.mutex.runExclusive(ROTATION_LOCK, async () => {
      const dir = path.join(this.dataRoot, date);
      try {
        await fs.mkdir(this.dataRoot, { recursive: true });

        if (!(await pathExists(dir))) {
          const latest = await this.latestSnapshotDate();
          if (latest) {
            await this.carryForward(latest, date);
            console.log(`[snapshots] carried ${latest} forward to ${date}`);
          } else {
            await fs.mkdir(dir);
            console.log(`[snapshots] started empty snapshot ${date}`);
          }
        }

        await ensureTables(dir);
      } catch (err) {
        throw new StorageError(
          `Could not prepare snapshot ${date}: ${describeError(err)}`,
          err,
        );
      }
      return { date, dir };
    });
  }

  /** Dates of all existing snapshots, oldest first. */
  async listSnapshotDates(): Promise<string[]> {
    const entries = await fs
      .readdir(this.dataRoot, { withFileTypes: true })
      .catch((err: unknown) => {
        if (isErrnoException(err) && err.code === "ENOENT") return [];
        throw err;
      });
    return entries
      .filter((e) => e.isDirectory() && DAY_DIR.test(e.name))
      .map((e) => e.name)
      .sort();
  }

  async latestSnapshotDate(): Promise<string | null> {
    const dates = await this.listSnapshotDates();
    return dates.length > 0 ? dates[dates.length - 1] : null;
  }

  /**
   * Deep-copy `from` into a new directory for `to`. The copy is built under a
   * staging name and renamed into place once complete.
   */
  private async carryForward(from: string, to: string): Promise<void> {
    await this.removeStaleStaging();
    const staging = path.join(
      this.dataRoot,
      `${STAGING_PREFIX}${to}-${randomUUID().slice(0, 8)}`,
    );
    try {
      await copyDir(path.join(this.dataRoot, from), staging);
      await fs.rename(staging, path.join(this.dataRoot, to));
    } catch (err) {
      await fs.rm(staging, { recursive: true, force: true });
      throw err;
    }
  }

  // A crash mid-copy leaves a staging directory behind.
  private async removeStaleStaging(): Promise<void> {
    for (const name of await fs.readdir(this.dataRoot)) {
      if (name.startsWith(STAGING_PREFIX)) {
        console.warn(`[snapshots] removing unfinished copy ${name}`);
        await fs.rm(path.join(this.dataRoot, name), { recursive: true, force: true });
      }
    }
  }
}

/** Create a header-only file for every table missing from `dir`. */
async function ensureTables(dir: string): Promise<void> {
  for (const table of TABLE_NAMES) {
    const file = path.join(dir, tableFileName(table));
    try {
      await fs.writeFile(file, formatCSV(TABLE_COLUMNS[table], []), {
        encoding: "utf-8",
        flag: "wx",
      });
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") continue;
      throw err;
    }
  }
}
