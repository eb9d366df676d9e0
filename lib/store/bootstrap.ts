import { promises as fs } from "fs";
import path from "path";
import type { AppConfig } from "@/lib/config";
import { StorageError, describeError } from "@/lib/errors";
import { pathExists } from "@/lib/store/files";

export const FULL_INVENT_MARKER = ".full_invent_migrated";

/** `YYYYMMDD_HHMMSS` in local time, for backup directory names. */
export function backupStamp(now: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${p(now.getMonth() + 1)}${p(now.getDate())}_` +
    `${p(now.getHours())}${p(now.getMinutes())}${p(now.getSeconds())}`
  );
}

/**
 * Full-inventory restart. With `fullInvent` on, the existing data root is
 * moved aside once so every item can be entered from scratch. A marker file
 * in the fresh data root stops it from happening again.
 *
 * Returns the backup directory when data was moved, otherwise null.
 */
export async function maybeResetForFullInvent(
  config: AppConfig,
  now: Date = new Date(),
): Promise<string | null> {
  if (!config.fullInvent) return null;

  const marker = path.join(config.dataRoot, FULL_INVENT_MARKER);
  try {
    if (await pathExists(marker)) return null;

    let dest: string | null = null;
    const entries = (await pathExists(config.dataRoot)) ? await fs.readdir(config.dataRoot) : [];
    if (entries.length > 0) {
      await fs.mkdir(config.backupRoot, { recursive: true });
      dest = path.join(config.backupRoot, `before_full_invent_${backupStamp(now)}`);
      await fs.rename(config.dataRoot, dest);
      console.log(`[bootstrap] full inventory: moved ${config.dataRoot} to ${dest}`);
    }

    await fs.mkdir(config.dataRoot, { recursive: true });
    await fs.writeFile(marker, "1", "utf-8");
    return dest;
  } catch (err) {
    throw new StorageError(`Full inventory reset failed: ${describeError(err)}`, err);
  }
}
