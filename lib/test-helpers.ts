import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { AppConfig } from "@/lib/config";
import { createServices, type InventoryServices } from "@/lib/server/services";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "daybook-"));
}

export function testConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    dataRoot: path.join(root, "data"),
    confDir: path.join(root, "conf"),
    backupRoot: path.join(root, "data_backup"),
    fullInvent: false,
    timezone: "UTC",
    billTitle: "Bill",
    ...overrides,
  };
}

export interface TestServices extends InventoryServices {
  root: string;
  setToday(date: string): void;
}

/** Services over a fresh temp directory with a clock the test controls. */
export async function makeTestServices(date = "2026-03-01"): Promise<TestServices> {
  const root = await makeTempDir();
  let today = date;
  const services = createServices(testConfig(root), { today: () => today });
  return {
    ...services,
    root,
    setToday(next: string) {
      today = next;
    },
  };
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
