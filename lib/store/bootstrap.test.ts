import { describe, it, expect, afterEach, vi } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { makeTempDir, removeTempDir, testConfig } from "@/lib/test-helpers";
import { FULL_INVENT_MARKER, backupStamp, maybeResetForFullInvent } from "./bootstrap";

describe("backupStamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(backupStamp(new Date(2026, 2, 1, 9, 5, 7))).toBe("20260301_090507");
  });
});

describe("maybeResetForFullInvent", () => {
  let root = "";
  const now = new Date(2026, 2, 1, 9, 5, 7);

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it("does nothing when the flag is off", async () => {
    root = await makeTempDir();
    const config = testConfig(root);
    await fs.mkdir(path.join(config.dataRoot, "2026-02-28"), { recursive: true });

    expect(await maybeResetForFullInvent(config, now)).toBeNull();
    expect(await fs.readdir(config.dataRoot)).toEqual(["2026-02-28"]);
  });

  it("moves existing data aside once", async () => {
    root = await makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => {});
    const config = testConfig(root, { fullInvent: true });
    await fs.mkdir(path.join(config.dataRoot, "2026-02-28"), { recursive: true });

    const dest = await maybeResetForFullInvent(config, now);

    expect(dest).toBe(path.join(config.backupRoot, "before_full_invent_20260301_090507"));
    expect(await fs.readdir(path.join(config.backupRoot, "before_full_invent_20260301_090507"))).toEqual([
      "2026-02-28",
    ]);
    expect(await fs.readdir(config.dataRoot)).toEqual([FULL_INVENT_MARKER]);

    expect(await maybeResetForFullInvent(config, now)).toBeNull();
    expect(await fs.readdir(config.backupRoot)).toHaveLength(1);
  });

  it("only writes the marker when there is no data yet", async () => {
    root = await makeTempDir();
    const config = testConfig(root, { fullInvent: true });

    expect(await maybeResetForFullInvent(config, now)).toBeNull();
    expect(await fs.readdir(config.dataRoot)).toEqual([FULL_INVENT_MARKER]);
  });
});
