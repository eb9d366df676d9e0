import { describe, it, expect, afterEach } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { CONFIG_FILE_NAME, loadConfig, parseConfigText } from "./config";
import { makeTempDir, removeTempDir } from "./test-helpers";

describe("parseConfigText", () => {
  it("reads full_invent=1 as on", () => {
    expect(parseConfigText("full_invent=1\n")).toEqual({ fullInvent: true });
  });

  it("skips comments and blank lines and tolerates spaces", () => {
    expect(parseConfigText("# restart stock\n\n  full_invent = 1  \n")).toEqual({
      fullInvent: true,
    });
  });

  it("treats any other value as off", () => {
    expect(parseConfigText("full_invent=0")).toEqual({ fullInvent: false });
    expect(parseConfigText("full_invent=yes")).toEqual({ fullInvent: false });
  });

  it("ignores unknown keys and lines without '='", () => {
    expect(parseConfigText("theme=dark\nfull_invent\n")).toEqual({ fullInvent: false });
  });
});

describe("loadConfig", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await removeTempDir(dir);
    dir = "";
  });

  it("resolves directories against cwd and applies defaults", async () => {
    dir = await makeTempDir();
    const config = loadConfig({ BUSINESS_TIMEZONE: "Asia/Kolkata" }, dir);

    expect(config).toEqual({
      dataRoot: path.join(dir, "data"),
      confDir: path.join(dir, "conf"),
      backupRoot: path.join(dir, "data_backup"),
      fullInvent: false,
      timezone: "Asia/Kolkata",
      billTitle: "Bill",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads overrides from the environment and the config file", async () => {
    dir = await makeTempDir();
    const confDir = path.join(dir, "settings");
    await fs.mkdir(confDir);
    await fs.writeFile(path.join(confDir, CONFIG_FILE_NAME), "full_invent=1\n");

    const config = loadConfig(
      {
        DATA_ROOT: "store",
        CONF_DIR: "settings",
        BACKUP_ROOT: "/var/backups/daybook",
        BUSINESS_TIMEZONE: "UTC",
        BILL_TITLE: "Corner Kitchen",
      },
      dir,
    );

    expect(config.dataRoot).toBe(path.join(dir, "store"));
    expect(config.confDir).toBe(confDir);
    expect(config.backupRoot).toBe("/var/backups/daybook");
    expect(config.fullInvent).toBe(true);
    expect(config.billTitle).toBe("Corner Kitchen");
  });
});
