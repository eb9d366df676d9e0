import fs from "fs";
import path from "path";

/**
 * Process-wide settings, built once at startup and handed to every component
 * that needs them. Nothing below reads `process.env` on its own.
 */
export interface AppConfig {
  /** Holds one directory per calendar day (`YYYY-MM-DD`). */
  readonly dataRoot: string;
  /** Holds `config.txt` and the order sequence file. */
  readonly confDir: string;
  /** Where the full-inventory bootstrap moves the old data root. */
  readonly backupRoot: string;
  /** Archive every existing snapshot once and start from empty tables. */
  readonly fullInvent: boolean;
  /** IANA zone that decides which calendar day "today" is. */
  readonly timezone: string;
  /** First line of every printed bill. */
  readonly billTitle: string;
}

export const CONFIG_FILE_NAME = "config.txt";

export interface ConfigFileValues {
  fullInvent: boolean;
}

/**
 * Parse the line-oriented `key=value` config file. Blank lines and lines
 * starting with `#` are skipped; unknown keys are ignored.
 */
export function parseConfigText(text: string): ConfigFileValues {
  const values: ConfigFileValues = { fullInvent: false };

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    if (key === "full_invent") values.fullInvent = value === "1";
  }

  return values;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const confDir = path.resolve(cwd, env.CONF_DIR || "conf");
  const configFile = path.join(confDir, CONFIG_FILE_NAME);

  let fileValues: ConfigFileValues = { fullInvent: false };
  if (fs.existsSync(configFile)) {
    fileValues = parseConfigText(fs.readFileSync(configFile, "utf-8"));
  }

  return Object.freeze({
    dataRoot: path.resolve(cwd, env.DATA_ROOT || "data"),
    confDir,
    backupRoot: path.resolve(cwd, env.BACKUP_ROOT || "data_backup"),
    fullInvent: fileValues.fullInvent,
    timezone:
      env.BUSINESS_TIMEZONE || Intl.DateTimeFormat().resolvedOptions().timeZone,
    billTitle: env.BILL_TITLE || "Bill",
  });
}
