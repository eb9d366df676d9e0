#!/usr/bin/env npx tsx
/**
 * Prepare the data directories without starting the server.
 *
 * Usage:
 *   npx tsx scripts/bootstrap.ts
 *
 * Reads DATA_ROOT, CONF_DIR, BACKUP_ROOT and BUSINESS_TIMEZONE from .env,
 * applies the one-time full-inventory reset when conf/config.txt sets
 * full_invent=1, and creates (or carries forward) today's snapshot.
 */

import "dotenv/config";
import { loadConfig } from "../lib/config";
import { maybeResetForFullInvent } from "../lib/store/bootstrap";
import { createServices } from "../lib/server/services";

async function main() {
  const config = loadConfig();
  console.log(`📁 Data root: ${config.dataRoot}`);

  const moved = await maybeResetForFullInvent(config);
  if (moved) console.log(`📦 Previous data moved to ${moved}`);

  const { snapshots } = createServices(config);
  const snapshot = await snapshots.resolveActiveSnapshot();
  console.log(`✅ Active snapshot ${snapshot.date} at ${snapshot.dir}`);
}

main().catch((err: unknown) => {
  console.error("❌ Bootstrap failed:", err);
  process.exit(1);
});
