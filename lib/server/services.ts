import { loadConfig, type AppConfig } from "@/lib/config";
import { getLocalDateStr } from "@/lib/business-day";
import { KeyedMutex } from "@/lib/store/mutex";
import { DaySnapshotManager } from "@/lib/store/snapshots";
import { TableStore } from "@/lib/store/table-store";
import { OrderSequence } from "@/lib/store/sequence";
import { maybeResetForFullInvent } from "@/lib/store/bootstrap";

export interface InventoryServices {
  config: AppConfig;
  snapshots: DaySnapshotManager;
  store: TableStore;
  sequence: OrderSequence;
  /** Today's business date, YYYY-MM-DD. */
  today: () => string;
}

/** Wire the store components around one config. One lock table for all. */
export function createServices(
  config: AppConfig,
  opts: { today?: () => string } = {},
): InventoryServices {
  const today = opts.today ?? (() => getLocalDateStr(config.timezone));
  const mutex = new KeyedMutex();
  const snapshots = new DaySnapshotManager(config.dataRoot, today, mutex);
  const store = new TableStore(snapshots, mutex);
  const sequence = new OrderSequence(config.confDir, store, mutex);
  return { config, snapshots, store, sequence, today };
}

let ready: Promise<InventoryServices> | null = null;

/**
 * Process-wide services for the route handlers. The first call loads the
 * config, runs the full-inventory bootstrap and prepares today's snapshot.
 */
export function getServices(): Promise<InventoryServices> {
  ready ??= initServices().catch((err: unknown) => {
    ready = null;
    throw err;
  });
  return ready;
}

async function initServices(): Promise<InventoryServices> {
  const config = loadConfig();
  await maybeResetForFullInvent(config);
  const services = createServices(config);
  await services.snapshots.resolveActiveSnapshot();
  return services;
}

/** Drop the cached services so the next call re-reads the environment. */
export function resetServices(): void {
  ready = null;
}
