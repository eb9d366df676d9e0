import { genId } from "@/lib/store/ids";
import { completeRow, type BranchRow } from "@/lib/store/schema";
import type { TableStore } from "@/lib/store/table-store";
import { ensureNonEmpty } from "@/lib/inventory/validate";

export async function listBranches(store: TableStore): Promise<BranchRow[]> {
  return store.read("branches");
}

/**
 * Add a branch. Names are unique ignoring case: adding one that exists
 * returns the existing id and changes nothing.
 */
export async function addBranch(
  store: TableStore,
  input: { name: string; is_active?: boolean },
): Promise<{ id: string; created: boolean }> {
  const name = ensureNonEmpty(input.name, "name");

  return store.transaction(["branches"], async (tx) => {
    const rows = await tx.read("branches");
    const existing = rows.find((r) => r.name.trim().toLowerCase() === name.toLowerCase());
    if (existing) return { id: existing.id, created: false };

    const row = completeRow("branches", {
      id: genId(),
      name,
      is_active: input.is_active === false ? "0" : "1",
    });
    await tx.write("branches", [...rows, row]);
    return { id: row.id, created: true };
  });
}
