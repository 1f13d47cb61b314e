import { configEntries, loadConfigDocument, serializeConfigDocument } from "./config-store";
import { readFileBytes, writeFileBytes } from "./file-transfer";
import { reconcileEntries, type ReconcileResult } from "./reconciler";
import { parseSnapshot, type SnapshotReadResult } from "./snapshot-reader";

export type AddressSyncResult = {
  snapshot: SnapshotReadResult;
  reconcile: ReconcileResult;
  entryCount: number;
  written: boolean;
};

/**
 * Reconciles one config file against a snapshot. The file is rewritten only
 * when at least one address changed.
 */
export async function syncConfigFile(params: {
  snapshot: Buffer | string;
  configFile: string;
  strictDuplicates: boolean;
}): Promise<AddressSyncResult> {
  const snapshot = parseSnapshot(params.snapshot, { strictDuplicates: params.strictDuplicates });
  const document = loadConfigDocument(await readFileBytes(params.configFile, "config_read_failed"));
  const entries = configEntries(document);
  const reconcile = reconcileEntries(snapshot.index, entries);

  if (reconcile.updated) {
    await writeFileBytes(params.configFile, serializeConfigDocument(document), "config_write_failed");
  }

  return {
    snapshot,
    reconcile,
    entryCount: entries.length,
    written: reconcile.updated
  };
}
