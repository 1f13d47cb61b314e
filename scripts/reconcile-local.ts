import { readFileSync } from "node:fs";
import { syncConfigFile } from "../src/services/address-sync";
import { describeChange } from "../src/services/reconciler";

async function main(): Promise<void> {
  const [snapshotPath, configPath] = process.argv.slice(2);
  if (!snapshotPath || !configPath) {
    throw new Error("usage: reconcile-local <snapshot.json> <core.config_entries>");
  }

  const result = await syncConfigFile({
    snapshot: readFileSync(snapshotPath),
    configFile: configPath,
    strictDuplicates: process.env.SNAPSHOT_STRICT_DUPLICATES === "true"
  });

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        devices: result.snapshot.index.size,
        skipped_devices: result.snapshot.skipped,
        entries: result.entryCount,
        unmatched_entries: result.reconcile.warnings.length,
        updated: result.reconcile.updated,
        written: result.written,
        changes: result.reconcile.changes.map((change) => describeChange(change))
      },
      null,
      2
    )
  );
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
