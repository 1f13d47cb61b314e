import { isRecord, nonEmptyString } from "../utils/json";
import type { ConfigEntry } from "./config-store";
import type { SnapshotIndex } from "./snapshot-reader";

export const IDENTIFIER_FIELD = "device_id";
export const ADDRESS_FIELD = "host";

export type ChangeRecord = {
  title: string | null;
  identifier: string;
  // null when the entry had no usable address before the update.
  oldAddress: string | null;
  newAddress: string;
};

export type MatchWarning = {
  title: string | null;
  identifier: string | null;
  reason: "no_match";
};

export type ReconcileResult = {
  entries: ConfigEntry[];
  changes: ChangeRecord[];
  warnings: MatchWarning[];
  updated: boolean;
};

/**
 * Points every entry whose device id appears in the snapshot at the scanned
 * address. Entries are updated in place and returned in their original order;
 * only the address field of matched entries is ever written.
 */
export function reconcileEntries(index: SnapshotIndex, entries: ConfigEntry[]): ReconcileResult {
  const changes: ChangeRecord[] = [];
  const warnings: MatchWarning[] = [];

  for (const entry of entries) {
    const title = typeof entry.title === "string" ? entry.title : null;
    const data = isRecord(entry.data) ? entry.data : null;
    const identifier = data ? nonEmptyString(data[IDENTIFIER_FIELD]) : null;
    const mapped = identifier ? index.get(identifier) : undefined;

    if (!data || !identifier || mapped === undefined) {
      warnings.push({ title, identifier, reason: "no_match" });
      continue;
    }

    const current = data[ADDRESS_FIELD];
    const currentAddress = typeof current === "string" ? current : null;
    if (currentAddress === mapped) {
      continue;
    }

    data[ADDRESS_FIELD] = mapped;
    changes.push({
      title,
      identifier,
      oldAddress: currentAddress,
      newAddress: mapped
    });
  }

  return {
    entries,
    changes,
    warnings,
    updated: changes.length > 0
  };
}

export function describeChange(change: ChangeRecord): string {
  const label = change.title ? `${change.title} ${change.identifier}` : change.identifier;
  return `Updated ${label}: ${change.oldAddress ?? "N/A"} -> ${change.newAddress}`;
}
