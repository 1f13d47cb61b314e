import { z } from "zod";
import { FormatError, describeError } from "../errors";
import { isRecord, nonEmptyString } from "../utils/json";

const snapshotSchema = z
  .object({
    devices: z.array(z.unknown())
  })
  .passthrough();

export type SnapshotIndex = ReadonlyMap<string, string>;

export type SkippedDevice = {
  position: number;
  reason: "not_an_object" | "missing_id" | "missing_ip";
  id: string | null;
  name: string | null;
};

export type DuplicateDevice = {
  id: string;
  previousAddress: string;
  address: string;
};

export type SnapshotReadResult = {
  index: SnapshotIndex;
  deviceCount: number;
  skipped: SkippedDevice[];
  duplicates: DuplicateDevice[];
};

export type SnapshotReadOptions = {
  // Last record wins unless this is set, in which case a conflicting duplicate is a FormatError.
  strictDuplicates?: boolean;
};

export function parseSnapshot(
  raw: string | Buffer,
  options: SnapshotReadOptions = {}
): SnapshotReadResult {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new FormatError("snapshot_invalid_json", `Snapshot is not valid JSON: ${describeError(error)}`);
  }

  const document = snapshotSchema.safeParse(parsed);
  if (!document.success) {
    throw new FormatError(
      "snapshot_invalid_structure",
      "Snapshot must be an object with a \"devices\" array",
      document.error.issues
    );
  }

  const index = new Map<string, string>();
  const skipped: SkippedDevice[] = [];
  const duplicates: DuplicateDevice[] = [];

  document.data.devices.forEach((record, position) => {
    if (!isRecord(record)) {
      skipped.push({ position, reason: "not_an_object", id: null, name: null });
      return;
    }

    const id = nonEmptyString(record.id);
    const ip = nonEmptyString(record.ip);
    const name = nonEmptyString(record.name);
    if (!id) {
      skipped.push({ position, reason: "missing_id", id: null, name });
      return;
    }
    if (!ip) {
      skipped.push({ position, reason: "missing_ip", id, name });
      return;
    }

    const previous = index.get(id);
    if (previous !== undefined) {
      if (options.strictDuplicates && previous !== ip) {
        throw new FormatError(
          "snapshot_duplicate_device",
          `Device ${id} is listed with two addresses: ${previous} and ${ip}`,
          { id, addresses: [previous, ip] }
        );
      }
      duplicates.push({ id, previousAddress: previous, address: ip });
    }
    index.set(id, ip);
  });

  return {
    index,
    deviceCount: document.data.devices.length,
    skipped,
    duplicates
  };
}
