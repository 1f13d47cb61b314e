import assert from "node:assert/strict";
import test from "node:test";
import type { ConfigEntry } from "../../src/services/config-store";
import { describeChange, reconcileEntries } from "../../src/services/reconciler";

function sampleEntries(): ConfigEntry[] {
  return [
    { title: "Lamp", data: { device_id: "devA", host: "10.0.0.2" } },
    { title: "Thermostat", data: { device_id: "devC", host: "10.0.0.1" } }
  ];
}

test("reconciler: rewrites matched addresses and warns on unmatched entries", () => {
  const index = new Map([
    ["devA", "10.0.0.5"],
    ["devB", "10.0.0.9"]
  ]);
  const entries = sampleEntries();

  const result = reconcileEntries(index, entries);

  assert.equal(result.updated, true);
  assert.equal(result.entries, entries);
  assert.deepEqual(result.entries, [
    { title: "Lamp", data: { device_id: "devA", host: "10.0.0.5" } },
    { title: "Thermostat", data: { device_id: "devC", host: "10.0.0.1" } }
  ]);
  assert.deepEqual(result.changes, [
    { title: "Lamp", identifier: "devA", oldAddress: "10.0.0.2", newAddress: "10.0.0.5" }
  ]);
  assert.deepEqual(result.warnings, [{ title: "Thermostat", identifier: "devC", reason: "no_match" }]);
});

test("reconciler: a second pass over its own output changes nothing", () => {
  const index = new Map([["devA", "10.0.0.5"]]);
  const entries = sampleEntries();

  const first = reconcileEntries(index, entries);
  const second = reconcileEntries(index, first.entries);

  assert.equal(first.changes.length, 1);
  assert.deepEqual(second.changes, []);
  assert.equal(second.updated, false);
});

test("reconciler: entries already at the scanned address are left alone silently", () => {
  const entries: ConfigEntry[] = [{ title: "Lamp", data: { device_id: "devA", host: "10.0.0.5" } }];
  const result = reconcileEntries(new Map([["devA", "10.0.0.5"]]), entries);

  assert.deepEqual(result.changes, []);
  assert.deepEqual(result.warnings, []);
  assert.equal(result.updated, false);
});

test("reconciler: a missing address counts as unknown and is filled in", () => {
  const entries: ConfigEntry[] = [{ title: "Plug", data: { device_id: "devP" } }];
  const result = reconcileEntries(new Map([["devP", "10.0.0.12"]]), entries);

  assert.deepEqual(result.changes, [
    { title: "Plug", identifier: "devP", oldAddress: null, newAddress: "10.0.0.12" }
  ]);
  assert.deepEqual(entries[0], { title: "Plug", data: { device_id: "devP", host: "10.0.0.12" } });
});

test("reconciler: entries without an identifier pass through untouched", () => {
  const entries: ConfigEntry[] = [
    { title: "Sun", domain: "sun", data: {} },
    { domain: "met", data: { latitude: 52.1, host: "api.met.no" } },
    { title: "No data block", domain: "backup" },
    { title: 42, data: { device_id: "", host: "10.0.0.3" } }
  ];
  const before = structuredClone(entries);

  const result = reconcileEntries(new Map([["devA", "10.0.0.5"]]), entries);

  assert.deepEqual(entries, before);
  assert.deepEqual(result.changes, []);
  assert.deepEqual(result.warnings, [
    { title: "Sun", identifier: null, reason: "no_match" },
    { title: null, identifier: null, reason: "no_match" },
    { title: "No data block", identifier: null, reason: "no_match" },
    { title: null, identifier: null, reason: "no_match" }
  ]);
});

test("reconciler: a whitespace-only identifier never matches", () => {
  const entries: ConfigEntry[] = [{ title: "Blank", data: { device_id: "  ", host: "10.0.0.3" } }];

  const result = reconcileEntries(new Map([["  ", "10.0.0.5"]]), entries);

  assert.deepEqual(entries, [{ title: "Blank", data: { device_id: "  ", host: "10.0.0.3" } }]);
  assert.deepEqual(result.changes, []);
  assert.deepEqual(result.warnings, [{ title: "Blank", identifier: null, reason: "no_match" }]);
  assert.equal(result.updated, false);
});

test("reconciler: keeps length and order and only touches the address field", () => {
  const entries: ConfigEntry[] = [
    { entry_id: "1", title: "A", data: { device_id: "devA", host: "10.0.0.2", local_key: "test-key" }, options: { scan: 30 } },
    { entry_id: "2", title: "B", data: { device_id: "devB", host: "10.0.0.3" } },
    { entry_id: "3", title: "C", data: { device_id: "devC", host: "10.0.0.4" } }
  ];
  const index = new Map([
    ["devC", "10.0.1.4"],
    ["devA", "10.0.1.2"]
  ]);

  const result = reconcileEntries(index, entries);

  assert.deepEqual(
    result.entries.map((entry) => entry.entry_id),
    ["1", "2", "3"]
  );
  assert.deepEqual(result.entries[0], {
    entry_id: "1",
    title: "A",
    data: { device_id: "devA", host: "10.0.1.2", local_key: "test-key" },
    options: { scan: 30 }
  });
  assert.deepEqual(result.entries[1], { entry_id: "2", title: "B", data: { device_id: "devB", host: "10.0.0.3" } });
  assert.deepEqual(
    result.changes.map((change) => [change.identifier, change.oldAddress, change.newAddress]),
    [
      ["devA", "10.0.0.2", "10.0.1.2"],
      ["devC", "10.0.0.4", "10.0.1.4"]
    ]
  );
});

test("reconciler: an empty index is a valid no-change outcome", () => {
  const entries = sampleEntries();
  const result = reconcileEntries(new Map(), entries);

  assert.equal(result.updated, false);
  assert.deepEqual(result.changes, []);
  assert.equal(result.warnings.length, 2);
  assert.deepEqual(result.entries, sampleEntries());
});

test("reconciler: change descriptions match the audit log format", () => {
  assert.equal(
    describeChange({ title: "Lamp", identifier: "devA", oldAddress: "10.0.0.2", newAddress: "10.0.0.5" }),
    "Updated Lamp devA: 10.0.0.2 -> 10.0.0.5"
  );
  assert.equal(
    describeChange({ title: null, identifier: "devZ", oldAddress: null, newAddress: "10.0.0.8" }),
    "Updated devZ: N/A -> 10.0.0.8"
  );
});
