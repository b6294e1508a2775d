import assert from "node:assert/strict";
import test from "node:test";

import {
  FALLBACK_SONG_ID,
  buildSongRecords,
  createFallbackSnapshot,
  createSnapshot,
  hashSongData,
} from "@/lib/snapshot";
import { createRecordingLogger, csv } from "@/lib/testHelpers";

test("dropdown is sorted by order, then artist and title", () => {
  const records = buildSongRecords(csv("2,B,b,,,,,,,", "1,Z,z,,,,,,,", "2,A,a,,,,,,,"), createRecordingLogger());
  const snapshot = createSnapshot(records, { sourceMtimeMs: 5, loadedAtMs: 10 });

  assert.deepEqual(
    records.map((record) => record.id),
    ["z-z", "b-b", "a-a"]
  );
  assert.deepEqual(snapshot.dropdown, [
    { id: "z-z", displayLabel: "Z - z", artist: "Z", title: "z", order: 1 },
    { id: "a-a", displayLabel: "A - a", artist: "A", title: "a", order: 2 },
    { id: "b-b", displayLabel: "B - b", artist: "B", title: "b", order: 2 },
  ]);
  assert.equal(snapshot.byOrder.get(2)?.id, "b-b");
  assert.equal(snapshot.sourceMtimeMs, 5);
  assert.equal(snapshot.loadedAtMs, 10);
  assert.equal(snapshot.isFallback, false);
});

test("every id appears once in the dropdown and in the id index", () => {
  const records = buildSongRecords(
    csv("1,A,X,,,,,,,", "2,A,X,,,,,,,", "3,B,Y,,,,,,,", "4,C,Z,,,,,,,"),
    createRecordingLogger()
  );
  const snapshot = createSnapshot(records, { sourceMtimeMs: null, loadedAtMs: 0 });

  const dropdownIds = snapshot.dropdown.map((entry) => entry.id);
  assert.equal(new Set(dropdownIds).size, dropdownIds.length);
  assert.deepEqual([...dropdownIds].sort(), [...snapshot.byId.keys()].sort());
  assert.equal(snapshot.byId.get("a-x")?.order, 1);
});

test("data hash depends on content, not record order", () => {
  const records = buildSongRecords(csv("1,A,X,,,,,,,", "2,B,Y,,,,,,,"), createRecordingLogger());
  const renamed = buildSongRecords(csv("1,A,X,,,,,,,", "2,B,Y2,,,,,,,"), createRecordingLogger());

  assert.match(hashSongData(records), /^[0-9a-f]{64}$/);
  assert.equal(hashSongData(records), hashSongData([...records].reverse()));
  assert.notEqual(hashSongData(records), hashSongData(renamed));
});

test("snapshots are frozen", () => {
  const snapshot = createSnapshot(buildSongRecords(csv("1,A,X,,,,,,,"), createRecordingLogger()), {
    sourceMtimeMs: 1,
    loadedAtMs: 1,
  });
  assert.equal(Object.isFrozen(snapshot), true);
  assert.equal(Object.isFrozen(snapshot.records), true);
});

test("fallback snapshot holds a single placeholder song", () => {
  const snapshot = createFallbackSnapshot(42);

  assert.equal(snapshot.isFallback, true);
  assert.equal(snapshot.sourceMtimeMs, null);
  assert.equal(snapshot.loadedAtMs, 42);
  assert.equal(snapshot.records.length, 1);
  assert.deepEqual(snapshot.dropdown, [
    { id: FALLBACK_SONG_ID, displayLabel: "System - Data unavailable", artist: "System", title: "Data unavailable", order: 1 },
  ]);
  assert.equal(snapshot.records[0]?.duration, "0:00");
});
