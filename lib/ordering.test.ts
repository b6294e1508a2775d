import assert from "node:assert/strict";
import test from "node:test";

import { assignSongOrder, findNextSong, findPreviousSong, linkSongs, parseOrderValue } from "@/lib/ordering";
import { createRecordingLogger } from "@/lib/testHelpers";
import type { ParsedSongRow } from "@/lib/types";
import { makeSongId } from "@/lib/utils";

function row(rowNumber: number, artist: string, title: string, rawOrder: string | null): ParsedSongRow {
  return {
    rowNumber,
    id: makeSongId(artist, title),
    artist,
    title,
    assignments: {
      leadGuitar: null,
      rhythmGuitar: null,
      bass: null,
      drums: null,
      vocals: null,
      keyboards: null,
    },
    duration: "0:00",
    rawOrder,
  };
}

test("parseOrderValue accepts positive numbers only", () => {
  assert.equal(parseOrderValue("3"), 3);
  assert.equal(parseOrderValue(" 3.0 "), 3);
  assert.equal(parseOrderValue("3.9"), 3);
  assert.equal(parseOrderValue("0"), null);
  assert.equal(parseOrderValue("-2"), null);
  assert.equal(parseOrderValue("0.5"), null);
  assert.equal(parseOrderValue("abc"), null);
  assert.equal(parseOrderValue(""), null);
});

test("parseOrderValue rejects non-decimal and unsafe numbers", () => {
  assert.equal(parseOrderValue("0x10"), null);
  assert.equal(parseOrderValue("0b11"), null);
  assert.equal(parseOrderValue("1e3"), null);
  assert.equal(parseOrderValue("+3"), null);
  assert.equal(parseOrderValue("9007199254740991"), Number.MAX_SAFE_INTEGER);
  assert.equal(parseOrderValue("9007199254740993"), null);
  assert.equal(parseOrderValue("10", 9), null);
});

test("huge explicit orders fall back so later positions stay distinct", () => {
  const logger = createRecordingLogger();
  const ordered = assignSongOrder(
    [row(2, "A", "X", "9007199254740993"), row(3, "B", "Y", null), row(4, "C", "Z", null)],
    logger
  );

  assert.deepEqual(ordered.map((record) => record.order), [1, 2, 3]);
  assert.deepEqual(logger.messages("warn"), ['Row 2: invalid order "9007199254740993", using 1']);
});

test("explicit orders near the safe limit leave room for every fallback", () => {
  const logger = createRecordingLogger();
  const ordered = assignSongOrder(
    [row(2, "A", "X", "9007199254740988"), row(3, "B", "Y", null), row(4, "C", "Z", null)],
    logger
  );

  assert.deepEqual(ordered.map((record) => record.order), [9007199254740988, 9007199254740989, 9007199254740990]);
  assert.equal(new Set(ordered.map((record) => record.order)).size, 3);
  assert.deepEqual(logger.messages("warn"), []);

  const tooHigh = assignSongOrder(
    [row(2, "A", "X", "9007199254740989"), row(3, "B", "Y", null), row(4, "C", "Z", null)],
    logger
  );
  assert.deepEqual(tooHigh.map((record) => record.order), [1, 2, 3]);
});

test("explicit and missing orders produce the documented sequence", () => {
  const logger = createRecordingLogger();
  const records = linkSongs(
    assignSongOrder([row(2, "A", "X", "2"), row(3, "A", "Y", "1"), row(4, "B", "Z", null)], logger)
  );

  assert.deepEqual(
    records.map((record) => [record.id, record.order]),
    [
      ["a-y", 1],
      ["a-x", 2],
      ["b-z", 3],
    ]
  );

  const [y, x, z] = records;
  assert.equal(y?.previousId, null);
  assert.equal(y?.nextId, "a-x");
  assert.equal(x?.previousId, "a-y");
  assert.equal(x?.nextId, "b-z");
  assert.equal(z?.previousId, "a-x");
  assert.equal(z?.nextId, null);
  assert.deepEqual(logger.messages("warn"), []);
});

test("invalid orders fall back to the running maximum and warn", () => {
  const logger = createRecordingLogger();
  const ordered = assignSongOrder(
    [
      row(2, "R", "1", "abc"),
      row(3, "R", "2", "2.0"),
      row(4, "R", "3", "0"),
      row(5, "R", "4", null),
      row(6, "R", "5", "3.9"),
      row(7, "R", "6", "-4"),
    ],
    logger
  );

  assert.deepEqual(
    ordered.map((record) => [record.title, record.order]),
    [
      ["1", 1],
      ["2", 2],
      ["3", 3],
      ["5", 3],
      ["4", 4],
      ["6", 5],
    ]
  );
  assert.deepEqual(logger.messages("warn"), [
    'Row 2: invalid order "abc", using 1',
    'Row 4: invalid order "0", using 3',
    'Row 7: invalid order "-4", using 5',
  ]);
});

test("linked records are mutually consistent and follow ascending order", () => {
  const records = linkSongs(
    assignSongOrder(
      [row(2, "C", "c", "5"), row(3, "A", "a", "1"), row(4, "B", "b", null), row(5, "D", "d", "3")],
      createRecordingLogger()
    )
  );

  const orders = records.map((record) => record.order);
  assert.deepEqual(orders, [...orders].sort((a, b) => a - b));

  const byId = new Map(records.map((record) => [record.id, record]));
  for (const record of records) {
    assert.ok(Number.isInteger(record.order) && record.order > 0);
    if (record.nextId) assert.equal(byId.get(record.nextId)?.previousId, record.id);
    if (record.previousId) assert.equal(byId.get(record.previousId)?.nextId, record.id);
  }
  assert.equal(records[0]?.previousId, null);
  assert.equal(records[records.length - 1]?.nextId, null);
});

test("findNextSong and findPreviousSong scan the ordered sequence", () => {
  const records = linkSongs(
    assignSongOrder([row(2, "A", "X", "1"), row(3, "A", "Y", "2")], createRecordingLogger())
  );

  assert.equal(findNextSong(records, "a-x")?.id, "a-y");
  assert.equal(findNextSong(records, "a-y"), null);
  assert.equal(findNextSong(records, "missing"), null);
  assert.equal(findPreviousSong(records, "a-y")?.id, "a-x");
  assert.equal(findPreviousSong(records, "a-x"), null);
  assert.equal(findPreviousSong(records, "missing"), null);
});
