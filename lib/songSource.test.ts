import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { SongFileNotFoundError } from "@/lib/errors";
import { createFileSongSource } from "@/lib/songSource";

test("file source reads text and reports mtime", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "song-source-"));
  try {
    const file = path.join(dir, "songs.csv");
    await fs.writeFile(file, "Artist,Song\n", "utf8");
    const when = new Date("2026-01-02T03:04:05.000Z");
    await fs.utimes(file, when, when);

    const source = createFileSongSource(file);
    assert.equal(source.description, file);
    assert.equal(await source.read(), "Artist,Song\n");
    assert.deepEqual(await source.stat(), { mtimeMs: when.getTime() });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("file source reports a missing file", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "song-source-"));
  try {
    const source = createFileSongSource(path.join(dir, "absent.csv"));
    assert.equal(await source.stat(), null);
    await assert.rejects(source.read(), (err: unknown) => {
      assert.ok(err instanceof SongFileNotFoundError);
      assert.equal(err.kind, "not-found");
      return true;
    });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
