import crypto from "node:crypto";

import type { Logger } from "@/lib/log";
import { assignSongOrder, linkSongs } from "@/lib/ordering";
import { parseSongCsv, DEFAULT_DURATION } from "@/lib/parser";
import type { DropdownEntry, SongRecord, SongSnapshot } from "@/lib/types";
import { compareText, formatSongLabel } from "@/lib/utils";

export const FALLBACK_SONG_ID = "fallback-no-data";
export const FALLBACK_ARTIST = "System";
export const FALLBACK_TITLE = "Data unavailable";

/** Parser, order assigner and relationship builder in one pass. */
export function buildSongRecords(text: string, logger: Logger): SongRecord[] {
  const { rows } = parseSongCsv(text, logger);
  return linkSongs(assignSongOrder(rows, logger));
}

export function compareSongs(
  a: { order: number; artist: string; title: string },
  b: { order: number; artist: string; title: string }
): number {
  return a.order - b.order || compareText(a.artist, b.artist) || compareText(a.title, b.title);
}

export function hashSongData(records: readonly SongRecord[]): string {
  const essential = records
    .map((record) => [record.id, record.artist, record.title, record.order] as const)
    .sort((a, b) => compareText(a[0], b[0]) || a[3] - b[3]);
  return crypto.createHash("sha256").update(JSON.stringify(essential), "utf8").digest("hex");
}

function buildDropdown(records: readonly SongRecord[]): DropdownEntry[] {
  const seen = new Set<string>();
  const entries: DropdownEntry[] = [];
  for (const record of records) {
    if (seen.has(record.id)) continue;
    seen.add(record.id);
    entries.push({
      id: record.id,
      displayLabel: formatSongLabel(record),
      artist: record.artist,
      title: record.title,
      order: record.order,
    });
  }
  return entries.sort(compareSongs);
}

export function createSnapshot(
  records: readonly SongRecord[],
  meta: { sourceMtimeMs: number | null; loadedAtMs: number; isFallback?: boolean }
): SongSnapshot {
  const byId = new Map<string, SongRecord>();
  const byOrder = new Map<number, SongRecord>();
  for (const record of records) {
    if (!byId.has(record.id)) byId.set(record.id, record);
    if (!byOrder.has(record.order)) byOrder.set(record.order, record);
  }

  return Object.freeze({
    records: Object.freeze([...records]),
    byId,
    byOrder,
    dropdown: Object.freeze(buildDropdown(records)),
    dataHash: hashSongData(records),
    sourceMtimeMs: meta.sourceMtimeMs,
    loadedAtMs: meta.loadedAtMs,
    isFallback: meta.isFallback ?? false,
  });
}

export function createFallbackSnapshot(loadedAtMs: number): SongSnapshot {
  const placeholder: SongRecord = {
    id: FALLBACK_SONG_ID,
    artist: FALLBACK_ARTIST,
    title: FALLBACK_TITLE,
    assignments: {
      leadGuitar: null,
      rhythmGuitar: null,
      bass: null,
      drums: null,
      vocals: null,
      keyboards: null,
    },
    duration: DEFAULT_DURATION,
    order: 1,
    nextId: null,
    previousId: null,
  };
  return createSnapshot([placeholder], { sourceMtimeMs: null, loadedAtMs, isFallback: true });
}
