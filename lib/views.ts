import { compareSongs } from "@/lib/snapshot";
import {
  SONG_SLOTS,
  type MusicianDetail,
  type MusicianSong,
  type MusicianSummary,
  type SongDetail,
  type SongLink,
  type SongRecord,
  type SongSlot,
  type SongSnapshot,
} from "@/lib/types";
import { compareText, formatSongLabel } from "@/lib/utils";

function toSongLink(record: SongRecord | null | undefined): SongLink | null {
  if (!record) return null;
  return { id: record.id, label: formatSongLabel(record), order: record.order };
}

export function formatSongDetail(snapshot: SongSnapshot, record: SongRecord): SongDetail {
  return {
    id: record.id,
    artist: record.artist,
    title: record.title,
    duration: record.duration,
    order: record.order,
    assignments: { ...record.assignments },
    next: record.nextId ? toSongLink(snapshot.byId.get(record.nextId)) : null,
    previous: record.previousId ? toSongLink(snapshot.byId.get(record.previousId)) : null,
  };
}

export function listMusicians(records: readonly SongRecord[]): MusicianSummary[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const slot of SONG_SLOTS) {
      const name = record.assignments[slot];
      if (name) names.add(name);
    }
  }
  return [...names].sort(compareText).map((name) => ({ id: name, name }));
}

export function slotsForMusician(record: SongRecord, name: string): SongSlot[] {
  return SONG_SLOTS.filter((slot) => record.assignments[slot] === name);
}

/** `null` when the musician is not assigned to any song. */
export function formatMusicianDetail(records: readonly SongRecord[], musicianId: string): MusicianDetail | null {
  const songs: MusicianSong[] = [];
  for (const record of records) {
    const slots = slotsForMusician(record, musicianId);
    if (!slots.length) continue;
    songs.push({
      id: record.id,
      artist: record.artist,
      title: record.title,
      duration: record.duration,
      order: record.order,
      slots,
    });
  }

  if (!songs.length) return null;
  return { id: musicianId, name: musicianId, songs: songs.sort(compareSongs) };
}
