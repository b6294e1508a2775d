import { SONG_SLOTS, type ConsistencyReport, type SongRecord } from "@/lib/types";
import { compareText } from "@/lib/utils";

const TOP_MUSICIANS_LIMIT = 5;

/** Flags likely typos between two musician names. */
export function areNamesSimilar(name1: string, name2: string, threshold = 0.8): boolean {
  if (Math.abs(name1.length - name2.length) > 2) return false;

  const n1 = name1.toLowerCase();
  const n2 = name2.toLowerCase();

  if (n1.includes(n2) || n2.includes(n1)) {
    return n1.length > 3 && n2.length > 3;
  }

  const chars1 = new Set(n1);
  const chars2 = new Set(n2);
  const common = [...chars1].filter((ch) => chars2.has(ch)).length;
  const total = new Set([...chars1, ...chars2]).size;
  if (total === 0) return false;

  return common / total > threshold && Math.abs(n1.length - n2.length) <= 1;
}

function duplicatesOf<T>(values: readonly T[]): T[] {
  const seen = new Set<T>();
  const dupes = new Set<T>();
  for (const value of values) {
    if (seen.has(value)) dupes.add(value);
    seen.add(value);
  }
  return [...dupes];
}

function assignedMusicians(record: SongRecord): string[] {
  const names: string[] = [];
  for (const slot of SONG_SLOTS) {
    const name = record.assignments[slot];
    if (name) names.push(name);
  }
  return names;
}

export function buildConsistencyReport(records: readonly SongRecord[]): ConsistencyReport {
  const issues: string[] = [];

  const duplicateIds = duplicatesOf(records.map((record) => record.id));
  if (duplicateIds.length) {
    issues.push(`Duplicate song IDs found: ${duplicateIds.join(", ")}`);
  }

  const duplicateOrders = duplicatesOf(records.map((record) => record.order)).sort((a, b) => a - b);
  if (duplicateOrders.length) {
    issues.push(`Duplicate order values found: ${duplicateOrders.join(", ")}`);
  }

  const missingFields: string[] = [];
  const nonPositiveOrders: string[] = [];
  for (const record of records) {
    if (!record.artist || !record.title) {
      missingFields.push(record.id);
      issues.push(`Missing artist or song title for ID: ${record.id}`);
    }
    if (!record.duration) {
      if (!missingFields.includes(record.id)) missingFields.push(record.id);
      issues.push(`Missing duration for song: ${record.id}`);
    }
    if (!Number.isInteger(record.order) || record.order <= 0) {
      nonPositiveOrders.push(record.id);
      issues.push(`Invalid order ${record.order} for song: ${record.id}`);
    }
  }

  // Song count per musician, in first-seen order.
  const songsPerMusician = new Map<string, number>();
  let assignmentTotal = 0;
  for (const record of records) {
    const names = assignedMusicians(record);
    assignmentTotal += names.length;
    for (const name of names) {
      songsPerMusician.set(name, (songsPerMusician.get(name) ?? 0) + 1);
    }
  }

  const musicianNames = [...songsPerMusician.keys()];
  const similarNames: Array<[string, string]> = [];
  for (let i = 0; i < musicianNames.length; i++) {
    for (let j = i + 1; j < musicianNames.length; j++) {
      const a = musicianNames[i] ?? "";
      const b = musicianNames[j] ?? "";
      if (areNamesSimilar(a, b)) {
        similarNames.push([a, b]);
        issues.push(`Potential name inconsistency: '${a}' vs '${b}'`);
      }
    }
  }

  const topMusicians = [...songsPerMusician.entries()]
    .map(([name, songCount]) => ({ name, songCount }))
    .sort((a, b) => b.songCount - a.songCount || compareText(a.name, b.name))
    .slice(0, TOP_MUSICIANS_LIMIT);

  return {
    valid: issues.length === 0,
    issues,
    duplicateIds,
    duplicateOrders,
    missingFields,
    nonPositiveOrders,
    similarNames,
    totalSongs: records.length,
    totalMusicians: songsPerMusician.size,
    avgMusiciansPerSong: records.length ? assignmentTotal / records.length : 0,
    avgSongsPerMusician: songsPerMusician.size ? assignmentTotal / songsPerMusician.size : 0,
    topMusicians,
  };
}
