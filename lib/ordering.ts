import type { Logger } from "@/lib/log";
import type { OrderedSongRow, ParsedSongRow, SongRecord } from "@/lib/types";

const DECIMAL_ORDER = /^\d+(\.\d+)?$/;

/**
 * Positive integer from `"3"` or `"3.0"`, at most `max`; anything else is
 * `null`. Hex, binary and exponent forms are not order values.
 */
export function parseOrderValue(raw: string, max = Number.MAX_SAFE_INTEGER): number | null {
  const trimmed = raw.trim();
  if (!DECIMAL_ORDER.test(trimmed)) return null;
  const order = Math.trunc(Number(trimmed));
  return order > 0 && order <= max ? order : null;
}

/**
 * Rows without a usable order value are placed after the highest order seen so
 * far in file order. The result is stably sorted by order.
 *
 * Explicit orders must leave room for one fallback per row, so every
 * fallback stays a safe integer and strictly above the ones before it.
 */
export function assignSongOrder(rows: readonly ParsedSongRow[], logger: Logger): OrderedSongRow[] {
  const maxExplicitOrder = Number.MAX_SAFE_INTEGER - rows.length;
  let maxOrderSeen = 0;
  const ordered: OrderedSongRow[] = [];

  for (const row of rows) {
    let order = row.rawOrder === null ? null : parseOrderValue(row.rawOrder, maxExplicitOrder);
    if (order === null) {
      const fallback = maxOrderSeen + 1;
      if (row.rawOrder !== null) {
        logger.warn(`Row ${row.rowNumber}: invalid order "${row.rawOrder}", using ${fallback}`);
      }
      order = fallback;
    }
    maxOrderSeen = Math.max(maxOrderSeen, order);

    ordered.push({
      id: row.id,
      artist: row.artist,
      title: row.title,
      assignments: row.assignments,
      duration: row.duration,
      order,
    });
  }

  return ordered.sort((a, b) => a.order - b.order);
}

export function linkSongs(sorted: readonly OrderedSongRow[]): SongRecord[] {
  return sorted.map((row, index) => ({
    ...row,
    nextId: sorted[index + 1]?.id ?? null,
    previousId: index > 0 ? (sorted[index - 1]?.id ?? null) : null,
  }));
}

export function findNextSong(records: readonly SongRecord[], id: string): SongRecord | null {
  const index = records.findIndex((record) => record.id === id);
  if (index < 0) return null;
  return records[index + 1] ?? null;
}

export function findPreviousSong(records: readonly SongRecord[], id: string): SongRecord | null {
  const index = records.findIndex((record) => record.id === id);
  if (index <= 0) return null;
  return records[index - 1] ?? null;
}
