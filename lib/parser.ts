import { parse } from "csv-parse/sync";

import { SongDataValidationError } from "@/lib/errors";
import type { Logger } from "@/lib/log";
import type { ParsedSongRow, SlotAssignments, SongSlot } from "@/lib/types";
import { makeSongId } from "@/lib/utils";

export const DEFAULT_DURATION = "0:00";

type ColumnSpec = {
  /** Reported when the column is missing. */
  name: string;
  /** Accepted header spellings, canonical first. */
  accepts: readonly string[];
};

const ARTIST_COLUMN: ColumnSpec = { name: "Artist", accepts: ["Artist"] };
const TITLE_COLUMN: ColumnSpec = { name: "Song", accepts: ["Song"] };
const DURATION_COLUMN: ColumnSpec = { name: "Time", accepts: ["Time"] };
const ORDER_COLUMN: ColumnSpec = { name: "Order", accepts: ["Order"] };

export const SLOT_COLUMNS: Record<SongSlot, ColumnSpec> = {
  leadGuitar: { name: "Lead Guitar", accepts: ["Lead Guitar"] },
  rhythmGuitar: { name: "Rhythm Guitar", accepts: ["Rhythm Guitar", "Rythm Guitar"] },
  bass: { name: "Bass", accepts: ["Bass"] },
  drums: { name: "Drums", accepts: ["Drums", "Battery"] },
  vocals: { name: "Singer", accepts: ["Singer"] },
  keyboards: { name: "Keyboards", accepts: ["Keyboards"] },
};

export const REQUIRED_COLUMNS: readonly ColumnSpec[] = [
  ARTIST_COLUMN,
  TITLE_COLUMN,
  SLOT_COLUMNS.leadGuitar,
  SLOT_COLUMNS.rhythmGuitar,
  SLOT_COLUMNS.bass,
  SLOT_COLUMNS.drums,
  SLOT_COLUMNS.vocals,
  SLOT_COLUMNS.keyboards,
  DURATION_COLUMN,
];

const DELIMITER_CANDIDATES = [",", ";", "\t"] as const;

export function detectDelimiter(text: string): string {
  const headerLine = text.replace(/^\uFEFF/, "").split(/\r?\n/, 1)[0] ?? "";
  let best: string = ",";
  let bestCount = 0;
  for (const candidate of DELIMITER_CANDIDATES) {
    const count = headerLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

type TableRow = {
  cells: string[];
  /** Line of the source text the record ends on, counting blank lines. */
  line: number;
};

function toCells(record: unknown): string[] {
  return Array.isArray(record) ? record.map((cell: unknown) => (typeof cell === "string" ? cell : "")) : [];
}

function readTable(text: string): TableRow[] {
  let table: unknown;
  try {
    table = parse(text, {
      bom: true,
      delimiter: detectDelimiter(text),
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
    });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SongDataValidationError(`Malformed CSV: ${detail}`);
  }

  if (!Array.isArray(table)) return [];
  return table.map((entry: unknown, index: number) => {
    const fallbackLine = index + 1;
    if (typeof entry !== "object" || entry === null) return { cells: [], line: fallbackLine };
    const info = "info" in entry ? entry.info : null;
    const line =
      typeof info === "object" && info !== null && "lines" in info && typeof info.lines === "number"
        ? info.lines
        : fallbackLine;
    return { cells: "record" in entry ? toCells(entry.record) : [], line };
  });
}

function findColumn(header: readonly string[], column: ColumnSpec): number {
  for (const name of column.accepts) {
    const index = header.indexOf(name);
    if (index >= 0) return index;
  }
  return -1;
}

function cleanAssignment(raw: string | undefined): string | null {
  const cleaned = (raw ?? "").trim();
  return cleaned || null;
}

function readAssignments(cells: readonly string[], slotIndex: Record<SongSlot, number>): SlotAssignments {
  return {
    leadGuitar: cleanAssignment(cells[slotIndex.leadGuitar]),
    rhythmGuitar: cleanAssignment(cells[slotIndex.rhythmGuitar]),
    bass: cleanAssignment(cells[slotIndex.bass]),
    drums: cleanAssignment(cells[slotIndex.drums]),
    vocals: cleanAssignment(cells[slotIndex.vocals]),
    keyboards: cleanAssignment(cells[slotIndex.keyboards]),
  };
}

export type ParseSongCsvResult = {
  rows: ParsedSongRow[];
  skippedRows: number[];
};

/**
 * Turns CSV text into typed rows. Missing required columns, an empty file,
 * or no usable rows fail the whole batch; a bad row only skips itself.
 */
export function parseSongCsv(text: string, logger: Logger): ParseSongCsvResult {
  const table = readTable(text);
  const [rawHeader, ...body] = table;
  if (!rawHeader || rawHeader.cells.every((cell) => !cell.trim())) {
    throw new SongDataValidationError("CSV file is empty");
  }

  const header = rawHeader.cells.map((cell) => cell.trim());
  const missing = REQUIRED_COLUMNS.filter((column) => findColumn(header, column) < 0).map((column) => column.name);
  if (missing.length) {
    throw new SongDataValidationError(`Missing required columns: ${missing.join(", ")}`, missing);
  }
  if (!body.length) {
    throw new SongDataValidationError("CSV file has no data rows");
  }

  const artistIdx = findColumn(header, ARTIST_COLUMN);
  const titleIdx = findColumn(header, TITLE_COLUMN);
  const durationIdx = findColumn(header, DURATION_COLUMN);
  const orderIdx = findColumn(header, ORDER_COLUMN);
  const slotIndex: Record<SongSlot, number> = {
    leadGuitar: findColumn(header, SLOT_COLUMNS.leadGuitar),
    rhythmGuitar: findColumn(header, SLOT_COLUMNS.rhythmGuitar),
    bass: findColumn(header, SLOT_COLUMNS.bass),
    drums: findColumn(header, SLOT_COLUMNS.drums),
    vocals: findColumn(header, SLOT_COLUMNS.vocals),
    keyboards: findColumn(header, SLOT_COLUMNS.keyboards),
  };

  const rows: ParsedSongRow[] = [];
  const skippedRows: number[] = [];

  for (const { cells, line: rowNumber } of body) {
    try {
      const artist = (cells[artistIdx] ?? "").trim();
      const title = (cells[titleIdx] ?? "").trim();
      if (!artist || !title) {
        logger.warn(`Row ${rowNumber}: missing artist or song title, skipping`);
        skippedRows.push(rowNumber);
        continue;
      }

      const rawOrder = orderIdx >= 0 ? (cells[orderIdx] ?? "").trim() : "";

      rows.push({
        rowNumber,
        id: makeSongId(artist, title),
        artist,
        title,
        assignments: readAssignments(cells, slotIndex),
        duration: (cells[durationIdx] ?? "").trim() || DEFAULT_DURATION,
        rawOrder: rawOrder || null,
      });
    } catch (err) {
      logger.warn(`Row ${rowNumber}: error processing row, skipping`, err);
      skippedRows.push(rowNumber);
    }
  }

  if (!rows.length) {
    throw new SongDataValidationError("No valid songs could be processed");
  }

  return { rows, skippedRows };
}
