export const SONG_SLOTS = ["leadGuitar", "rhythmGuitar", "bass", "drums", "vocals", "keyboards"] as const;

export type SongSlot = (typeof SONG_SLOTS)[number];

export const SLOT_LABELS: Record<SongSlot, string> = {
  leadGuitar: "Lead Guitar",
  rhythmGuitar: "Rhythm Guitar",
  bass: "Bass",
  drums: "Drums",
  vocals: "Vocals",
  keyboards: "Keyboards",
};

/** Empty cells are `null`, never `""`. */
export type SlotAssignments = Record<SongSlot, string | null>;

export type SongRecord = {
  id: string;
  artist: string;
  title: string;
  assignments: SlotAssignments;
  duration: string;
  order: number;
  nextId: string | null;
  previousId: string | null;
};

/** A row as it leaves the parser, before order and links are known. */
export type ParsedSongRow = {
  rowNumber: number;
  id: string;
  artist: string;
  title: string;
  assignments: SlotAssignments;
  duration: string;
  rawOrder: string | null;
};

export type OrderedSongRow = Omit<SongRecord, "nextId" | "previousId">;

export type DropdownEntry = {
  id: string;
  displayLabel: string;
  artist: string;
  title: string;
  order: number;
};

export type SongSnapshot = {
  records: readonly SongRecord[];
  byId: ReadonlyMap<string, SongRecord>;
  byOrder: ReadonlyMap<number, SongRecord>;
  dropdown: readonly DropdownEntry[];
  dataHash: string;
  sourceMtimeMs: number | null;
  loadedAtMs: number;
  isFallback: boolean;
};

export type SongLink = {
  id: string;
  label: string;
  order: number;
};

export type SongDetail = {
  id: string;
  artist: string;
  title: string;
  duration: string;
  order: number;
  assignments: SlotAssignments;
  next: SongLink | null;
  previous: SongLink | null;
};

export type MusicianSummary = {
  id: string;
  name: string;
};

export type MusicianSong = {
  id: string;
  artist: string;
  title: string;
  duration: string;
  order: number;
  slots: SongSlot[];
};

export type MusicianDetail = {
  id: string;
  name: string;
  songs: MusicianSong[];
};

export type HealthStatus = {
  loaded: boolean;
  count: number;
  cacheValid: boolean;
  errorCount: number;
  errorThreshold: number;
  fallbackActive: boolean;
  lastLoadedAtMs: number | null;
  dataHash: string | null;
};

export type ConsistencyReport = {
  valid: boolean;
  issues: string[];
  duplicateIds: string[];
  duplicateOrders: number[];
  missingFields: string[];
  nonPositiveOrders: string[];
  similarNames: Array<[string, string]>;
  totalSongs: number;
  totalMusicians: number;
  avgMusiciansPerSong: number;
  avgSongsPerMusician: number;
  topMusicians: Array<{ name: string; songCount: number }>;
};
