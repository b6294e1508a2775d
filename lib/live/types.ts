import type { SongSlot } from "@/lib/types";

export const LIVE_STATE_VERSION = "song-selector-live-state-v1" as const;

export type LivePerformanceState = {
  version: typeof LIVE_STATE_VERSION;
  sessionId: string;
  currentSongId: string | null;
  nextSongId: string | null;
  /** Data hash seen when the selection was last written; used to flag reloads. */
  dataHash: string | null;
  updatedAtMs: number;
};

export type PerformanceMusician = {
  name: string;
  slot: SongSlot;
  label: string;
};

export type PerformanceSong = {
  id: string;
  title: string;
  artist: string;
  duration: string;
  fullTitle: string;
  order: number;
  musicians: PerformanceMusician[];
  totalMusicians: number;
};

export type PerformanceView = {
  currentSong: PerformanceSong | null;
  nextSong: PerformanceSong | null;
  hasActivePerformance: boolean;
  lastUpdatedMs: number | null;
  dataHashChanged: boolean;
};

export type LiveStateValidation = {
  currentSongValid: boolean;
  nextSongValid: boolean;
  stateCleaned: boolean;
};

export function makeEmptyLiveState(sessionId: string, nowMs = Date.now()): LivePerformanceState {
  return {
    version: LIVE_STATE_VERSION,
    sessionId,
    currentSongId: null,
    nextSongId: null,
    dataHash: null,
    updatedAtMs: nowMs,
  };
}
