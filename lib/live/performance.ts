import type { LiveStateStore } from "@/lib/live/storage";
import {
  makeEmptyLiveState,
  type LivePerformanceState,
  type LiveStateValidation,
  type PerformanceMusician,
  type PerformanceSong,
  type PerformanceView,
} from "@/lib/live/types";
import { consoleLogger, type Logger } from "@/lib/log";
import type { SongDataProcessor } from "@/lib/songData";
import { SLOT_LABELS, SONG_SLOTS, type SongRecord } from "@/lib/types";
import { formatSongLabel } from "@/lib/utils";

type SongField = "currentSongId" | "nextSongId";

function selection(field: SongField, songId: string | null): Partial<LivePerformanceState> {
  return field === "currentSongId" ? { currentSongId: songId } : { nextSongId: songId };
}

export function formatPerformanceSong(record: SongRecord): PerformanceSong {
  const musicians: PerformanceMusician[] = [];
  for (const slot of SONG_SLOTS) {
    const name = record.assignments[slot];
    if (name) musicians.push({ name, slot, label: SLOT_LABELS[slot] });
  }

  return {
    id: record.id,
    title: record.title,
    artist: record.artist,
    duration: record.duration,
    fullTitle: formatSongLabel(record),
    order: record.order,
    musicians,
    totalMusicians: musicians.length,
  };
}

/**
 * Per-session "now playing" and "up next" selection. Song ids are checked
 * against the processor on every write and read; ids that vanished after a
 * reload are cleared rather than reported.
 */
export class LivePerformanceManager {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly songs: SongDataProcessor,
    private readonly store: LiveStateStore,
    options: { logger?: Logger; now?: () => number } = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? Date.now;
  }

  setCurrentSong(sessionId: string, songId: string | null): Promise<boolean> {
    return this.setSong(sessionId, "currentSongId", songId);
  }

  setNextSong(sessionId: string, songId: string | null): Promise<boolean> {
    return this.setSong(sessionId, "nextSongId", songId);
  }

  /**
   * Moves "up next" into "now playing" (or the song after the current one when
   * nothing is queued) and queues the song that follows it in set order.
   */
  async advance(sessionId: string): Promise<boolean> {
    const state = this.readState(sessionId);
    let target: SongRecord | null = null;
    if (state.nextSongId) {
      target = await this.songs.getSongById(state.nextSongId);
    }
    if (!target && state.currentSongId) {
      target = await this.songs.getNextSong(state.currentSongId);
    }
    if (!target) {
      this.logger.warn(`Session ${sessionId}: nothing to advance to`);
      return false;
    }

    const following = await this.songs.getNextSong(target.id);
    await this.writeState({
      ...state,
      currentSongId: target.id,
      nextSongId: following?.id ?? null,
    });
    this.logger.info(`Session ${sessionId}: advanced to ${target.id}`);
    return true;
  }

  async getPerformanceState(sessionId: string): Promise<PerformanceView> {
    const stored = this.store.read(sessionId);
    const snapshot = await this.songs.getSnapshot();
    const state = await this.dropMissingSongs(sessionId);
    const storedHash = stored?.dataHash ?? null;
    const dataHashChanged = storedHash !== null && storedHash !== snapshot.dataHash;

    // A reload is reported once: the new hash is recorded without touching the selection time.
    if (stored && state.dataHash !== snapshot.dataHash) {
      this.store.write({ ...state, dataHash: snapshot.dataHash });
    }

    const current = state.currentSongId ? snapshot.byId.get(state.currentSongId) : undefined;
    const next = state.nextSongId ? snapshot.byId.get(state.nextSongId) : undefined;

    return {
      currentSong: current ? formatPerformanceSong(current) : null,
      nextSong: next ? formatPerformanceSong(next) : null,
      hasActivePerformance: state.currentSongId !== null,
      lastUpdatedMs: stored ? state.updatedAtMs : null,
      dataHashChanged,
    };
  }

  async validateState(sessionId: string): Promise<LiveStateValidation> {
    const before = this.readState(sessionId);
    const after = await this.dropMissingSongs(sessionId);

    const currentSongValid = before.currentSongId === after.currentSongId;
    const nextSongValid = before.nextSongId === after.nextSongId;
    return {
      currentSongValid,
      nextSongValid,
      stateCleaned: !(currentSongValid && nextSongValid),
    };
  }

  clear(sessionId: string): void {
    this.store.delete(sessionId);
    this.logger.info(`Session ${sessionId}: performance state cleared`);
  }

  private readState(sessionId: string): LivePerformanceState {
    return this.store.read(sessionId) ?? makeEmptyLiveState(sessionId, this.now());
  }

  private async writeState(state: LivePerformanceState): Promise<LivePerformanceState> {
    const snapshot = await this.songs.getSnapshot();
    const next: LivePerformanceState = { ...state, dataHash: snapshot.dataHash, updatedAtMs: this.now() };
    this.store.write(next);
    return next;
  }

  private async setSong(sessionId: string, field: SongField, songId: string | null): Promise<boolean> {
    const state = this.readState(sessionId);
    const label = field === "currentSongId" ? "Current" : "Next";

    if (songId === null) {
      await this.writeState({ ...state, ...selection(field, null) });
      this.logger.info(`Session ${sessionId}: ${label.toLowerCase()} song cleared`);
      return true;
    }

    const song = await this.songs.getSongById(songId);
    if (!song) {
      this.logger.warn(`Session ${sessionId}: attempted to set unknown song as ${label.toLowerCase()}: ${songId}`);
      return false;
    }

    await this.writeState({ ...state, ...selection(field, song.id) });
    this.logger.info(`Session ${sessionId}: ${label} song set to ${song.id}`);
    return true;
  }

  private async dropMissingSongs(sessionId: string): Promise<LivePerformanceState> {
    const state = this.readState(sessionId);
    const snapshot = await this.songs.getSnapshot();

    const currentMissing = state.currentSongId !== null && !snapshot.byId.has(state.currentSongId);
    const nextMissing = state.nextSongId !== null && !snapshot.byId.has(state.nextSongId);
    if (!currentMissing && !nextMissing) return state;

    if (currentMissing) this.logger.warn(`Session ${sessionId}: cleaned up missing current song ${state.currentSongId}`);
    if (nextMissing) this.logger.warn(`Session ${sessionId}: cleaned up missing next song ${state.nextSongId}`);

    return this.writeState({
      ...state,
      currentSongId: currentMissing ? null : state.currentSongId,
      nextSongId: nextMissing ? null : state.nextSongId,
    });
  }
}
