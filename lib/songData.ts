import { getSongDataConfig, type SongDataConfig } from "@/lib/config";
import { buildConsistencyReport } from "@/lib/consistency";
import { SongFileNotFoundError, toSongDataError, type SongDataError } from "@/lib/errors";
import { consoleLogger, type Logger } from "@/lib/log";
import { findNextSong, findPreviousSong } from "@/lib/ordering";
import { withRetry } from "@/lib/retry";
import { buildSongRecords, createFallbackSnapshot, createSnapshot } from "@/lib/snapshot";
import { createFileSongSource, type SongSource } from "@/lib/songSource";
import type {
  ConsistencyReport,
  DropdownEntry,
  HealthStatus,
  MusicianDetail,
  MusicianSummary,
  SongDetail,
  SongRecord,
  SongSnapshot,
} from "@/lib/types";
import { formatMusicianDetail, formatSongDetail, listMusicians } from "@/lib/views";

export type SongDataProcessorOptions = {
  source: SongSource;
  errorThreshold: SongDataConfig["errorThreshold"];
  retry: SongDataConfig["retry"];
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  buildRecords?: (text: string, logger: Logger) => SongRecord[];
};

/**
 * In-memory cache over the song CSV.
 *
 * Reads are served from an immutable snapshot. Every read stats the source and
 * reloads when its modification time moved, it disappeared, or nothing real
 * has been loaded yet. Reloads are single-flight: callers arriving during a
 * load share it.
 *
 * When a load fails the last good snapshot keeps being served. Without one,
 * the error is rethrown until `errorThreshold` consecutive failures have been
 * counted, after which a single placeholder song is served until
 * `clearErrorState()`.
 */
export class SongDataProcessor {
  private readonly source: SongSource;
  private readonly errorThreshold: number;
  private readonly retry: SongDataConfig["retry"];
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly buildRecords: (text: string, logger: Logger) => SongRecord[];

  private snapshot: SongSnapshot | null = null;
  private fallback: SongSnapshot | null = null;
  private errorCount = 0;
  private inFlight: Promise<SongSnapshot> | null = null;

  constructor(options: SongDataProcessorOptions) {
    this.source = options.source;
    this.errorThreshold = options.errorThreshold;
    this.retry = options.retry;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep;
    this.buildRecords = options.buildRecords ?? buildSongRecords;
  }

  /** Current snapshot, reloading first when the source changed. */
  getSnapshot(): Promise<SongSnapshot> {
    if (this.inFlight) return this.inFlight;
    return this.track(() => this.refresh());
  }

  /** Resets the error state and reloads regardless of modification time. */
  async forceReload(): Promise<SongSnapshot> {
    while (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    this.clearErrorState();
    return this.track(() => this.load());
  }

  clearErrorState(): void {
    this.errorCount = 0;
    this.fallback = null;
    this.logger.info("Error state cleared");
  }

  /** Waits for any running load, then drops all cached state. */
  async dispose(): Promise<void> {
    while (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    this.snapshot = null;
    this.fallback = null;
    this.errorCount = 0;
  }

  async getAllSongs(): Promise<readonly SongRecord[]> {
    return (await this.getSnapshot()).records;
  }

  async getDropdown(): Promise<readonly DropdownEntry[]> {
    return (await this.getSnapshot()).dropdown;
  }

  async getSongById(id: string): Promise<SongRecord | null> {
    return (await this.getSnapshot()).byId.get(id) ?? null;
  }

  async getNextSong(id: string): Promise<SongRecord | null> {
    return findNextSong((await this.getSnapshot()).records, id);
  }

  async getPreviousSong(id: string): Promise<SongRecord | null> {
    return findPreviousSong((await this.getSnapshot()).records, id);
  }

  async getSongDetail(id: string): Promise<SongDetail | null> {
    const snapshot = await this.getSnapshot();
    const record = snapshot.byId.get(id);
    return record ? formatSongDetail(snapshot, record) : null;
  }

  async listMusicians(): Promise<MusicianSummary[]> {
    return listMusicians((await this.getSnapshot()).records);
  }

  async getMusicianDetail(id: string): Promise<MusicianDetail | null> {
    return formatMusicianDetail((await this.getSnapshot()).records, id);
  }

  async checkConsistency(): Promise<ConsistencyReport> {
    return buildConsistencyReport((await this.getSnapshot()).records);
  }

  /** Status without triggering a load. */
  async getHealthStatus(): Promise<HealthStatus> {
    const served = this.served();
    return {
      loaded: served !== null,
      count: served?.records.length ?? 0,
      cacheValid: await this.isCacheValid(),
      errorCount: this.errorCount,
      errorThreshold: this.errorThreshold,
      fallbackActive: served?.isFallback ?? false,
      lastLoadedAtMs: served?.loadedAtMs ?? null,
      dataHash: served?.dataHash ?? null,
    };
  }

  private served(): SongSnapshot | null {
    return this.snapshot ?? this.fallback;
  }

  private track(task: () => Promise<SongSnapshot>): Promise<SongSnapshot> {
    const run = (async () => {
      try {
        return await task();
      } finally {
        this.inFlight = null;
      }
    })();
    this.inFlight = run;
    return run;
  }

  private async isCacheValid(): Promise<boolean> {
    if (!this.snapshot) return false;
    try {
      const stat = await this.source.stat();
      return stat !== null && stat.mtimeMs === this.snapshot.sourceMtimeMs;
    } catch (err) {
      this.logger.warn(`Could not stat ${this.source.description}`, err);
      return false;
    }
  }

  private async refresh(): Promise<SongSnapshot> {
    if (this.snapshot && (await this.isCacheValid())) return this.snapshot;
    return this.load();
  }

  private async load(): Promise<SongSnapshot> {
    try {
      const stat = await this.source.stat();
      if (!stat) throw new SongFileNotFoundError(this.source.description);

      const text = await withRetry(() => this.source.read(), {
        ...this.retry,
        sleep: this.sleep,
        shouldRetry: (err) => !(err instanceof SongFileNotFoundError),
        onRetry: (err, attempt, waitMs) => {
          this.logger.warn(`Read attempt ${attempt} failed for ${this.source.description}, retrying in ${waitMs}ms`, err);
        },
      });

      const records = this.buildRecords(text, this.logger);
      const snapshot = createSnapshot(records, { sourceMtimeMs: stat.mtimeMs, loadedAtMs: this.now() });

      const report = buildConsistencyReport(snapshot.records);
      if (!report.valid) {
        this.logger.warn(`Data integrity issues found: ${report.issues.join("; ")}`);
      }

      this.snapshot = snapshot;
      this.fallback = null;
      this.errorCount = 0;
      this.logger.info(`Loaded ${snapshot.records.length} songs from ${this.source.description}`);
      return snapshot;
    } catch (err) {
      return this.recover(toSongDataError(err));
    }
  }

  private recover(error: SongDataError): SongSnapshot {
    this.errorCount += 1;
    this.logger.error(`Song data load failed (${error.kind}): ${error.message}`);

    if (this.snapshot && this.snapshot.records.length > 0) {
      this.logger.info(`Recovered from cached data after ${error.kind} error`);
      return this.snapshot;
    }

    if (this.errorCount >= this.errorThreshold) {
      if (!this.fallback) {
        this.logger.warn(`Error threshold (${this.errorThreshold}) reached, serving placeholder data`);
        this.fallback = createFallbackSnapshot(this.now());
      }
      return this.fallback;
    }

    throw error;
  }
}

export function createSongDataProcessor(
  config: SongDataConfig = getSongDataConfig(),
  logger: Logger = consoleLogger
): SongDataProcessor {
  return new SongDataProcessor({
    source: createFileSongSource(config.csvPath),
    errorThreshold: config.errorThreshold,
    retry: config.retry,
    logger,
  });
}
