import { SongFileNotFoundError } from "@/lib/errors";
import type { Logger } from "@/lib/log";
import type { SongSource } from "@/lib/songSource";

export const CSV_HEADER = "Order,Artist,Song,Lead Guitar,Rhythm Guitar,Bass,Drums,Singer,Keyboards,Time";

export function csv(...rows: string[]): string {
  return `${[CSV_HEADER, ...rows].join("\n")}\n`;
}

export type RecordingLogger = Logger & {
  lines: Array<{ level: "info" | "warn" | "error"; message: string }>;
  messages(level: "info" | "warn" | "error"): string[];
};

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    info: (message: string) => {
      lines.push({ level: "info", message });
    },
    warn: (message: string) => {
      lines.push({ level: "warn", message });
    },
    error: (message: string) => {
      lines.push({ level: "error", message });
    },
    messages(level) {
      return lines.filter((line) => line.level === level).map((line) => line.message);
    },
  };
}

export type MemorySongSource = SongSource & {
  calls: { stat: number; read: number };
  /** Replaces the text (or removes the source with `null`) and bumps the mtime. */
  update(text: string | null): void;
  failNextReads(count: number): void;
};

export function createMemorySongSource(initial: string | null, initialMtimeMs = 1_000): MemorySongSource {
  let text = initial;
  let mtimeMs = initialMtimeMs;
  let pendingReadFailures = 0;
  const calls = { stat: 0, read: 0 };

  return {
    description: "memory:songs.csv",
    calls,

    async stat() {
      calls.stat += 1;
      return text === null ? null : { mtimeMs };
    },

    async read() {
      calls.read += 1;
      if (pendingReadFailures > 0) {
        pendingReadFailures -= 1;
        throw new Error("EIO: simulated read failure");
      }
      if (text === null) throw new SongFileNotFoundError("memory:songs.csv");
      return text;
    },

    update(next) {
      text = next;
      mtimeMs += 1_000;
    },

    failNextReads(count) {
      pendingReadFailures = count;
    },
  };
}
