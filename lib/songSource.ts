import fs from "node:fs/promises";

import { SongFileNotFoundError, isMissingFileError } from "@/lib/errors";

export type SongSourceStat = {
  mtimeMs: number;
};

/** Where song CSV text comes from. `stat()` resolves `null` when the source is missing. */
export interface SongSource {
  readonly description: string;
  stat(): Promise<SongSourceStat | null>;
  read(): Promise<string>;
}

export function createFileSongSource(path: string): SongSource {
  return {
    description: path,

    async stat() {
      try {
        const info = await fs.stat(path);
        return { mtimeMs: info.mtimeMs };
      } catch (err) {
        if (isMissingFileError(err)) return null;
        throw err;
      }
    },

    async read() {
      try {
        return await fs.readFile(path, "utf8");
      } catch (err) {
        if (isMissingFileError(err)) throw new SongFileNotFoundError(path);
        throw err;
      }
    },
  };
}
