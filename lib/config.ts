import { DEFAULT_RETRY_CONFIG, type RetryConfig } from "@/lib/retry";

export const DEFAULT_SONGS_CSV_PATH = "data/songs.csv";
export const DEFAULT_ERROR_THRESHOLD = 5;

export type SongDataConfig = {
  csvPath: string;
  errorThreshold: number;
  retry: RetryConfig;
};

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | null {
  const raw = env[name];
  if (!raw) return null;
  const trimmed = raw.trim();
  return trimmed ? trimmed : null;
}

function envNumber(
  env: Env,
  name: string,
  fallback: number,
  check: { integer: boolean; min: number }
): number {
  const raw = envString(env, name);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || (check.integer && !Number.isInteger(value)) || value < check.min) {
    const kind = check.integer ? "an integer" : "a number";
    throw new Error(`Invalid env var: ${name} must be ${kind} >= ${check.min} (got "${raw}")`);
  }
  return value;
}

export function getSongDataConfig(env: Env = process.env): SongDataConfig {
  return {
    csvPath: envString(env, "SONGS_CSV_PATH") ?? DEFAULT_SONGS_CSV_PATH,
    errorThreshold: envNumber(env, "SONGS_ERROR_THRESHOLD", DEFAULT_ERROR_THRESHOLD, { integer: true, min: 1 }),
    retry: {
      maxAttempts: envNumber(env, "SONGS_LOAD_MAX_ATTEMPTS", DEFAULT_RETRY_CONFIG.maxAttempts, {
        integer: true,
        min: 1,
      }),
      delayMs: envNumber(env, "SONGS_LOAD_RETRY_DELAY_MS", DEFAULT_RETRY_CONFIG.delayMs, { integer: true, min: 0 }),
      backoffFactor: envNumber(env, "SONGS_LOAD_BACKOFF_FACTOR", DEFAULT_RETRY_CONFIG.backoffFactor, {
        integer: false,
        min: 1,
      }),
    },
  };
}
