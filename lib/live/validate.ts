import { LIVE_STATE_VERSION, type LivePerformanceState } from "@/lib/live/types";

export function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function asNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function validateLiveState(input: unknown): LivePerformanceState | null {
  if (!isObject(input)) return null;

  const version = asString(input.version);
  if (version !== LIVE_STATE_VERSION) return null;

  const sessionId = asString(input.sessionId);
  const updatedAtMs = asNumber(input.updatedAtMs);
  if (!sessionId || updatedAtMs === null) return null;

  return {
    version: LIVE_STATE_VERSION,
    sessionId,
    currentSongId: asString(input.currentSongId),
    nextSongId: asString(input.nextSongId),
    dataHash: asString(input.dataHash),
    updatedAtMs,
  };
}
