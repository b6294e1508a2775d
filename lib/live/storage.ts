import type { LivePerformanceState } from "@/lib/live/types";
import { validateLiveState } from "@/lib/live/validate";

export { validateLiveState } from "@/lib/live/validate";

export interface LiveStateStore {
  read(sessionId: string): LivePerformanceState | null;
  write(state: LivePerformanceState): void;
  delete(sessionId: string): void;
}

function stateStorageKey(sessionId: string): string {
  return `song-selector-live:${sessionId}`;
}

/**
 * Keeps each session's state as a JSON string, so what comes back out goes
 * through the same validation as any other untrusted payload.
 */
export function createMemoryLiveStateStore(): LiveStateStore & { size(): number } {
  const entries = new Map<string, string>();

  return {
    read(sessionId) {
      const raw = entries.get(stateStorageKey(sessionId));
      if (!raw) return null;

      try {
        const state = validateLiveState(JSON.parse(raw));
        return state?.sessionId === sessionId ? state : null;
      } catch {
        return null;
      }
    },

    write(state) {
      const validated = validateLiveState(state);
      if (!validated) {
        throw new Error("Invalid live performance state payload.");
      }
      entries.set(stateStorageKey(validated.sessionId), JSON.stringify(validated));
    },

    delete(sessionId) {
      entries.delete(stateStorageKey(sessionId));
    },

    size() {
      return entries.size;
    },
  };
}
