import type { Match } from "./match";
import { snapshotMatch } from "./snapshot";
import type { MatchSnapshot } from "./snapshotFormat";

/**
 * Deterministic hash of a match.
 * Used for replay verification, save-file integrity and client sync.
 */
export function hashMatch(match: Match): string {
  return hashSnapshot(snapshotMatch(match));
}

export function hashSnapshot(snapshot: MatchSnapshot): string {
  // Snapshot key order is fixed by snapshotMatch, so the JSON text is stable.
  return JSON.stringify(snapshot);
}
