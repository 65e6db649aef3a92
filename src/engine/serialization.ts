import type { MatchSnapshot } from "./snapshotFormat";
import { validateSnapshot } from "./validateSnapshot";

export function serializeSnapshot(snapshot: MatchSnapshot): string {
  return JSON.stringify(snapshot);
}

/**
 * Parse and validate. Throws on malformed JSON or a malformed snapshot.
 */
export function deserializeSnapshot(json: string): MatchSnapshot {
  const parsed: unknown = JSON.parse(json);
  return validateSnapshot(parsed, "deserializeSnapshot");
}
