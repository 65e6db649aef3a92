import fs from "node:fs";
import path from "node:path";
import type { Match, MatchSnapshot } from "../engine";
import { hashSnapshot, restoreMatch, snapshotMatch, validateSnapshot } from "../engine";

export type PersistedTableV1 = {
  version: 1;
  savedAt: string; // ISO
  snapshot: MatchSnapshot;
  stateHash: string;
};

export type PersistenceOptions = {
  /** Full path to the JSON file used for persistence. */
  filePath: string;
};

function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Write the match to disk. Refused while a shot is in flight: saves are taken between shots.
 */
export function saveTable(match: Match, opts: PersistenceOptions): PersistedTableV1 {
  if (match.state.phase === "ShotInFlight") {
    throw new Error("Cannot save while a shot is in flight.");
  }

  const snapshot = snapshotMatch(match);
  const payload: PersistedTableV1 = {
    version: 1,
    savedAt: new Date().toISOString(),
    snapshot,
    stateHash: hashSnapshot(snapshot),
  };

  ensureDirForFile(opts.filePath);
  fs.writeFileSync(opts.filePath, JSON.stringify(payload, null, 2), "utf8");
  return payload;
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

/**
 * Read a saved match back. Throws on a missing file, a malformed payload or a hash mismatch.
 */
export function loadTable(opts: PersistenceOptions): Match {
  const raw = fs.readFileSync(opts.filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);

  if (!isObject(parsed)) {
    throw new Error("Persisted table is not an object.");
  }

  const version = parsed["version"];
  if (version !== 1) {
    throw new Error(`Unsupported persisted table version: ${String(version)}`);
  }

  if (typeof parsed["savedAt"] !== "string") {
    throw new Error("Persisted table missing savedAt string.");
  }

  const stateHash = parsed["stateHash"];
  if (typeof stateHash !== "string") {
    throw new Error("Persisted table missing stateHash string.");
  }

  const snapshot = validateSnapshot(parsed["snapshot"], "loadTable");
  const computedHash = hashSnapshot(snapshot);

  if (computedHash !== stateHash) {
    throw new Error("Persisted table hash mismatch.");
  }

  return restoreMatch(snapshot);
}

/**
 * Utility: return true if the persistence file exists.
 */
export function hasPersistedTable(opts: PersistenceOptions): boolean {
  return fs.existsSync(opts.filePath);
}
