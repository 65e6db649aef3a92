import type { ShotInput } from "../types";
import type { ReplayEntry } from "./replay";
import type { ReplayFile } from "./replayFormat";
import { REPLAY_FORMAT_VERSION } from "./replayFormat";
import { restoreMatch } from "./snapshot";
import { hashMatch } from "./stateHash";
import { playShot } from "./sync";
import { validateSnapshot } from "./validateSnapshot";

function isIsoDateString(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const t = Date.parse(s);
  return Number.isFinite(t) && new Date(t).toISOString() === s;
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isFiniteNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function parseShotInput(raw: unknown, i: number): ShotInput {
  if (!isRecord(raw)) throw new Error(`Invalid replay log[${i}].shot`);
  if (!isFiniteNumber(raw.angle)) throw new Error(`Invalid replay log[${i}].shot.angle`);
  if (!isFiniteNumber(raw.power)) throw new Error(`Invalid replay log[${i}].shot.power`);

  const shot: ShotInput = { angle: raw.angle, power: raw.power };
  if (raw.strikerOffset !== undefined) {
    if (!isFiniteNumber(raw.strikerOffset)) throw new Error(`Invalid replay log[${i}].shot.strikerOffset`);
    shot.strikerOffset = raw.strikerOffset;
  }
  return shot;
}

function parseEntry(raw: unknown, i: number): ReplayEntry {
  if (!isRecord(raw)) throw new Error(`Invalid replay log[${i}]`);
  if (!isString(raw.beforeHash)) throw new Error(`Invalid replay log[${i}].beforeHash`);
  if (!isString(raw.afterHash)) throw new Error(`Invalid replay log[${i}].afterHash`);

  const captures = raw.captures;
  if (!Array.isArray(captures) || !captures.every(isString)) {
    throw new Error(`Invalid replay log[${i}].captures`);
  }

  return {
    beforeHash: raw.beforeHash,
    shot: parseShotInput(raw.shot, i),
    captures: [...captures],
    afterHash: raw.afterHash,
  };
}

/**
 * Shape check for a parsed replay file. Returns a typed copy or throws.
 */
export function validateReplayFile(raw: unknown): ReplayFile {
  if (!isRecord(raw)) {
    throw new Error("Invalid replay: not an object");
  }

  if (raw.formatVersion !== REPLAY_FORMAT_VERSION) {
    throw new Error(`Invalid replay formatVersion: ${String(raw.formatVersion)}`);
  }

  if (!isIsoDateString(raw.createdAt)) {
    throw new Error(`Invalid replay createdAt: ${String(raw.createdAt)}`);
  }

  if (!raw.initialSnapshot) {
    throw new Error("Invalid replay initialSnapshot");
  }
  const initialSnapshot = validateSnapshot(raw.initialSnapshot, "replay.initialSnapshot");

  if (!Array.isArray(raw.log)) {
    throw new Error("Invalid replay log");
  }
  const log = raw.log.map((e: unknown, i: number) => parseEntry(e, i));

  return {
    formatVersion: REPLAY_FORMAT_VERSION,
    createdAt: raw.createdAt,
    initialSnapshot,
    log,
  };
}

export type ReplayVerification =
  | { ok: true; shots: number }
  | { ok: false; index: number; reason: string };

function sameCaptures(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

/**
 * Re-simulate every recorded shot from the initial snapshot and compare hashes.
 * Reports the first entry that diverges.
 */
export function verifyReplay(replay: ReplayFile): ReplayVerification {
  const match = restoreMatch(replay.initialSnapshot);

  for (let i = 0; i < replay.log.length; i++) {
    const entry = replay.log[i];

    if (hashMatch(match) !== entry.beforeHash) {
      return { ok: false, index: i, reason: "beforeHash mismatch" };
    }

    let captures: string[];
    try {
      captures = playShot(match, entry.shot).captures;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, index: i, reason: message };
    }

    if (!sameCaptures(captures, entry.captures)) {
      return { ok: false, index: i, reason: "captures mismatch" };
    }
    if (hashMatch(match) !== entry.afterHash) {
      return { ok: false, index: i, reason: "afterHash mismatch" };
    }
  }

  return { ok: true, shots: replay.log.length };
}
