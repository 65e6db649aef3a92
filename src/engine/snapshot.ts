// src/engine/snapshot.ts
//
// Plain, JSON-safe copies of a match. Velocities and the in-flight shot are kept, so a
// snapshot taken mid-shot resumes exactly where it left off.

import type { Disc } from "../types";
import type { MatchConfig } from "./config";
import { makeDisc } from "./disc";
import type { Match } from "./match";
import { cloneMatchState } from "./matchState";
import { makeWorld } from "./physicsWorld";
import type { RestoreResponse } from "./serverEnvelope";
import { cloneShotRecord } from "./shotRecord";
import { SNAPSHOT_FORMAT_VERSION, type DiscSnapshot, type MatchSnapshot } from "./snapshotFormat";
import { validateSnapshot } from "./validateSnapshot";

function discSnapshot(d: Disc): DiscSnapshot {
  return { id: d.id, kind: d.kind, x: d.x, y: d.y, vx: d.vx, vy: d.vy, captured: d.captured };
}

function cloneConfig(config: MatchConfig): MatchConfig {
  return {
    playerCount: config.playerCount,
    physics: { ...config.physics },
    rules: { ...config.rules },
  };
}

export function snapshotMatch(match: Match): MatchSnapshot {
  return {
    formatVersion: SNAPSHOT_FORMAT_VERSION,
    config: cloneConfig(match.config),
    striker: discSnapshot(match.world.striker),
    coins: match.world.coins.map(discSnapshot),
    state: cloneMatchState(match.state),
    shot: match.shot ? cloneShotRecord(match.shot) : null,
    tick: match.tick,
  };
}

function reviveDisc(s: DiscSnapshot, config: MatchConfig): Disc {
  const disc = makeDisc(s.id, s.kind, s.x, s.y, config.physics);
  disc.vx = s.vx;
  disc.vy = s.vy;
  disc.captured = s.captured;
  return disc;
}

/**
 * Build a live match from a snapshot. Throws on anything malformed; nothing outside the
 * returned match is touched either way.
 */
export function restoreMatch(raw: unknown): Match {
  const snapshot = validateSnapshot(raw, "restoreMatch");
  const config = cloneConfig(snapshot.config);

  const world = makeWorld(config.physics, [], { x: snapshot.striker.x, y: snapshot.striker.y });
  const striker = world.striker;
  striker.vx = snapshot.striker.vx;
  striker.vy = snapshot.striker.vy;
  striker.captured = snapshot.striker.captured;
  world.coins.push(...snapshot.coins.map((c) => reviveDisc(c, config)));

  return {
    config,
    world,
    state: cloneMatchState(snapshot.state),
    shot: snapshot.shot ? cloneShotRecord(snapshot.shot) : null,
    tick: snapshot.tick,
  };
}

export function tryRestore(raw: unknown): RestoreResponse {
  try {
    return { ok: true, match: restoreMatch(raw) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: { code: "CORRUPT_SNAPSHOT", message } };
  }
}
