import type { DiscKind, MatchPhase, MatchState, PlayerNumber, ShotCapture, ShotRecord } from "../types";
import { validateConfig, type MatchConfig, type PhysicsConfig, type RulesConfig } from "./config";
import { STRIKER_ID } from "./physicsWorld";
import { isPlayerNumber } from "./sides";
import { SNAPSHOT_FORMAT_VERSION, type DiscSnapshot, type MatchSnapshot } from "./snapshotFormat";

/**
 * validateSnapshot
 *
 * Takes untrusted input (parsed JSON, a save file, a client message) and returns a fresh,
 * fully typed snapshot, or throws `[validateSnapshot @ where] ...`.
 *
 * Shape and cross-field consistency only: it does not re-run physics or rules.
 */
export function validateSnapshot(raw: unknown, where = "unknown"): MatchSnapshot {
  const root = record(raw, "snapshot", where);

  assert(root.formatVersion === SNAPSHOT_FORMAT_VERSION, `unsupported formatVersion: ${String(root.formatVersion)}`, where);

  const config = parseConfig(root.config, where);
  const striker = parseDisc(root.striker, "striker", where);
  assert(striker.id === STRIKER_ID && striker.kind === "Striker", "striker has wrong id or kind", where);

  assert(Array.isArray(root.coins), "coins not array", where);
  const coins = root.coins.map((c: unknown, i: number) => parseDisc(c, `coins[${i}]`, where));
  const ids = new Set<string>();
  for (const coin of coins) {
    assert(coin.kind !== "Striker", `coin ${coin.id} cannot be a striker`, where);
    assert(!ids.has(coin.id) && coin.id !== STRIKER_ID, `duplicate disc id: ${coin.id}`, where);
    ids.add(coin.id);
  }

  const state = parseState(root.state, config, where);

  const shot = root.shot === null ? null : parseShot(root.shot, ids, where);
  assert((state.phase === "ShotInFlight") === (shot !== null), "shot must be present exactly while ShotInFlight", where);

  // The queen's captured flag matches queenPocketed, except for a queen dropped by the shot in flight.
  const queen = coins.find((c) => c.kind === "Queen");
  const droppedThisShot = !!queen && !!shot && shot.captures.some((c) => c.discId === queen.id);
  assert(!queen?.captured || state.queenPocketed || droppedThisShot, "captured queen requires queenPocketed", where);
  assert(!state.queenPocketed || !!queen?.captured, "queenPocketed requires a captured queen", where);

  const tick = root.tick;
  assert(typeof tick === "number" && Number.isInteger(tick) && tick >= 0, "tick invalid", where);

  return { formatVersion: SNAPSHOT_FORMAT_VERSION, config, striker, coins, state, shot, tick };
}

// -------------------------------------
// Sections
// -------------------------------------

function parseConfig(raw: unknown, where: string): MatchConfig {
  const c = record(raw, "config", where);
  const playerCount = c.playerCount;
  assert(playerCount === 2 || playerCount === 4, "config.playerCount must be 2 or 4", where);

  const p = record(c.physics, "config.physics", where);
  const num = (key: keyof PhysicsConfig): number => finite(p[key], `config.physics.${key}`, where);
  const physics: PhysicsConfig = {
    boardSize: num("boardSize"),
    boardMargin: num("boardMargin"),
    pocketRadius: num("pocketRadius"),
    captureMargin: num("captureMargin"),
    coinRadius: num("coinRadius"),
    queenRadius: num("queenRadius"),
    strikerRadius: num("strikerRadius"),
    friction: num("friction"),
    restThreshold: num("restThreshold"),
    restitution: num("restitution"),
    maxShotSpeed: num("maxShotSpeed"),
    baselineInset: num("baselineInset"),
    baselineEndInset: num("baselineEndInset"),
    strikerImpactThreshold: num("strikerImpactThreshold"),
    clackThreshold: num("clackThreshold"),
  };

  const r = record(c.rules, "config.rules", where);
  assert(typeof r.passTurnOnMiss === "boolean", "config.rules.passTurnOnMiss invalid", where);
  const rules: RulesConfig = {
    coverBonus: finite(r.coverBonus, "config.rules.coverBonus", where),
    foulLimit: finite(r.foulLimit, "config.rules.foulLimit", where),
    passTurnOnMiss: r.passTurnOnMiss,
  };

  const config: MatchConfig = { playerCount, physics, rules };
  validateConfig(config);
  return config;
}

const DISC_KINDS: readonly DiscKind[] = ["RegularLight", "RegularDark", "Queen", "Striker"];
const PHASES: readonly MatchPhase[] = ["AwaitingShot", "ShotInFlight", "TurnResolution", "GameOver"];

function isDiscKind(x: unknown): x is DiscKind {
  return DISC_KINDS.some((k) => k === x);
}

function isPhase(x: unknown): x is MatchPhase {
  return PHASES.some((p) => p === x);
}

function parseDisc(raw: unknown, label: string, where: string): DiscSnapshot {
  const d = record(raw, label, where);
  assert(typeof d.id === "string" && d.id.length > 0, `${label}.id invalid`, where);
  assert(isDiscKind(d.kind), `${label}.kind invalid`, where);
  assert(typeof d.captured === "boolean", `${label}.captured invalid`, where);
  return {
    id: d.id,
    kind: d.kind,
    x: finite(d.x, `${label}.x`, where),
    y: finite(d.y, `${label}.y`, where),
    vx: finite(d.vx, `${label}.vx`, where),
    vy: finite(d.vy, `${label}.vy`, where),
    captured: d.captured,
  };
}

function parsePlayerOrNull(x: unknown, config: MatchConfig, label: string, where: string): PlayerNumber | null {
  if (x === null) return null;
  assert(isPlayerNumber(x, config.playerCount), `${label} invalid`, where);
  return x;
}

function parseState(raw: unknown, config: MatchConfig, where: string): MatchState {
  const s = record(raw, "state", where);

  assert(s.playerCount === config.playerCount, "state.playerCount does not match config", where);

  assert(Array.isArray(s.scores), "state.scores not array", where);
  assert(s.scores.length === config.playerCount, "state.scores has wrong length", where);
  const scores = s.scores.map((v: unknown, i: number) => {
    assert(typeof v === "number" && Number.isInteger(v) && v >= 0, `state.scores[${i}] invalid`, where);
    return v;
  });

  assert(isPlayerNumber(s.currentPlayer, config.playerCount), "state.currentPlayer invalid", where);
  assert(typeof s.queenPocketed === "boolean", "state.queenPocketed invalid", where);
  assert(typeof s.queenCovered === "boolean", "state.queenCovered invalid", where);
  assert(typeof s.pendingQueenCover === "boolean", "state.pendingQueenCover invalid", where);
  assert(!s.pendingQueenCover || s.queenPocketed, "pendingQueenCover requires queenPocketed", where);

  assert(isPhase(s.phase), "state.phase invalid", where);
  assert(s.phase !== "TurnResolution", "state.phase TurnResolution is never stored", where);

  // The counter only reaches the limit between a release and its resolution.
  const foulCount = s.foulCount;
  const foulCap = s.phase === "ShotInFlight" ? config.rules.foulLimit : config.rules.foulLimit - 1;
  assert(typeof foulCount === "number" && Number.isInteger(foulCount) && foulCount >= 0, "state.foulCount invalid", where);
  assert(foulCount <= foulCap, "state.foulCount at or past the foul limit", where);
  assert(typeof s.message === "string", "state.message invalid", where);

  const winner = parsePlayerOrNull(s.winner, config, "state.winner", where);
  assert((s.phase === "GameOver") === (winner !== null), "winner must be set exactly in GameOver", where);

  return {
    playerCount: config.playerCount,
    scores,
    currentPlayer: s.currentPlayer,
    queenPocketed: s.queenPocketed,
    queenCovered: s.queenCovered,
    queenCoveredBy: parsePlayerOrNull(s.queenCoveredBy, config, "state.queenCoveredBy", where),
    pendingQueenCover: s.pendingQueenCover,
    foulCount,
    winner,
    phase: s.phase,
    message: s.message,
  };
}

function parseShot(raw: unknown, coinIds: ReadonlySet<string>, where: string): ShotRecord {
  const r = record(raw, "shot", where);
  assert(typeof r.strikerCaptured === "boolean", "shot.strikerCaptured invalid", where);
  assert(Array.isArray(r.captures), "shot.captures not array", where);

  const captures = r.captures.map((c: unknown, i: number): ShotCapture => {
    const cap = record(c, `shot.captures[${i}]`, where);
    assert(typeof cap.discId === "string" && coinIds.has(cap.discId), `shot.captures[${i}].discId unknown`, where);
    assert(
      cap.kind === "RegularLight" || cap.kind === "RegularDark" || cap.kind === "Queen",
      `shot.captures[${i}].kind invalid`,
      where
    );
    const pocket = cap.pocket;
    assert(typeof pocket === "number" && Number.isInteger(pocket) && pocket >= 0 && pocket <= 3, `shot.captures[${i}].pocket invalid`, where);
    return { discId: cap.discId, kind: cap.kind, pocket };
  });

  return { captures, strikerCaptured: r.strikerCaptured };
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateSnapshot @ ${where}] ${message}`);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function record(x: unknown, label: string, where: string): Record<string, unknown> {
  assert(isRecord(x), `${label} missing or not an object`, where);
  return x;
}

function finite(x: unknown, label: string, where: string): number {
  assert(typeof x === "number" && Number.isFinite(x), `${label} not a finite number`, where);
  return x;
}
