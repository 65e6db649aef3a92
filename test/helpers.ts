import type { Disc, DiscKind, MatchState, PlayerCount, ShotCapture, ShotRecord } from "../src/types";
import { createMatch, type CreateMatchOptions, type DiscSeed, type Match } from "../src/engine";
import { DEFAULT_PHYSICS, DEFAULT_RULES, type PhysicsConfig, type RulesConfig } from "../src/engine/config";
import { makeDisc } from "../src/engine/disc";
import { makeMatchState } from "../src/engine/matchState";
import type { BoardReport } from "../src/engine/ruleEngine";

export const physics = (overrides: Partial<PhysicsConfig> = {}): PhysicsConfig => ({
  ...DEFAULT_PHYSICS,
  ...overrides,
});

export const rules = (overrides: Partial<RulesConfig> = {}): RulesConfig => ({
  ...DEFAULT_RULES,
  ...overrides,
});

export function seed(kind: DiscSeed["kind"], x: number, y: number): DiscSeed {
  return { kind, x, y };
}

export function disc(
  id: string,
  kind: DiscKind,
  x: number,
  y: number,
  v: { vx?: number; vy?: number } = {}
): Disc {
  const d = makeDisc(id, kind, x, y, physics());
  d.vx = v.vx ?? 0;
  d.vy = v.vy ?? 0;
  return d;
}

/**
 * Striker in the middle of the board with one light coin on the diagonal towards the
 * top-left pocket. The other two coins sit well away from that line.
 */
export function diagonalLayout(target: DiscSeed["kind"] = "RegularLight"): DiscSeed[] {
  return [seed(target, 300, 300), seed("RegularLight", 600, 600), seed("RegularDark", 600, 200)];
}

/** Angle and power that send the striker from (400, 400) through (300, 300). */
export const DIAGONAL_SHOT = { angle: (-3 * Math.PI) / 4, power: 0.5 } as const;

export function makeDiagonalMatch(opts: CreateMatchOptions = {}, target: DiscSeed["kind"] = "RegularLight"): Match {
  return createMatch({ layout: diagonalLayout(target), strikerAt: { x: 400, y: 400 }, ...opts });
}

// Rule-engine builders

export interface MakeStateArgs {
  playerCount?: PlayerCount;
  patch?: Partial<MatchState>;
}

export function makeState(args: MakeStateArgs = {}): MatchState {
  return { ...makeMatchState(args.playerCount ?? 2), ...args.patch };
}

export function cap(discId: string, kind: ShotCapture["kind"], pocket = 0): ShotCapture {
  return { discId, kind, pocket };
}

export function shotRecord(captures: ShotCapture[] = [], strikerCaptured = false): ShotRecord {
  return { captures, strikerCaptured };
}

export function board(light = 5, dark = 5): BoardReport {
  return { remaining: { light, dark } };
}
