// src/engine/config.ts
//
// Match configuration. Everything the simulation and the rules read comes from here;
// there are no module-level knobs.

import type { PlayerCount } from "../types";
import {
  BOARD_SIZE,
  BOARD_MARGIN,
  POCKET_RADIUS,
  CAPTURE_MARGIN,
  COIN_RADIUS,
  QUEEN_RADIUS,
  STRIKER_RADIUS,
  FRICTION,
  REST_THRESHOLD,
  WALL_RESTITUTION,
  MAX_SHOT_SPEED,
  BASELINE_INSET,
  BASELINE_END_INSET,
  STRIKER_IMPACT_THRESHOLD,
  CLACK_THRESHOLD,
  QUEEN_COVER_BONUS,
  FOUL_LIMIT,
} from "./constants";

export interface PhysicsConfig {
  boardSize: number;
  boardMargin: number;
  pocketRadius: number;
  captureMargin: number;
  coinRadius: number;
  queenRadius: number;
  strikerRadius: number;
  friction: number;
  restThreshold: number;
  restitution: number;
  maxShotSpeed: number;
  baselineInset: number;
  baselineEndInset: number;
  strikerImpactThreshold: number;
  clackThreshold: number;
}

export interface RulesConfig {
  coverBonus: number;
  foulLimit: number;

  /**
   * When on, a shot that captures nothing passes the turn straight away.
   * When off, the shooter keeps going until the foul limit forces the turn over.
   */
  passTurnOnMiss: boolean;
}

export interface MatchConfig {
  playerCount: PlayerCount;
  physics: PhysicsConfig;
  rules: RulesConfig;
}

export type MatchConfigOverrides = {
  playerCount?: PlayerCount;
  physics?: Partial<PhysicsConfig>;
  rules?: Partial<RulesConfig>;
};

export const DEFAULT_PHYSICS: Readonly<PhysicsConfig> = {
  boardSize: BOARD_SIZE,
  boardMargin: BOARD_MARGIN,
  pocketRadius: POCKET_RADIUS,
  captureMargin: CAPTURE_MARGIN,
  coinRadius: COIN_RADIUS,
  queenRadius: QUEEN_RADIUS,
  strikerRadius: STRIKER_RADIUS,
  friction: FRICTION,
  restThreshold: REST_THRESHOLD,
  restitution: WALL_RESTITUTION,
  maxShotSpeed: MAX_SHOT_SPEED,
  baselineInset: BASELINE_INSET,
  baselineEndInset: BASELINE_END_INSET,
  strikerImpactThreshold: STRIKER_IMPACT_THRESHOLD,
  clackThreshold: CLACK_THRESHOLD,
};

export const DEFAULT_RULES: Readonly<RulesConfig> = {
  coverBonus: QUEEN_COVER_BONUS,
  foulLimit: FOUL_LIMIT,
  passTurnOnMiss: true,
};

export function makeConfig(overrides: MatchConfigOverrides = {}): MatchConfig {
  const config: MatchConfig = {
    playerCount: overrides.playerCount ?? 2,
    physics: { ...DEFAULT_PHYSICS, ...overrides.physics },
    rules: { ...DEFAULT_RULES, ...overrides.rules },
  };
  validateConfig(config);
  return config;
}

function check(condition: boolean, message: string): void {
  if (!condition) throw new Error(`[config] ${message}`);
}

function positive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function validateConfig(config: MatchConfig): void {
  const p = config.physics;

  check(config.playerCount === 2 || config.playerCount === 4, "playerCount must be 2 or 4");

  check(positive(p.boardSize), "physics.boardSize must be positive");
  check(Number.isFinite(p.boardMargin) && p.boardMargin >= 0, "physics.boardMargin must be >= 0");
  check(positive(p.pocketRadius), "physics.pocketRadius must be positive");
  check(
    Number.isFinite(p.captureMargin) && p.captureMargin >= 0 && p.captureMargin < p.pocketRadius,
    "physics.captureMargin must be in [0, pocketRadius)"
  );
  check(positive(p.coinRadius), "physics.coinRadius must be positive");
  check(positive(p.queenRadius), "physics.queenRadius must be positive");
  check(positive(p.strikerRadius), "physics.strikerRadius must be positive");
  check(p.friction > 0 && p.friction < 1, "physics.friction must be in (0, 1)");
  check(Number.isFinite(p.restThreshold) && p.restThreshold >= 0, "physics.restThreshold must be >= 0");
  check(p.restitution >= 0 && p.restitution <= 1, "physics.restitution must be in [0, 1]");
  check(positive(p.maxShotSpeed), "physics.maxShotSpeed must be positive");
  check(
    Number.isFinite(p.baselineInset) && p.baselineInset >= p.strikerRadius,
    "physics.baselineInset must leave room for the striker"
  );
  check(
    p.boardSize > 2 * (p.strikerRadius + p.baselineEndInset),
    "physics.baselineEndInset leaves no room to place the striker"
  );

  check(Number.isInteger(config.rules.coverBonus) && config.rules.coverBonus >= 0, "rules.coverBonus must be a non-negative integer");
  check(Number.isInteger(config.rules.foulLimit) && config.rules.foulLimit >= 1, "rules.foulLimit must be a positive integer");
  check(typeof config.rules.passTurnOnMiss === "boolean", "rules.passTurnOnMiss must be boolean");
}
