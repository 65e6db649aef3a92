// src/engine/match.ts
//
// The match facade: one PhysicsWorld, one MatchState, and the shot currently in flight.
// The world is stepped by advanceTick; the rule engine runs once, on the tick the world
// comes to rest after a shot.

import type { MatchState, ShotRecord, TickResult, TurnOutcome, Vec2 } from "../types";
import { makeConfig, type MatchConfig, type MatchConfigOverrides } from "./config";
import { baselinePoint, openingLayout, strikerBaseline, type DiscSeed } from "./layout";
import { makeMatchState } from "./matchState";
import {
  discPositions,
  freeStrikerSpot,
  isWorldAtRest,
  makeWorld,
  placeStriker,
  remainingCoins,
  returnQueenToCenter,
  stepWorld,
  STRIKER_ID,
  type PhysicsWorld,
} from "./physicsWorld";
import { resolveShot, type WorldIntent } from "./ruleEngine";
import type { PlaceResponse } from "./serverEnvelope";
import { recordCaptures } from "./shotRecord";

export interface Match {
  readonly config: MatchConfig;
  readonly world: PhysicsWorld;
  readonly state: MatchState;

  // Captures gathered since the striker was released; null between shots.
  shot: ShotRecord | null;

  // Ticks simulated so far. Idle ticks between shots are not counted.
  tick: number;
}

export type CreateMatchOptions = MatchConfigOverrides & {
  /** Coin placement; defaults to the opening formation. */
  layout?: readonly DiscSeed[];

  /** Striker start; defaults to the middle of player 1's baseline. */
  strikerAt?: Vec2;
};

export function createMatch(opts: CreateMatchOptions = {}): Match {
  const config = makeConfig(opts);
  const physics = config.physics;
  const layout = opts.layout ?? openingLayout(physics);
  const strikerAt = opts.strikerAt ?? baselinePoint(strikerBaseline(1, config.playerCount, physics));

  return {
    config,
    world: makeWorld(physics, layout, strikerAt),
    state: makeMatchState(config.playerCount),
    shot: null,
    tick: 0,
  };
}

/**
 * Slide the striker along the current player's baseline. Only while aiming.
 * A spot taken by a coin moves the striker to the nearest free point on the baseline.
 */
export function positionStriker(match: Match, offset: number): PlaceResponse {
  if (match.state.phase !== "AwaitingShot") {
    return {
      ok: false,
      error: { code: "INVALID_INPUT", message: `Cannot move the striker while ${match.state.phase}.` },
    };
  }
  if (typeof offset !== "number" || !Number.isFinite(offset)) {
    return { ok: false, error: { code: "INVALID_INPUT", message: "Striker offset must be a finite number." } };
  }

  const { config, world, state } = match;
  const baseline = strikerBaseline(state.currentPlayer, config.playerCount, config.physics);
  const at = freeStrikerSpot(world, baseline, baselinePoint(baseline, offset));
  if (at === null) {
    return { ok: false, error: { code: "INVALID_INPUT", message: "No free spot for the striker on the baseline." } };
  }
  placeStriker(world, at);
  return { ok: true, striker: at };
}

function applyIntents(match: Match, intents: readonly WorldIntent[]): void {
  const { config, world } = match;
  for (const intent of intents) {
    switch (intent.kind) {
      case "returnQueen":
        returnQueenToCenter(world);
        break;
      case "resetStriker": {
        const baseline = strikerBaseline(intent.player, config.playerCount, config.physics);
        const middle = baselinePoint(baseline);
        placeStriker(world, freeStrikerSpot(world, baseline, middle) ?? middle);
        break;
      }
      default: {
        const _exhaustive: never = intent;
        throw new Error(`Unknown world intent: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
}

function finishShot(match: Match, record: ShotRecord): TurnOutcome {
  match.shot = null;
  const { outcome, intents } = resolveShot(
    match.state,
    record,
    { remaining: remainingCoins(match.world) },
    match.config.rules
  );
  applyIntents(match, intents);
  return outcome;
}

/**
 * Advance one frame. Between shots this only reports positions; nothing moves.
 */
export function advanceTick(match: Match): TickResult {
  const { world } = match;
  const record = match.shot;

  if (match.state.phase !== "ShotInFlight" || record === null) {
    return {
      tick: match.tick,
      positions: discPositions(world),
      captures: [],
      events: [],
      atRest: isWorldAtRest(world),
    };
  }

  match.tick += 1;
  const step = stepWorld(world);
  recordCaptures(record, step.captures, step.strikerCaptured);

  const captures = step.captures.map((c) => c.discId);
  if (step.strikerCaptured) captures.push(STRIKER_ID);

  const outcome = step.atRest ? finishShot(match, record) : undefined;

  return {
    tick: match.tick,
    positions: discPositions(world),
    captures,
    events: step.events,
    atRest: step.atRest,
    ...(outcome ? { outcome } : {}),
  };
}
