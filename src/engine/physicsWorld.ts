// src/engine/physicsWorld.ts
//
// Owns the striker and the coins and advances them one tick at a time.
// Knows nothing about scoring: it reports captures and whether everything has stopped.

import type { BoardBounds, Disc, DiscPosition, ImpactEvent, Pocket, ShotCapture, Vec2 } from "../types";
import type { PhysicsConfig } from "./config";
import { boardBounds, clampToBoard } from "./boundary";
import { resolveCollision } from "./collision";
import { colorOf, isMoving, makeDisc, stepDisc, stopDisc } from "./disc";
import type { Baseline, DiscSeed } from "./layout";
import { findCapturingPocket, makePockets } from "./pockets";
import { fromAngle, vecDist } from "./vector";

export const STRIKER_ID = "striker";

export interface PhysicsWorld {
  readonly physics: PhysicsConfig;
  readonly bounds: BoardBounds;
  readonly pockets: readonly Pocket[];
  readonly striker: Disc;
  readonly coins: Disc[];
}

export type WorldTick = {
  captures: ShotCapture[];
  strikerCaptured: boolean;
  events: ImpactEvent[];
  atRest: boolean;
};

function idPrefix(kind: DiscSeed["kind"]): string {
  switch (kind) {
    case "Queen":
      return "queen";
    case "RegularLight":
      return "light";
    case "RegularDark":
      return "dark";
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unsupported coin kind: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Coins get ids in seed order: `queen` for the first queen, then `light-0`, `light-1`, ...
 * and `dark-0`, `dark-1`, ... counted per color.
 */
export function makeWorld(physics: PhysicsConfig, seeds: readonly DiscSeed[], strikerAt: Vec2): PhysicsWorld {
  const counters = new Map<string, number>();
  const coins = seeds.map((seed) => {
    const prefix = idPrefix(seed.kind);
    const n = counters.get(prefix) ?? 0;
    counters.set(prefix, n + 1);
    const id = seed.kind === "Queen" && n === 0 ? "queen" : `${prefix}-${n}`;
    return makeDisc(id, seed.kind, seed.x, seed.y, physics);
  });

  return {
    physics,
    bounds: boardBounds(physics),
    pockets: makePockets(physics),
    striker: makeDisc(STRIKER_ID, "Striker", strikerAt.x, strikerAt.y, physics),
    coins,
  };
}

function moveAndClamp(world: PhysicsWorld, disc: Disc): void {
  stepDisc(disc, world.physics.restThreshold);
  clampToBoard(disc, world.bounds, world.physics.restitution);
}

function capture(disc: Disc): void {
  disc.captured = true;
  stopDisc(disc);
}

export function isWorldAtRest(world: PhysicsWorld): boolean {
  if (isMoving(world.striker)) return false;
  return world.coins.every((c) => c.captured || !isMoving(c));
}

/**
 * One simulation tick:
 *  (a) striker moves; a pocketed striker ends the tick right there
 *  (b) every coin moves
 *  (c) striker vs each coin, then coin pairs (i < j), ascending
 *  (d) pocket checks for the striker and each coin
 *  (e) rest check
 */
export function stepWorld(world: PhysicsWorld): WorldTick {
  const { striker, coins, pockets, physics } = world;
  const captures: ShotCapture[] = [];
  const events: ImpactEvent[] = [];

  moveAndClamp(world, striker);
  if (findCapturingPocket(striker, pockets, physics.captureMargin) !== null) {
    capture(striker);
    return { captures, strikerCaptured: true, events, atRest: isWorldAtRest(world) };
  }

  for (const coin of coins) moveAndClamp(world, coin);

  for (const coin of coins) {
    const hit = resolveCollision(striker, coin, physics);
    if (hit) events.push(...hit.events);
  }

  for (let i = 0; i < coins.length; i++) {
    for (let j = i + 1; j < coins.length; j++) {
      const hit = resolveCollision(coins[i], coins[j], physics);
      if (hit) events.push(...hit.events);
    }
  }

  let strikerCaptured = false;
  if (findCapturingPocket(striker, pockets, physics.captureMargin) !== null) {
    capture(striker);
    strikerCaptured = true;
  }

  for (const coin of coins) {
    const pocket = findCapturingPocket(coin, pockets, physics.captureMargin);
    if (pocket === null) continue;
    capture(coin);
    if (coin.kind !== "Striker") captures.push({ discId: coin.id, kind: coin.kind, pocket });
  }

  return { captures, strikerCaptured, events, atRest: isWorldAtRest(world) };
}

export function launchStriker(world: PhysicsWorld, angle: number, speed: number): void {
  const v = fromAngle(angle, speed);
  world.striker.vx = v.x;
  world.striker.vy = v.y;
}

/**
 * Put the striker back on the board at rest, uncaptured.
 */
export function placeStriker(world: PhysicsWorld, at: Vec2): void {
  const s = world.striker;
  s.x = at.x;
  s.y = at.y;
  s.captured = false;
  stopDisc(s);
}

// Step, in board units, between candidate spots when looking for room to put a disc down.
const SPOT_SEARCH_STEP = 1;

/**
 * True when `disc`, centred at `at`, would touch no other disc still on the board.
 */
function isSpotFree(world: PhysicsWorld, disc: Disc, at: Vec2): boolean {
  return [world.striker, ...world.coins].every(
    (other) => other === disc || other.captured || vecDist(other, at) >= other.radius + disc.radius
  );
}

/**
 * The free point on `baseline` nearest to `wanted`, or null when the whole baseline is blocked.
 * Ties go to the lower coordinate.
 */
export function freeStrikerSpot(world: PhysicsWorld, baseline: Baseline, wanted: Vec2): Vec2 | null {
  const start = baseline.axis === "x" ? wanted.x : wanted.y;
  const pointAt = (along: number): Vec2 =>
    baseline.axis === "x" ? { x: along, y: baseline.fixed } : { x: baseline.fixed, y: along };

  const reach = Math.max(start - baseline.min, baseline.max - start);
  for (let d = 0; d <= reach; d += SPOT_SEARCH_STEP) {
    for (const along of d === 0 ? [start] : [start - d, start + d]) {
      if (along < baseline.min || along > baseline.max) continue;
      const at = pointAt(along);
      if (isSpotFree(world, world.striker, at)) return at;
    }
  }
  return null;
}

function queenSpotAround(world: PhysicsWorld, queen: Disc): Vec2 | null {
  const { center, min, max } = world.bounds;
  const ringStep = queen.radius / 2;
  const rings = Math.floor((max - min) / 2 / ringStep);

  for (let k = 1; k <= rings; k++) {
    const points = 6 * k;
    for (let i = 0; i < points; i++) {
      const p = fromAngle((i * 2 * Math.PI) / points, k * ringStep);
      const at = { x: center + p.x, y: center + p.y };
      const onBoard =
        at.x - queen.radius >= min && at.x + queen.radius <= max && at.y - queen.radius >= min && at.y + queen.radius <= max;
      if (onBoard && isSpotFree(world, queen, at)) return at;
    }
  }
  return null;
}

/**
 * Return a captured queen to the centre spot. When the centre is taken she goes to the nearest
 * free spot around it: rings of half a queen radius apart, 6k points on the k-th ring.
 * Returns false when there is no captured queen.
 */
export function returnQueenToCenter(world: PhysicsWorld): boolean {
  const queen = world.coins.find((c) => c.kind === "Queen" && c.captured);
  if (!queen) return false;

  const centre = { x: world.bounds.center, y: world.bounds.center };
  const spot = isSpotFree(world, queen, centre) ? centre : queenSpotAround(world, queen) ?? centre;

  queen.captured = false;
  queen.x = spot.x;
  queen.y = spot.y;
  stopDisc(queen);
  return true;
}

export function remainingCoins(world: PhysicsWorld): { light: number; dark: number } {
  const remaining = { light: 0, dark: 0 };
  for (const coin of world.coins) {
    if (coin.captured) continue;
    const color = colorOf(coin.kind);
    if (color) remaining[color] += 1;
  }
  return remaining;
}

export function findDisc(world: PhysicsWorld, id: string): Disc | undefined {
  if (id === world.striker.id) return world.striker;
  return world.coins.find((c) => c.id === id);
}

export function discPositions(world: PhysicsWorld): DiscPosition[] {
  return [world.striker, ...world.coins].map((d) => ({
    id: d.id,
    kind: d.kind,
    x: d.x,
    y: d.y,
    captured: d.captured,
  }));
}
