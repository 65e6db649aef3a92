// src/engine/collision.ts
//
// Pairwise disc collisions.
//
// The impulse model is a simplified equal-mass elastic exchange: each disc's velocity change
// is scaled by the OTHER disc's radius over the summed radii. With equal radii a head-on hit
// swaps the two velocities along the normal. This is a modelling choice, not mass-weighted
// physics.
//
// Resolution is pairwise and sequential, so the order pairs are visited in changes the result
// of chained hits. Callers must always use the same order (see physicsWorld.ts).

import type { Disc, ImpactEvent, Vec2 } from "../types";
import type { PhysicsConfig } from "./config";
import { vecDist } from "./vector";

export type CollisionOutcome = {
  closingSpeed: number;
  normal: Vec2;
  events: ImpactEvent[];
};

// Used when both centres coincide and no direction can be derived.
const FALLBACK_NORMAL: Vec2 = { x: 1, y: 0 };

export function discsOverlap(a: Disc, b: Disc): boolean {
  return vecDist(a, b) < a.radius + b.radius;
}

/**
 * Resolve one unordered pair. Returns null when nothing happened: either disc captured,
 * no overlap, or the pair is already separating.
 */
export function resolveCollision(a: Disc, b: Disc, physics: PhysicsConfig): CollisionOutcome | null {
  if (a.captured || b.captured) return null;

  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const distance = Math.hypot(dx, dy);
  const reach = a.radius + b.radius;

  if (distance >= reach) return null;

  const normal = distance === 0 ? FALLBACK_NORMAL : { x: dx / distance, y: dy / distance };

  const closingSpeed = (a.vx - b.vx) * normal.x + (a.vy - b.vy) * normal.y;
  if (closingSpeed < 0) return null;

  const impulse = (2 * closingSpeed) / reach;

  a.vx -= impulse * normal.x * b.radius;
  a.vy -= impulse * normal.y * b.radius;
  b.vx += impulse * normal.x * a.radius;
  b.vy += impulse * normal.y * a.radius;

  const overlap = (reach - distance) / 2;
  a.x -= overlap * normal.x;
  a.y -= overlap * normal.y;
  b.x += overlap * normal.x;
  b.y += overlap * normal.y;

  return { closingSpeed, normal, events: impactEvents(a, b, normal, closingSpeed, physics) };
}

function impactEvents(
  a: Disc,
  b: Disc,
  normal: Vec2,
  closingSpeed: number,
  physics: PhysicsConfig
): ImpactEvent[] {
  const events: ImpactEvent[] = [];
  const x = a.x + normal.x * a.radius;
  const y = a.y + normal.y * a.radius;

  if (a.kind === "Striker" && closingSpeed > physics.strikerImpactThreshold) {
    events.push({ type: "strikerImpact", x, y, speed: closingSpeed, targetId: b.id });
  }

  if (closingSpeed > physics.clackThreshold) {
    events.push({ type: "clack", x, y, speed: closingSpeed });
  }

  return events;
}
