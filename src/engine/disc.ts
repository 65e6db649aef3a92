// src/engine/disc.ts

import type { CoinColor, Disc, DiscKind } from "../types";
import type { PhysicsConfig } from "./config";

export function radiusFor(kind: DiscKind, physics: PhysicsConfig): number {
  switch (kind) {
    case "Striker":
      return physics.strikerRadius;
    case "Queen":
      return physics.queenRadius;
    case "RegularLight":
    case "RegularDark":
      return physics.coinRadius;
    default: {
      const _exhaustive: never = kind;
      throw new Error(`Unknown disc kind: ${String(_exhaustive)}`);
    }
  }
}

export function makeDisc(id: string, kind: DiscKind, x: number, y: number, physics: PhysicsConfig): Disc {
  return {
    id,
    kind,
    radius: radiusFor(kind, physics),
    friction: physics.friction,
    x,
    y,
    vx: 0,
    vy: 0,
    captured: false,
  };
}

/**
 * The color a regular coin belongs to. Queen and striker belong to nobody.
 */
export function colorOf(kind: DiscKind): CoinColor | null {
  if (kind === "RegularLight") return "light";
  if (kind === "RegularDark") return "dark";
  return null;
}

export function isMoving(disc: Disc): boolean {
  return disc.vx !== 0 || disc.vy !== 0;
}

export function stopDisc(disc: Disc): void {
  disc.vx = 0;
  disc.vy = 0;
}

/**
 * One fixed time step: friction, snap-to-rest, then integrate position.
 *
 * The snap makes rest an exact state (velocity === 0), so a disc that starts a tick at
 * rest ends it at exactly the same coordinates.
 */
export function stepDisc(disc: Disc, restThreshold: number): void {
  if (disc.captured) return;

  disc.vx *= disc.friction;
  disc.vy *= disc.friction;

  if (Math.hypot(disc.vx, disc.vy) < restThreshold) stopDisc(disc);

  disc.x += disc.vx;
  disc.y += disc.vy;
}
