// src/engine/boundary.ts

import type { BoardBounds, Disc } from "../types";
import type { PhysicsConfig } from "./config";

export function boardBounds(physics: PhysicsConfig): BoardBounds {
  const min = physics.boardMargin;
  const max = physics.boardMargin + physics.boardSize;
  return { min, max, center: min + physics.boardSize / 2 };
}

function bounce(v: number, restitution: number): number {
  return v === 0 ? 0 : -v * restitution;
}

/**
 * Keep a disc inside the playable square. Each axis is handled on its own: the disc is
 * put back against the wall and that velocity component reverses, losing (1 - restitution).
 *
 * Returns true when the disc touched a wall this call.
 */
export function clampToBoard(disc: Disc, bounds: BoardBounds, restitution: number): boolean {
  if (disc.captured) return false;

  let hit = false;
  const r = disc.radius;

  if (disc.x - r < bounds.min) {
    disc.x = bounds.min + r;
    disc.vx = bounce(disc.vx, restitution);
    hit = true;
  } else if (disc.x + r > bounds.max) {
    disc.x = bounds.max - r;
    disc.vx = bounce(disc.vx, restitution);
    hit = true;
  }

  if (disc.y - r < bounds.min) {
    disc.y = bounds.min + r;
    disc.vy = bounce(disc.vy, restitution);
    hit = true;
  } else if (disc.y + r > bounds.max) {
    disc.y = bounds.max - r;
    disc.vy = bounce(disc.vy, restitution);
    hit = true;
  }

  return hit;
}
