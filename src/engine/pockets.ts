// src/engine/pockets.ts

import type { Disc, Pocket } from "../types";
import type { PhysicsConfig } from "./config";
import { boardBounds } from "./boundary";
import { vecDist } from "./vector";

/**
 * Corner pockets, in the order: top-left, top-right, bottom-left, bottom-right.
 */
export function makePockets(physics: PhysicsConfig): readonly Pocket[] {
  const { min, max } = boardBounds(physics);
  const radius = physics.pocketRadius;
  return [
    { x: min, y: min, radius },
    { x: max, y: min, radius },
    { x: min, y: max, radius },
    { x: max, y: max, radius },
  ];
}

/**
 * Index of the pocket that swallows this disc, or null.
 * The centre has to be strictly inside (pocket radius - capture margin); touching the rim
 * is not enough.
 */
export function findCapturingPocket(
  disc: Disc,
  pockets: readonly Pocket[],
  captureMargin: number
): number | null {
  if (disc.captured) return null;

  for (let i = 0; i < pockets.length; i++) {
    const p = pockets[i];
    if (vecDist(p, disc) < p.radius - captureMargin) return i;
  }

  return null;
}
