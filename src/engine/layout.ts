// src/engine/layout.ts
//
// Board setup: the opening formation and the striker baselines.

import type { DiscKind, PlayerCount, PlayerNumber, Vec2 } from "../types";
import type { PhysicsConfig } from "./config";
import { boardBounds } from "./boundary";
import { fromAngle } from "./vector";

export type DiscSeed = {
  kind: Exclude<DiscKind, "Striker">;
  x: number;
  y: number;
};

type Ring = {
  count: number;

  // Ring radius in coin radii.
  spacing: number;

  offset: number;
  firstKind: "RegularLight" | "RegularDark";
};

const OPENING_RINGS: readonly Ring[] = [
  { count: 6, spacing: 2.5, offset: 0, firstKind: "RegularDark" },
  { count: 8, spacing: 4.5, offset: Math.PI / 8, firstKind: "RegularLight" },
  { count: 9, spacing: 6.5, offset: Math.PI / 9, firstKind: "RegularDark" },
];

function otherKind(kind: Ring["firstKind"]): Ring["firstKind"] {
  return kind === "RegularLight" ? "RegularDark" : "RegularLight";
}

/**
 * Queen in the centre, three staggered rings of alternating coins around it.
 */
export function openingLayout(physics: PhysicsConfig): DiscSeed[] {
  const { center } = boardBounds(physics);
  const seeds: DiscSeed[] = [{ kind: "Queen", x: center, y: center }];

  for (const ring of OPENING_RINGS) {
    const radius = physics.coinRadius * ring.spacing;
    for (let i = 0; i < ring.count; i++) {
      const p = fromAngle(ring.offset + (i * 2 * Math.PI) / ring.count, radius);
      seeds.push({
        kind: i % 2 === 0 ? ring.firstKind : otherKind(ring.firstKind),
        x: center + p.x,
        y: center + p.y,
      });
    }
  }

  return seeds;
}

export type BoardSide = "bottom" | "right" | "top" | "left";

export type Baseline = {
  side: BoardSide;

  // The striker slides along this axis; the other coordinate is fixed at `fixed`.
  axis: "x" | "y";
  fixed: number;
  min: number;
  max: number;
};

const SIDES_BY_COUNT: Record<PlayerCount, readonly BoardSide[]> = {
  2: ["bottom", "top"],
  4: ["bottom", "right", "top", "left"],
};

export function sideFor(player: PlayerNumber, playerCount: PlayerCount): BoardSide {
  const side = SIDES_BY_COUNT[playerCount][player - 1];
  if (!side) throw new Error(`Player ${player} is not seated in a ${playerCount}-player match.`);
  return side;
}

export function strikerBaseline(
  player: PlayerNumber,
  playerCount: PlayerCount,
  physics: PhysicsConfig
): Baseline {
  const { min, max } = boardBounds(physics);
  const side = sideFor(player, playerCount);
  const reachMin = min + physics.strikerRadius + physics.baselineEndInset;
  const reachMax = max - physics.strikerRadius - physics.baselineEndInset;

  switch (side) {
    case "bottom":
      return { side, axis: "x", fixed: max - physics.baselineInset, min: reachMin, max: reachMax };
    case "top":
      return { side, axis: "x", fixed: min + physics.baselineInset, min: reachMin, max: reachMax };
    case "right":
      return { side, axis: "y", fixed: max - physics.baselineInset, min: reachMin, max: reachMax };
    case "left":
      return { side, axis: "y", fixed: min + physics.baselineInset, min: reachMin, max: reachMax };
    default: {
      const _exhaustive: never = side;
      throw new Error(`Unsupported side: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Point on the baseline at `offset` along its axis, clamped to the reachable stretch.
 * Without an offset the striker sits in the middle.
 */
export function baselinePoint(baseline: Baseline, offset?: number): Vec2 {
  const along =
    offset === undefined ? (baseline.min + baseline.max) / 2 : Math.max(baseline.min, Math.min(offset, baseline.max));
  return baseline.axis === "x" ? { x: along, y: baseline.fixed } : { x: baseline.fixed, y: along };
}
