// src/types.ts

export type PlayerNumber = 1 | 2 | 3 | 4;
export type PlayerCount = 2 | 4;

export type DiscKind = "RegularLight" | "RegularDark" | "Queen" | "Striker";

export type CoinColor = "light" | "dark";

export interface Vec2 {
  x: number;
  y: number;
}

export interface Disc {
  readonly id: string;
  readonly kind: DiscKind;
  readonly radius: number;
  readonly friction: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  captured: boolean;
}

export interface Pocket {
  x: number;
  y: number;
  radius: number;
}

export interface BoardBounds {
  min: number;
  max: number;
  center: number;
}

export type MatchPhase = "AwaitingShot" | "ShotInFlight" | "TurnResolution" | "GameOver";

export interface ShotCapture {
  discId: string;
  kind: Exclude<DiscKind, "Striker">;
  pocket: number;
}

export interface ShotRecord {
  captures: ShotCapture[];
  strikerCaptured: boolean;
}

export interface MatchState {
  playerCount: PlayerCount;
  scores: number[];
  currentPlayer: PlayerNumber;
  queenPocketed: boolean;
  queenCovered: boolean;
  queenCoveredBy: PlayerNumber | null;

  // Set right after the queen drops; cleared by a cover or by returning the queen.
  pendingQueenCover: boolean;

  foulCount: number;
  winner: PlayerNumber | null;
  phase: MatchPhase;
  message: string;
}

/**
 * Presentation-only events. They never feed back into the simulation.
 */
export type ImpactEvent =
  | { type: "strikerImpact"; x: number; y: number; speed: number; targetId: string }
  | { type: "clack"; x: number; y: number; speed: number };

export interface DiscPosition {
  id: string;
  kind: DiscKind;
  x: number;
  y: number;
  captured: boolean;
}

export interface TurnOutcome {
  message: string;
  currentPlayer: PlayerNumber;
  scores: readonly number[];
  winner: PlayerNumber | null;
  foulCount: number;
  turnChanged: boolean;
  queenReturned: boolean;
  phase: MatchPhase;
}

export interface TickResult {
  tick: number;
  positions: DiscPosition[];
  captures: string[];
  events: ImpactEvent[];
  atRest: boolean;

  // Present only on the tick that resolved a shot.
  outcome?: TurnOutcome;
}

export interface ShotInput {
  // Striker placement along the baseline before aiming; omitted keeps the current spot.
  strikerOffset?: number;
  angle: number;
  power: number;
}
