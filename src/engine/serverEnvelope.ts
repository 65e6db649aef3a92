import type { MatchPhase, PlayerNumber, Vec2 } from "../types";
import type { Match } from "./match";

export type EngineErrorCode =
  | "INVALID_SHOT_PARAMETERS"
  | "INVALID_INPUT"
  | "CORRUPT_SNAPSHOT";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

export type EngineErr = {
  ok: false;
  error: EngineError;
};

export type TurnContext = {
  currentPlayer: PlayerNumber;
  phase: MatchPhase;

  /**
   * Includes the provisional count for a shot in flight: a miss leaves it standing,
   * a capture of the shooter's own resets it.
   */
  foulCount: number;
};

export type ShotOk = {
  ok: true;

  /** Hash of the match just before the striker was released */
  beforeHash: string;

  velocity: Vec2;
  turn: TurnContext;
};

export type ShotResponse = ShotOk | EngineErr;

export type PlaceOk = {
  ok: true;
  striker: Vec2;
};

export type PlaceResponse = PlaceOk | EngineErr;

export type RestoreOk = {
  ok: true;
  match: Match;
};

export type RestoreResponse = RestoreOk | EngineErr;
