// src/server/protocol.ts

import type { EngineErrorCode, MatchSnapshot, ShotResponse } from "../engine";
import type { MatchPhase, PlayerNumber, TickResult } from "../types";

export type TableCode = string;

/** Upper bound for a single `tick` request. */
export const MAX_TICKS_PER_REQUEST = 600;

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage =
  | HelloMessage
  | JoinTableMessage
  | NewMatchMessage
  | PositionStrikerMessage
  | ShootMessage
  | TickMessage
  | GetStateMessage
  | SaveGameMessage
  | LoadGameMessage;

/** Messages that act on the match itself; the rest are connection/table plumbing. */
export type GameplayMessage =
  | NewMatchMessage
  | PositionStrikerMessage
  | ShootMessage
  | TickMessage
  | GetStateMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Join (or open) a table. Without a tableCode the server opens a fresh table.
 * A table takes one client at a time; the match stays when that client disconnects.
 */
export interface JoinTableMessage {
  type: "joinTable";
  tableCode?: TableCode;
  reqId?: string;
}

/**
 * Rack up a new match on the current table. Rules and physics stay as the table was
 * configured; only the player count may change.
 */
export interface NewMatchMessage {
  type: "newMatch";
  playerCount?: 2 | 4;
  reqId?: string;
}

export interface PositionStrikerMessage {
  type: "positionStriker";
  offset: number;
  reqId?: string;
}

export interface ShootMessage {
  type: "shoot";
  angle: number;
  power: number;
  reqId?: string;
}

/**
 * Advance the simulation by up to `count` ticks (default 1). Stops early on the tick
 * that resolves the shot.
 */
export interface TickMessage {
  type: "tick";
  count?: number;
  reqId?: string;
}

export interface GetStateMessage {
  type: "getState";
  reqId?: string;
}

export interface SaveGameMessage {
  type: "saveGame";
  reqId?: string;
}

export interface LoadGameMessage {
  type: "loadGame";
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | TableJoinedMessage
  | StateSyncMessage
  | TickResultMessage
  | ShotResultMessage
  | GameSavedMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId?: string;
  reqId?: string;
}

export interface TableJoinedMessage {
  type: "tableJoined";
  tableCode: TableCode;
  clientId: string;
  reqId?: string;
}

export interface TurnInfo {
  currentPlayer: PlayerNumber;
  phase: MatchPhase;
  foulCount: number;
  scores: number[];
  winner: PlayerNumber | null;
  message: string;
}

export interface StateSyncMessage {
  type: "stateSync";
  tableCode: TableCode;
  snapshot: MatchSnapshot;
  stateHash: string;
  turn: TurnInfo;
  reqId?: string;
}

export interface TickResultMessage {
  type: "tickResult";
  tableCode: TableCode;

  // One entry per simulated tick, oldest first. The last one carries `outcome` when the
  // shot resolved.
  results: TickResult[];
  reqId?: string;
}

export interface ShotResultMessage {
  type: "shotResult";
  tableCode: TableCode;
  response: ShotResponse;
  reqId?: string;
}

export interface GameSavedMessage {
  type: "gameSaved";
  tableCode: TableCode;
  savedAt: string;
  stateHash: string;
  reqId?: string;
}

export type ServerErrorCode =
  | EngineErrorCode
  | "BAD_MESSAGE"
  | "NOT_AT_TABLE"
  | "TABLE_BUSY"
  | "PERSISTENCE_DISABLED"
  | "SAVE_FAILED"
  | "LOAD_FAILED";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode;
  message: string;
  reqId?: string;
}
