// src/engine/matchState.ts

import type { MatchState, PlayerCount } from "../types";

/**
 * Fresh scoring state: everybody on zero, player 1 to shoot.
 */
export function makeMatchState(playerCount: PlayerCount): MatchState {
  return {
    playerCount,
    scores: Array.from({ length: playerCount }, () => 0),
    currentPlayer: 1,
    queenPocketed: false,
    queenCovered: false,
    queenCoveredBy: null,
    pendingQueenCover: false,
    foulCount: 0,
    winner: null,
    phase: "AwaitingShot",
    message: "Player 1's turn",
  };
}

export function cloneMatchState(state: MatchState): MatchState {
  return { ...state, scores: [...state.scores] };
}
