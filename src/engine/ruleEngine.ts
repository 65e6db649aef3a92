// src/engine/ruleEngine.ts
//
// Turn / scoring state machine.
//
//   AwaitingShot --beginShot--> ShotInFlight --world at rest--> TurnResolution
//   TurnResolution --> AwaitingShot (next shooter) | GameOver
//
// The engine only mutates MatchState. Anything that has to happen on the board (queen back
// to the centre, striker back to a baseline) is returned as an intent for the caller to apply.

import type { CoinColor, MatchState, PlayerNumber, ShotRecord, TurnOutcome } from "../types";
import type { RulesConfig } from "./config";
import { colorOf } from "./disc";
import type { EngineError } from "./serverEnvelope";
import { colorForPlayer, nextPlayer, opposingColor, winnerForColor } from "./sides";

export type ShotCommand = {
  angle: number;
  power: number;
};

export type WorldIntent =
  | { kind: "returnQueen" }
  | { kind: "resetStriker"; player: PlayerNumber };

export type BoardReport = {
  remaining: Record<CoinColor, number>;
};

export type Resolution = {
  outcome: TurnOutcome;
  intents: WorldIntent[];
};

/**
 * Null when the shot may be taken; otherwise the reason it is rejected.
 */
export function validateShot(state: MatchState, shot: ShotCommand): EngineError | null {
  if (state.phase === "GameOver") {
    return { code: "INVALID_SHOT_PARAMETERS", message: "The match is over." };
  }
  if (state.phase !== "AwaitingShot") {
    return { code: "INVALID_SHOT_PARAMETERS", message: `Cannot shoot while ${state.phase}.` };
  }
  if (typeof shot.angle !== "number" || !Number.isFinite(shot.angle)) {
    return { code: "INVALID_SHOT_PARAMETERS", message: "Shot angle must be a finite number." };
  }
  if (typeof shot.power !== "number" || !Number.isFinite(shot.power) || shot.power < 0 || shot.power > 1) {
    return { code: "INVALID_SHOT_PARAMETERS", message: "Shot power must be within [0, 1]." };
  }
  if (shot.power === 0) {
    return { code: "INVALID_SHOT_PARAMETERS", message: "Shot power must be greater than zero." };
  }
  return null;
}

/**
 * Striker released. The foul counter goes up now and is reset if the shot pockets
 * something of the shooter's own.
 */
export function beginShot(state: MatchState): void {
  if (state.phase !== "AwaitingShot") {
    throw new Error(`beginShot called in phase ${state.phase}`);
  }
  state.phase = "ShotInFlight";
  state.foulCount += 1;
}

function passTurn(state: MatchState): void {
  state.currentPlayer = nextPlayer(state.currentPlayer, state.playerCount);
}

/**
 * An uncovered queen goes back to the centre. Returns true when it did.
 */
function returnUncoveredQueen(state: MatchState, intents: WorldIntent[]): boolean {
  if (!state.pendingQueenCover) return false;
  state.pendingQueenCover = false;
  state.queenPocketed = false;
  intents.push({ kind: "returnQueen" });
  return true;
}

/**
 * Resolve one finished shot. All captures are applied before the turn is decided.
 */
export function resolveShot(
  state: MatchState,
  record: ShotRecord,
  board: BoardReport,
  rules: RulesConfig
): Resolution {
  if (state.phase !== "ShotInFlight") {
    throw new Error(`resolveShot called in phase ${state.phase}`);
  }
  state.phase = "TurnResolution";

  const shooter = state.currentPlayer;
  const ownColor = colorForPlayer(shooter);
  const coverWasPending = state.pendingQueenCover;
  const intents: WorldIntent[] = [];

  let message = "";
  let foul: string | null = null;

  for (const cap of record.captures) {
    if (cap.kind === "Queen") {
      state.queenPocketed = true;
      state.pendingQueenCover = true;
      state.foulCount = 0;
      message = `Player ${shooter} pocketed the Queen! Must cover it.`;
      continue;
    }

    if (colorOf(cap.kind) !== ownColor) {
      foul ??= `Player ${shooter} pocketed an opponent's coin!`;
      continue;
    }

    state.scores[shooter - 1] += 1;
    state.foulCount = 0;
    message = `Player ${shooter} pocketed a ${ownColor} coin!`;

    if (state.pendingQueenCover) {
      state.scores[shooter - 1] += rules.coverBonus;
      state.pendingQueenCover = false;
      state.queenCovered = true;
      state.queenCoveredBy = shooter;
      message = `Player ${shooter} covered the Queen! +${rules.coverBonus} points`;
    }
  }

  if (record.strikerCaptured) foul = `Player ${shooter} pocketed the striker!`;

  let turnChanged = false;
  let queenReturned = false;

  if (foul) {
    message = foul;
    queenReturned = returnUncoveredQueen(state, intents);
    passTurn(state);
    turnChanged = true;
    state.foulCount = 0;
  } else if (record.captures.length === 0) {
    // The release already counted this miss.
    if (coverWasPending) queenReturned = returnUncoveredQueen(state, intents);

    if (state.foulCount >= rules.foulLimit) {
      message = `Player ${shooter} committed ${state.foulCount} consecutive fouls!`;
      state.foulCount = 0;
      passTurn(state);
      turnChanged = true;
    } else if (rules.passTurnOnMiss) {
      passTurn(state);
      turnChanged = true;
      message = `Player ${state.currentPlayer}'s turn`;
    } else {
      message = `Player ${shooter} missed (${state.foulCount}/${rules.foulLimit})`;
    }
  }

  if (queenReturned) {
    const sep = /[.!]$/.test(message) ? " " : ". ";
    message = `${message}${sep}The Queen goes back to the centre.`;
  }

  const winnerColor = [ownColor, opposingColor(ownColor)].find((c) => board.remaining[c] === 0);
  if (winnerColor) {
    state.winner = winnerForColor(winnerColor, shooter, state.playerCount);
    state.phase = "GameOver";
    message = `Player ${state.winner} wins!`;
  } else {
    state.phase = "AwaitingShot";
    intents.push({ kind: "resetStriker", player: state.currentPlayer });
  }

  state.message = message;

  return {
    outcome: {
      message,
      currentPlayer: state.currentPlayer,
      scores: [...state.scores],
      winner: state.winner,
      foulCount: state.foulCount,
      turnChanged,
      queenReturned,
      phase: state.phase,
    },
    intents,
  };
}
