import type { Match } from "../engine";
import {
  advanceTick,
  createMatch,
  hashSnapshot,
  positionStriker,
  snapshotMatch,
  tryBeginShot,
} from "../engine";
import type { TickResult } from "../types";
import {
  MAX_TICKS_PER_REQUEST,
  type GameplayMessage,
  type ServerErrorCode,
  type ServerMessage,
  type TurnInfo,
} from "./protocol";

export type TableSession = {
  match: Match;
};

export type HandleResult = {
  nextState: TableSession;
  serverMessage: ServerMessage;
};

export function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

export function mkError(code: ServerErrorCode, message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

export function turnInfo(match: Match): TurnInfo {
  const s = match.state;
  return {
    currentPlayer: s.currentPlayer,
    phase: s.phase,
    foulCount: s.foulCount,
    scores: [...s.scores],
    winner: s.winner,
    message: s.message,
  };
}

export function mkStateSync(tableCode: string, match: Match, reqId?: string): ServerMessage {
  const snapshot = snapshotMatch(match);
  return withReqId(
    {
      type: "stateSync",
      tableCode,
      snapshot,
      stateHash: hashSnapshot(snapshot),
      turn: turnInfo(match),
    },
    reqId
  );
}

/**
 * Run up to `count` ticks, stopping on the tick that resolves the shot.
 * Outside a shot a single idle tick is reported so clients still get positions.
 */
function runTicks(match: Match, count: number): TickResult[] {
  const results: TickResult[] = [];
  for (let i = 0; i < count; i++) {
    const result = advanceTick(match);
    results.push(result);
    if (result.outcome || match.state.phase !== "ShotInFlight") break;
  }
  return results;
}

/**
 * Dispatch one gameplay message against a table. The match is mutated in place; a
 * `newMatch` swaps in a fresh one.
 */
export function handleClientMessage(
  tableCode: string,
  state: TableSession,
  msg: GameplayMessage
): HandleResult {
  const reqId = msg.reqId;
  const { match } = state;

  switch (msg.type) {
    case "getState":
      return { nextState: state, serverMessage: mkStateSync(tableCode, match, reqId) };

    case "newMatch": {
      const next = createMatch({
        playerCount: msg.playerCount ?? match.config.playerCount,
        physics: { ...match.config.physics },
        rules: { ...match.config.rules },
      });
      const nextState: TableSession = { match: next };
      return { nextState, serverMessage: mkStateSync(tableCode, next, reqId) };
    }

    case "positionStriker": {
      const placed = positionStriker(match, msg.offset);
      if (!placed.ok) {
        return { nextState: state, serverMessage: mkError(placed.error.code, placed.error.message, reqId) };
      }
      return { nextState: state, serverMessage: mkStateSync(tableCode, match, reqId) };
    }

    case "shoot": {
      const response = tryBeginShot(match, { angle: msg.angle, power: msg.power });
      return {
        nextState: state,
        serverMessage: withReqId({ type: "shotResult", tableCode, response }, reqId),
      };
    }

    case "tick": {
      const count = msg.count ?? 1;
      if (!Number.isInteger(count) || count < 1 || count > MAX_TICKS_PER_REQUEST) {
        return {
          nextState: state,
          serverMessage: mkError("BAD_MESSAGE", `Tick count must be an integer in [1, ${MAX_TICKS_PER_REQUEST}].`, reqId),
        };
      }
      const results = runTicks(match, count);
      return {
        nextState: state,
        serverMessage: withReqId({ type: "tickResult", tableCode, results }, reqId),
      };
    }

    default: {
      const _exhaustive: never = msg;
      return {
        nextState: state,
        serverMessage: mkError("BAD_MESSAGE", `Unhandled message: ${JSON.stringify(_exhaustive)}`, reqId),
      };
    }
  }
}
