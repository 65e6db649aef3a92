import { describe, it, expect } from "vitest";
import { createMatch, hashMatch } from "../src/engine";
import { handleClientMessage, type TableSession } from "../src/server/handleMessage";

function session(): TableSession {
  return { match: createMatch() };
}

describe("handleClientMessage", () => {
  it("answers getState with a stateSync for the table", () => {
    const s = session();

    const { nextState, serverMessage } = handleClientMessage("T1", s, { type: "getState", reqId: "r1" });

    expect(nextState).toBe(s);
    if (serverMessage.type !== "stateSync") throw new Error(`unexpected ${serverMessage.type}`);
    expect(serverMessage.tableCode).toBe("T1");
    expect(serverMessage.reqId).toBe("r1");
    expect(serverMessage.stateHash).toBe(hashMatch(s.match));
    expect(serverMessage.turn).toEqual({
      currentPlayer: 1,
      phase: "AwaitingShot",
      foulCount: 0,
      scores: [0, 0],
      winner: null,
      message: "Player 1's turn",
    });
  });

  it("moves the striker and syncs the new position", () => {
    const { serverMessage } = handleClientMessage("T1", session(), { type: "positionStriker", offset: 100 });

    if (serverMessage.type !== "stateSync") throw new Error(`unexpected ${serverMessage.type}`);
    expect(serverMessage.snapshot.striker.x).toBe(170);
    expect(serverMessage.snapshot.striker.y).toBe(650);
  });

  it("turns an engine rejection into an error message", () => {
    const s = session();
    handleClientMessage("T1", s, { type: "shoot", angle: 0, power: 0.5 });

    const { serverMessage } = handleClientMessage("T1", s, { type: "positionStriker", offset: 300, reqId: "r2" });

    expect(serverMessage).toEqual({
      type: "error",
      code: "INVALID_INPUT",
      message: "Cannot move the striker while ShotInFlight.",
      reqId: "r2",
    });
  });

  it("wraps the shot response in a shotResult", () => {
    const { serverMessage } = handleClientMessage("T1", session(), { type: "shoot", angle: 0, power: 0 });

    expect(serverMessage).toEqual({
      type: "shotResult",
      tableCode: "T1",
      response: {
        ok: false,
        error: { code: "INVALID_SHOT_PARAMETERS", message: "Shot power must be greater than zero." },
      },
    });
  });

  it("ticks until the shot resolves and stops there", () => {
    const s = session();
    handleClientMessage("T1", s, { type: "shoot", angle: Math.PI / 2, power: 0.1 });

    const { serverMessage } = handleClientMessage("T1", s, { type: "tick", count: 600 });

    if (serverMessage.type !== "tickResult") throw new Error(`unexpected ${serverMessage.type}`);
    const last = serverMessage.results[serverMessage.results.length - 1];
    expect(serverMessage.results.length).toBeLessThan(600);
    expect(serverMessage.results.filter((r) => r.outcome).length).toBe(1);
    expect(last.outcome?.message).toBe("Player 2's turn");
    expect(s.match.state.phase).toBe("AwaitingShot");
  });

  it("reports a single idle tick between shots", () => {
    const { serverMessage } = handleClientMessage("T1", session(), { type: "tick", count: 5 });

    if (serverMessage.type !== "tickResult") throw new Error(`unexpected ${serverMessage.type}`);
    expect(serverMessage.results.length).toBe(1);
    expect(serverMessage.results[0].atRest).toBe(true);
  });

  it("rejects tick counts out of range", () => {
    const { serverMessage } = handleClientMessage("T1", session(), { type: "tick", count: 601 });

    expect(serverMessage).toEqual({
      type: "error",
      code: "BAD_MESSAGE",
      message: "Tick count must be an integer in [1, 600].",
    });
  });

  it("racks a new match with the requested player count", () => {
    const s = session();
    s.match.config.rules.passTurnOnMiss = false;

    const { nextState } = handleClientMessage("T1", s, { type: "newMatch", playerCount: 4 });

    expect(nextState).not.toBe(s);
    expect(nextState.match.config.playerCount).toBe(4);
    expect(nextState.match.state.scores).toEqual([0, 0, 0, 0]);
    expect(nextState.match.config.rules.passTurnOnMiss).toBe(false);
  });
});
