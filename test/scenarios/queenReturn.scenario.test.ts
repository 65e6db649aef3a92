import { describe, it, expect } from "vitest";
import { runScenario } from "./runScenario";
import { findDisc } from "../../src/engine";
import { DIAGONAL_SHOT, makeDiagonalMatch } from "../helpers";

describe("Scenario: queen pocketed and left uncovered", () => {
  it("returns the queen once and the turn changes twice", () => {
    const match = makeDiagonalMatch({}, "Queen");

    const steps = runScenario(match, [
      { name: "P1 pockets the queen", shot: DIAGONAL_SHOT },
      { name: "P1 misses the cover", shot: { angle: Math.PI / 2, power: 0.1 } },
      { name: "P2 misses", shot: { angle: -Math.PI / 2, power: 0.1 } },
    ]);

    expect(steps.map((s) => s.captures)).toEqual([["queen"], [], []]);
    expect(steps.map((s) => s.outcome.message)).toEqual([
      "Player 1 pocketed the Queen! Must cover it.",
      "Player 2's turn. The Queen goes back to the centre.",
      "Player 1's turn",
    ]);

    expect(steps.filter((s) => s.outcome.queenReturned).length).toBe(1);
    expect(steps.filter((s) => s.outcome.turnChanged).length).toBe(2);

    expect(match.state.pendingQueenCover).toBe(false);
    expect(match.state.queenPocketed).toBe(false);
    expect(match.state.scores).toEqual([0, 0]);
    expect(findDisc(match.world, "queen")).toMatchObject({ x: 400, y: 400, captured: false });
  });
});
