import type { ShotInput, TurnOutcome } from "../../src/types";
import { playShot, type Match } from "../../src/engine";

export type ScenarioShot = {
  name: string;
  shot: ShotInput;
};

export type ScenarioStep = {
  name: string;
  outcome: TurnOutcome;
  captures: string[];
};

/**
 * Plays shots in order on the given match, each one to rest.
 */
export function runScenario(match: Match, shots: readonly ScenarioShot[]): ScenarioStep[] {
  return shots.map(({ name, shot }) => {
    const played = playShot(match, shot);
    return { name, outcome: played.outcome, captures: played.captures };
  });
}
