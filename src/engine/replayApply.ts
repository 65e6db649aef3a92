import type { ShotInput, TurnOutcome } from "../types";
import type { Match } from "./match";
import type { ReplayLog } from "./replay";
import { recordShot } from "./replayRecorder";
import { playShotWithSync } from "./sync";

export type ApplyAndRecordResult = {
  outcome: TurnOutcome;
  nextLog: ReplayLog;
};

/**
 * Play a shot on the (mutable) match and append a replay entry for it.
 */
export function applyAndRecord(match: Match, shot: ShotInput, log: ReplayLog): ApplyAndRecordResult {
  const { outcome, replayEntry } = playShotWithSync(match, shot);
  return { outcome, nextLog: recordShot(log, replayEntry) };
}
