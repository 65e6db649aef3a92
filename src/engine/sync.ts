import type { ShotInput, TurnOutcome } from "../types";
import { MAX_TICKS_PER_SHOT } from "./constants";
import { advanceTick, positionStriker, type Match } from "./match";
import type { ReplayEntry } from "./replay";
import { validateShot } from "./ruleEngine";
import { hashMatch } from "./stateHash";
import { tryBeginShot } from "./tryApply";

export type PlayedShot = {
  outcome: TurnOutcome;

  // Disc ids in the order they dropped, striker included.
  captures: string[];

  ticks: number;
};

/**
 * Place, release and run one shot until it resolves.
 * Throws if the shot is rejected or does not settle within `maxTicks`. A rejected shot leaves
 * the striker where it was.
 */
export function playShot(match: Match, shot: ShotInput, maxTicks = MAX_TICKS_PER_SHOT): PlayedShot {
  const invalid = validateShot(match.state, shot);
  if (invalid) throw new Error(`${invalid.code}: ${invalid.message}`);

  if (shot.strikerOffset !== undefined) {
    const placed = positionStriker(match, shot.strikerOffset);
    if (!placed.ok) throw new Error(`${placed.error.code}: ${placed.error.message}`);
  }

  const started = tryBeginShot(match, { angle: shot.angle, power: shot.power });
  if (!started.ok) throw new Error(`${started.error.code}: ${started.error.message}`);

  const captures: string[] = [];
  for (let ticks = 1; ticks <= maxTicks; ticks++) {
    const result = advanceTick(match);
    captures.push(...result.captures);
    if (result.outcome) return { outcome: result.outcome, captures, ticks };
  }

  throw new Error(`Shot did not settle within ${maxTicks} ticks.`);
}

export type SyncResult = {
  outcome: TurnOutcome;
  afterHash: string;
  replayEntry: ReplayEntry;
};

/**
 * Play a shot and return a minimal sync payload:
 * - outcome (what the presentation layer shows)
 * - afterHash (client/server sync check)
 * - replayEntry (for audit/replay streams)
 */
export function playShotWithSync(match: Match, shot: ShotInput): SyncResult {
  const beforeHash = hashMatch(match);
  const played = playShot(match, shot);
  const afterHash = hashMatch(match);

  const replayEntry: ReplayEntry = {
    beforeHash,
    shot,
    captures: played.captures,
    afterHash,
  };

  return { outcome: played.outcome, afterHash, replayEntry };
}
