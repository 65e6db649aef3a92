import type { Match } from "./match";
import { launchStriker } from "./physicsWorld";
import { beginShot, validateShot, type ShotCommand } from "./ruleEngine";
import type { ShotResponse } from "./serverEnvelope";
import { makeShotRecord } from "./shotRecord";
import { hashMatch } from "./stateHash";

/**
 * Validate a shot and, if it is acceptable, release the striker.
 *
 * Rejections leave the match exactly as it was. On success the match is in ShotInFlight
 * and the caller drives it with advanceTick until a tick carries an outcome.
 */
export function tryBeginShot(match: Match, shot: ShotCommand): ShotResponse {
  const error = validateShot(match.state, shot);
  if (error) return { ok: false, error };

  const beforeHash = hashMatch(match);
  const speed = shot.power * match.config.physics.maxShotSpeed;

  beginShot(match.state);
  match.shot = makeShotRecord();
  launchStriker(match.world, shot.angle, speed);

  return {
    ok: true,
    beforeHash,
    velocity: { x: match.world.striker.vx, y: match.world.striker.vy },
    turn: {
      currentPlayer: match.state.currentPlayer,
      phase: match.state.phase,
      foulCount: match.state.foulCount,
    },
  };
}
