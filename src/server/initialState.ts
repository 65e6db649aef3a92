import { createMatch, type Match, type RulesConfig } from "../engine";
import type { PlayerCount } from "../types";

/**
 * Fresh match for a newly opened table.
 */
export function createInitialMatch(playerCount: PlayerCount, rules: Partial<RulesConfig> = {}): Match {
  return createMatch({ playerCount, rules });
}
