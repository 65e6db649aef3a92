import type { ReplayEntry, ReplayLog } from "./replay";

/**
 * Append a single replay entry. Pure: the input log is not mutated.
 */
export function recordShot(log: ReplayLog, entry: ReplayEntry): ReplayLog {
  return [...log, entry];
}
