import type { ReplayLog } from "./replay";
import type { MatchSnapshot } from "./snapshotFormat";

export const REPLAY_FORMAT_VERSION = 1 as const;

export type ReplayFileV1 = {
  formatVersion: typeof REPLAY_FORMAT_VERSION;

  // ISO timestamp string
  createdAt: string;

  // Match as it was before the first recorded shot (authoritative start point)
  initialSnapshot: MatchSnapshot;

  // Recorded shots
  log: ReplayLog;
};

export type ReplayFile = ReplayFileV1;
