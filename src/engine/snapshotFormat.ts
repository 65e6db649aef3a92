import type { DiscKind, MatchState, ShotRecord } from "../types";
import type { MatchConfig } from "./config";

export const SNAPSHOT_FORMAT_VERSION = 1 as const;

export type DiscSnapshot = {
  id: string;
  kind: DiscKind;
  x: number;
  y: number;
  vx: number;
  vy: number;
  captured: boolean;
};

export type MatchSnapshot = {
  formatVersion: typeof SNAPSHOT_FORMAT_VERSION;
  config: MatchConfig;
  striker: DiscSnapshot;
  coins: DiscSnapshot[];
  state: MatchState;

  // Captures so far when the snapshot was taken mid-shot.
  shot: ShotRecord | null;

  tick: number;
};
