import type { ShotInput } from "../types";

/**
 * A single replay entry records one shot, from release to rest.
 */
export type ReplayEntry = {
  /** Hash of the match BEFORE the shot */
  beforeHash: string;

  /** The shot that was played */
  shot: ShotInput;

  /** Disc ids captured during the shot, in order */
  captures: string[];

  /** Hash of the match AFTER the shot resolved */
  afterHash: string;
};

/**
 * A replay log is an ordered list of replay entries.
 */
export type ReplayLog = ReplayEntry[];
