import type { ShotCapture, ShotRecord } from "../types";

export function makeShotRecord(): ShotRecord {
  return { captures: [], strikerCaptured: false };
}

/**
 * Fold one tick's captures into the running record, keeping capture order.
 */
export function recordCaptures(
  record: ShotRecord,
  captures: readonly ShotCapture[],
  strikerCaptured: boolean
): void {
  record.captures.push(...captures);
  if (strikerCaptured) record.strikerCaptured = true;
}

export function cloneShotRecord(record: ShotRecord): ShotRecord {
  return {
    captures: record.captures.map((c) => ({ ...c })),
    strikerCaptured: record.strikerCaptured,
  };
}
