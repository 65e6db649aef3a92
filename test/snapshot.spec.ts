import { describe, it, expect } from "vitest";
import {
  advanceTick,
  createMatch,
  deserializeSnapshot,
  hashMatch,
  restoreMatch,
  serializeSnapshot,
  snapshotMatch,
  tryBeginShot,
  tryRestore,
  type Match,
} from "../src/engine";
import type { TickResult } from "../src/types";

function runToOutcome(match: Match): { captures: string[]; last: TickResult } {
  const captures: string[] = [];
  let last = advanceTick(match);
  captures.push(...last.captures);
  while (!last.outcome && last.tick < 5000) {
    last = advanceTick(match);
    captures.push(...last.captures);
  }
  return { captures, last };
}

describe("match snapshots", () => {
  it("round-trips through JSON", () => {
    const match = createMatch({ playerCount: 4 });
    const snap = snapshotMatch(match);

    expect(deserializeSnapshot(serializeSnapshot(snap))).toEqual(snap);
  });

  it("resumes a shot mid-flight exactly like the uninterrupted run", () => {
    const original = createMatch();
    const shot = tryBeginShot(original, { angle: -Math.PI / 2, power: 1 });
    expect(shot.ok).toBe(true);
    for (let i = 0; i < 10; i++) advanceTick(original);

    const resumed = restoreMatch(JSON.parse(serializeSnapshot(snapshotMatch(original))));
    expect(hashMatch(resumed)).toBe(hashMatch(original));

    const a = runToOutcome(original);
    const b = runToOutcome(resumed);

    expect(b.captures).toEqual(a.captures);
    expect(b.last.outcome).toEqual(a.last.outcome);
    expect(resumed.state).toEqual(original.state);
    expect(hashMatch(resumed)).toBe(hashMatch(original));
  });

  it("does not share state with the match it was taken from", () => {
    const match = createMatch();
    const snap = snapshotMatch(match);

    match.state.scores[0] = 7;
    match.world.coins[0].x = 123;

    expect(snap.state.scores[0]).toBe(0);
    expect(snap.coins[0].x).toBe(400);
  });

  it("reports a corrupt snapshot instead of throwing", () => {
    const res = tryRestore({ formatVersion: 1, config: null });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("CORRUPT_SNAPSHOT");
    expect(res.error.message).toBe("[validateSnapshot @ restoreMatch] config missing or not an object");
  });

  it("rejects an unknown format version", () => {
    const snap = { ...snapshotMatch(createMatch()), formatVersion: 2 };

    expect(() => restoreMatch(snap)).toThrow("[validateSnapshot @ restoreMatch] unsupported formatVersion: 2");
  });

  it("rejects duplicate disc ids", () => {
    const snap = snapshotMatch(createMatch());
    snap.coins[2] = { ...snap.coins[2], id: snap.coins[1].id };

    expect(() => restoreMatch(snap)).toThrow(/duplicate disc id: dark-0/);
  });

  it("rejects a shot record outside ShotInFlight", () => {
    const snap = snapshotMatch(createMatch());
    const bad = { ...snap, shot: { captures: [], strikerCaptured: false } };

    expect(() => restoreMatch(bad)).toThrow(/shot must be present exactly while ShotInFlight/);
  });

  it("rejects a pending cover without a pocketed queen", () => {
    const snap = snapshotMatch(createMatch());
    const bad = { ...snap, state: { ...snap.state, pendingQueenCover: true } };

    expect(tryRestore(bad)).toEqual({
      ok: false,
      error: {
        code: "CORRUPT_SNAPSHOT",
        message: "[validateSnapshot @ restoreMatch] pendingQueenCover requires queenPocketed",
      },
    });
  });

  it("rejects a snapshot taken during turn resolution", () => {
    const snap = snapshotMatch(createMatch());
    const bad = { ...snap, state: { ...snap.state, phase: "TurnResolution" } };

    expect(tryRestore(bad)).toEqual({
      ok: false,
      error: {
        code: "CORRUPT_SNAPSHOT",
        message: "[validateSnapshot @ restoreMatch] state.phase TurnResolution is never stored",
      },
    });
  });

  it("rejects a captured queen the state does not know about", () => {
    const snap = snapshotMatch(createMatch());
    snap.coins[0] = { ...snap.coins[0], captured: true };

    const res = tryRestore(snap);

    expect(snap.coins[0].id).toBe("queen");
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("[validateSnapshot @ restoreMatch] captured queen requires queenPocketed");
  });

  it("rejects a pocketed queen that is still on the board", () => {
    const snap = snapshotMatch(createMatch());
    const bad = { ...snap, state: { ...snap.state, queenPocketed: true } };

    expect(() => restoreMatch(bad)).toThrow("[validateSnapshot @ restoreMatch] queenPocketed requires a captured queen");
  });

  it("rejects a foul count at the limit between shots", () => {
    const snap = snapshotMatch(createMatch());
    const bad = { ...snap, state: { ...snap.state, foulCount: 3 } };

    expect(() => restoreMatch(bad)).toThrow("[validateSnapshot @ restoreMatch] state.foulCount at or past the foul limit");
  });

  it("accepts a foul count at the limit while the shot that reached it is in flight", () => {
    const match = createMatch();
    match.state.foulCount = 2;
    expect(tryBeginShot(match, { angle: -Math.PI / 2, power: 0.5 }).ok).toBe(true);

    const restored = restoreMatch(snapshotMatch(match));

    expect(restored.state.foulCount).toBe(3);
    expect(restored.state.phase).toBe("ShotInFlight");
  });
});
