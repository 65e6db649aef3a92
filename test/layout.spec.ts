import { describe, it, expect } from "vitest";
import { baselinePoint, openingLayout, strikerBaseline } from "../src/engine/layout";
import { vecDist } from "../src/engine/vector";
import { physics } from "./helpers";

describe("board layout", () => {
  const p = physics();

  it("racks the queen in the centre with 11 light and 12 dark coins", () => {
    const seeds = openingLayout(p);

    expect(seeds.length).toBe(24);
    expect(seeds[0]).toEqual({ kind: "Queen", x: 400, y: 400 });
    expect(seeds.filter((s) => s.kind === "RegularLight").length).toBe(11);
    expect(seeds.filter((s) => s.kind === "RegularDark").length).toBe(12);
  });

  it("racks without overlaps", () => {
    const seeds = openingLayout(p);
    for (let i = 0; i < seeds.length; i++) {
      for (let j = i + 1; j < seeds.length; j++) {
        expect(vecDist(seeds[i], seeds[j])).toBeGreaterThanOrEqual(30);
      }
    }
  });

  it("puts players 1 and 2 on opposite baselines in a 2-player match", () => {
    expect(strikerBaseline(1, 2, p)).toEqual({ side: "bottom", axis: "x", fixed: 650, min: 170, max: 630 });
    expect(strikerBaseline(2, 2, p)).toEqual({ side: "top", axis: "x", fixed: 150, min: 170, max: 630 });
  });

  it("goes round the board in a 4-player match", () => {
    expect(strikerBaseline(2, 4, p).side).toBe("right");
    expect(strikerBaseline(3, 4, p).side).toBe("top");
    expect(strikerBaseline(4, 4, p)).toEqual({ side: "left", axis: "y", fixed: 150, min: 170, max: 630 });
  });

  it("refuses seats that are not at the table", () => {
    expect(() => strikerBaseline(3, 2, p)).toThrow("Player 3 is not seated in a 2-player match.");
  });

  it("places the striker mid-baseline by default and clamps offsets", () => {
    const bottom = strikerBaseline(1, 2, p);
    const right = strikerBaseline(2, 4, p);

    expect(baselinePoint(bottom)).toEqual({ x: 400, y: 650 });
    expect(baselinePoint(bottom, 100)).toEqual({ x: 170, y: 650 });
    expect(baselinePoint(bottom, 900)).toEqual({ x: 630, y: 650 });
    expect(baselinePoint(right, 300)).toEqual({ x: 650, y: 300 });
  });
});
