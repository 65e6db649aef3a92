import { describe, it, expect } from "vitest";
import { findCapturingPocket, makePockets } from "../src/engine/pockets";
import { disc, physics } from "./helpers";

describe("pockets", () => {
  const pockets = makePockets(physics());

  it("places one pocket in each corner, top-left first", () => {
    expect(pockets).toEqual([
      { x: 100, y: 100, radius: 30 },
      { x: 700, y: 100, radius: 30 },
      { x: 100, y: 700, radius: 30 },
      { x: 700, y: 700, radius: 30 },
    ]);
  });

  it("captures a disc whose centre is inside radius minus margin", () => {
    expect(findCapturingPocket(disc("light-0", "RegularLight", 115, 115), pockets, 5)).toBe(0);
    expect(findCapturingPocket(disc("light-0", "RegularLight", 685, 685), pockets, 5)).toBe(3);
  });

  it("needs the centre strictly inside", () => {
    expect(findCapturingPocket(disc("light-0", "RegularLight", 125, 100), pockets, 5)).toBeNull();
    expect(findCapturingPocket(disc("light-0", "RegularLight", 120, 120), pockets, 5)).toBeNull();
  });

  it("skips discs already captured", () => {
    const d = disc("light-0", "RegularLight", 110, 110);
    d.captured = true;
    expect(findCapturingPocket(d, pockets, 5)).toBeNull();
  });
});
