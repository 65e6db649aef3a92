// src/engine/sides.ts
//
// Who shoots which color, and whose turn comes next.
// Odd seats (1, 3) play light, even seats (2, 4) play dark; in 4-player mode partners sit
// opposite each other.

import type { CoinColor, PlayerCount, PlayerNumber } from "../types";

export function isPlayerNumber(n: unknown, playerCount: PlayerCount): n is PlayerNumber {
  return typeof n === "number" && Number.isInteger(n) && n >= 1 && n <= playerCount;
}

export function colorForPlayer(player: PlayerNumber): CoinColor {
  return player % 2 === 1 ? "light" : "dark";
}

export function opposingColor(color: CoinColor): CoinColor {
  return color === "light" ? "dark" : "light";
}

/**
 * Seat order. 2 players toggle, 4 players rotate 1 -> 2 -> 3 -> 4 -> 1.
 */
export function playerOrder(playerCount: PlayerCount): readonly PlayerNumber[] {
  return playerCount === 2 ? [1, 2] : [1, 2, 3, 4];
}

export function nextPlayer(current: PlayerNumber, playerCount: PlayerCount): PlayerNumber {
  const order = playerOrder(playerCount);
  const idx = order.indexOf(current);
  if (idx < 0) throw new Error(`Player ${current} is not seated in a ${playerCount}-player match.`);
  return order[(idx + 1) % order.length];
}

export function playersOfColor(color: CoinColor, playerCount: PlayerCount): PlayerNumber[] {
  return playerOrder(playerCount).filter((p) => colorForPlayer(p) === color);
}

/**
 * The player credited with a side's win: the shooter when they are on that side,
 * otherwise the lowest seat of the side.
 */
export function winnerForColor(
  color: CoinColor,
  shooter: PlayerNumber,
  playerCount: PlayerCount
): PlayerNumber {
  if (colorForPlayer(shooter) === color) return shooter;
  const side = playersOfColor(color, playerCount);
  return side[0];
}
