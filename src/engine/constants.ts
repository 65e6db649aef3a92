// src/engine/constants.ts

// Board geometry. The playable square runs from BOARD_MARGIN to BOARD_MARGIN + BOARD_SIZE.
export const BOARD_SIZE = 600;
export const BOARD_MARGIN = 100;

export const POCKET_RADIUS = 30;

// A disc must sink this far past the pocket rim before it counts as captured.
export const CAPTURE_MARGIN = 5;

export const COIN_RADIUS = 15;
export const QUEEN_RADIUS = 15;
export const STRIKER_RADIUS = 20;

export const FRICTION = 0.98;
export const REST_THRESHOLD = 0.1;
export const WALL_RESTITUTION = 0.8;

export const MAX_SHOT_SPEED = 20;

// Striker baseline: distance in from the board edge, and the dead zone at both ends.
export const BASELINE_INSET = 50;
export const BASELINE_END_INSET = 50;

export const STRIKER_IMPACT_THRESHOLD = 0.5;
export const CLACK_THRESHOLD = 1;

export const QUEEN_COVER_BONUS = 3;
export const FOUL_LIMIT = 3;

// Hard stop for a single shot; a shot at full power settles well before this.
export const MAX_TICKS_PER_SHOT = 5000;
