/**
 * Absolute headings. Increasing the value by one is a clockwise quarter turn,
 * decreasing it a counter-clockwise one.
 */
export const Direction = {
  Up: 0,
  Right: 1,
  Down: 2,
  Left: 3,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

const DIRECTIONS: readonly Direction[] = [Direction.Up, Direction.Right, Direction.Down, Direction.Left];

/** Unit [dRow, dCol] vector for each heading, indexed by Direction. */
export const DIRECTION_VECTORS: readonly (readonly [number, number])[] = [
  [-1, 0],
  [0, 1],
  [1, 0],
  [0, -1],
];

/** Moves the agent may take relative to its heading. */
export type RelativeMove = "straight" | "left" | "right";

/** Heading offset of each relative move. */
export const MOVE_DELTAS: Readonly<Record<RelativeMove, -1 | 0 | 1>> = {
  straight: 0,
  left: -1,
  right: 1,
};

/** Candidate order: straight first, then the turns in the order they are picked from. */
export const RELATIVE_MOVES: readonly RelativeMove[] = ["straight", "left", "right"];

export function isDirection(value: number): value is Direction {
  return Number.isInteger(value) && value >= 0 && value < DIRECTIONS.length;
}

/** Returns the heading reached by applying `move` to `heading`. */
export function turn(heading: Direction, move: RelativeMove): Direction {
  return DIRECTIONS[(heading + MOVE_DELTAS[move] + 4) % 4];
}

/** Returns the Direction for an index in 0..3 (wrapping other integers). */
export function directionAt(index: number): Direction {
  return DIRECTIONS[((index % 4) + 4) % 4];
}
