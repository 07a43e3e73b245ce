import type { Direction } from "../simulation/direction";

/** A grid cell address. Row 0 is the top row, col 0 the leftmost column. */
export interface GridCell {
  row: number;
  col: number;
}

/** Position and heading of the walking agent. */
export interface AgentState {
  location: GridCell;
  heading: Direction;
}

/** Parameters fixed for the lifetime of an engine instance. */
export interface TrailConfig {
  /** Side length of the square grid. */
  size: number;
  /** Probability of taking an available turn when going straight is also possible. */
  turnProbability: number;
  /** Probability that the agent's current cell is left unmarked on a tick. */
  forgetProbability: number;
}

/**
 * Read-only view of the occupancy grid.
 * Used by rendering and export code that reads grid state without modifying it.
 */
export interface ITrailGrid {
  readonly size: number;
  inBounds(row: number, col: number): boolean;
  isVisited(row: number, col: number): boolean;
  visitedCount(): number;
}
