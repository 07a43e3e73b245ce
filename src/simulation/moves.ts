import { DIRECTION_VECTORS, RELATIVE_MOVES, turn, Direction, RelativeMove } from "./direction";
import type { AgentState, GridCell, ITrailGrid } from "../types/trail-types";

export interface CandidateMove {
  move: RelativeMove;
  heading: Direction;
  location: GridCell;
}

/** Returns the cell one step from `location` along `heading`. */
export function stepFrom(location: GridCell, heading: Direction): GridCell {
  const [dr, dc] = DIRECTION_VECTORS[heading];
  return { row: location.row + dr, col: location.col + dc };
}

/**
 * A move into `target` keeps the trail one cell wide: the target must be
 * unvisited and, apart from the cell the agent is leaving, none of its
 * in-bounds orthogonal neighbours may be visited.
 */
export function isMoveValid(grid: ITrailGrid, target: GridCell, current: GridCell): boolean {
  if (grid.isVisited(target.row, target.col)) return false;

  for (const [dr, dc] of DIRECTION_VECTORS) {
    const r = target.row + dr;
    const c = target.col + dc;
    if (r === current.row && c === current.col) continue;
    if (!grid.inBounds(r, c)) continue;
    if (grid.isVisited(r, c)) return false;
  }
  return true;
}

/**
 * Straight, left and right moves from the agent's state that stay on the grid
 * and pass `isMoveValid`, in straight/left/right order.
 */
export function validMoves(grid: ITrailGrid, agent: AgentState): CandidateMove[] {
  const moves: CandidateMove[] = [];
  for (const move of RELATIVE_MOVES) {
    const heading = turn(agent.heading, move);
    const location = stepFrom(agent.location, heading);
    if (!grid.inBounds(location.row, location.col)) continue;
    if (isMoveValid(grid, location, agent.location)) {
      moves.push({ move, heading, location });
    }
  }
  return moves;
}
