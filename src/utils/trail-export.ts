import { DEFAULT_TRAIL_NAME, TRAIL_FILE_EXTENSION } from "../constants";
import type { GridCell, ITrailGrid } from "../types/trail-types";

export interface TrailExport {
  fileName: string;
  contents: string;
}

/** Visited cells in row-major order (row ascending, then column). */
export function visitedCells(grid: ITrailGrid): GridCell[] {
  const cells: GridCell[] = [];
  for (let row = 0; row < grid.size; row++) {
    for (let col = 0; col < grid.size; col++) {
      if (grid.isVisited(row, col)) cells.push({ row, col });
    }
  }
  return cells;
}

/** One `(x, y)` line per visited cell, where x is the column and y the row. */
export function formatTrail(grid: ITrailGrid): string {
  return visitedCells(grid).map(({ row, col }) => `(${col}, ${row})\n`).join("");
}

export function trailFileName(name: string): string {
  return `${name || DEFAULT_TRAIL_NAME}${TRAIL_FILE_EXTENSION}`;
}
