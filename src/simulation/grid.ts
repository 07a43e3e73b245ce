import type { ITrailGrid } from "../types/trail-types";

/**
 * Square occupancy grid. Cells are 0 (unvisited) or 1 (visited), stored
 * row-major. Coordinates do not wrap; callers check `inBounds` first.
 */
export class TrailGrid implements ITrailGrid {
  readonly size: number;
  readonly cells: Uint8Array;

  constructor(size: number) {
    this.size = size;
    this.cells = new Uint8Array(size * size);
  }

  idx(r: number, c: number): number {
    return r * this.size + c;
  }

  inBounds(r: number, c: number): boolean {
    return r >= 0 && r < this.size && c >= 0 && c < this.size;
  }

  isVisited(r: number, c: number): boolean {
    return this.cells[this.idx(r, c)] === 1;
  }

  markVisited(r: number, c: number): void {
    this.cells[this.idx(r, c)] = 1;
  }

  visitedCount(): number {
    let count = 0;
    for (const val of this.cells) if (val) count++;
    return count;
  }

  clear(): void {
    this.cells.fill(0);
  }
}
