import { SIM_AREA_SIZE } from "../constants";
import type { GridCell } from "../types/trail-types";

/** Placement of the square grid area inside the canvas, in pixels. */
export interface GridLayout {
  x: number;
  y: number;
  side: number;
  cellSize: number;
}

/**
 * Centres a square grid area of at most SIM_AREA_SIZE pixels in a
 * width x height canvas and divides it into size x size cells.
 */
export function computeGridLayout(width: number, height: number, size: number): GridLayout {
  const side = Math.max(0, Math.min(SIM_AREA_SIZE, width, height));
  return {
    x: (width - side) / 2,
    y: (height - side) / 2,
    side,
    cellSize: side / size,
  };
}

/** Top-left pixel of a cell. Row 0 is drawn at the top. */
export function cellOrigin(layout: GridLayout, cell: GridCell): { x: number; y: number } {
  return {
    x: layout.x + cell.col * layout.cellSize,
    y: layout.y + cell.row * layout.cellSize,
  };
}

/** Centre pixel of a cell. */
export function cellCenter(layout: GridLayout, cell: GridCell): { x: number; y: number } {
  const origin = cellOrigin(layout, cell);
  return {
    x: origin.x + layout.cellSize / 2,
    y: origin.y + layout.cellSize / 2,
  };
}
