import { TrailGrid } from "./grid";

describe("TrailGrid", () => {
  it("initializes all cells to unvisited", () => {
    const grid = new TrailGrid(6);
    for (let r = 0; r < 6; r++) {
      for (let c = 0; c < 6; c++) {
        expect(grid.isVisited(r, c)).toBe(false);
      }
    }
    expect(grid.visitedCount()).toBe(0);
  });

  it("marks cells visited without touching neighbours", () => {
    const grid = new TrailGrid(4);
    grid.markVisited(1, 2);
    expect(grid.isVisited(1, 2)).toBe(true);
    expect(grid.isVisited(2, 1)).toBe(false);
    expect(grid.cells[grid.idx(1, 2)]).toBe(1);
    expect(grid.visitedCount()).toBe(1);
  });

  it("marking twice keeps a single visited cell", () => {
    const grid = new TrailGrid(4);
    grid.markVisited(0, 0);
    grid.markVisited(0, 0);
    expect(grid.visitedCount()).toBe(1);
  });

  it("does not wrap: edges are out of bounds", () => {
    const grid = new TrailGrid(3);
    expect(grid.inBounds(0, 0)).toBe(true);
    expect(grid.inBounds(2, 2)).toBe(true);
    expect(grid.inBounds(-1, 0)).toBe(false);
    expect(grid.inBounds(0, 3)).toBe(false);
    expect(grid.inBounds(3, 1)).toBe(false);
  });

  it("clear resets every cell", () => {
    const grid = new TrailGrid(3);
    grid.markVisited(0, 1);
    grid.markVisited(2, 2);
    grid.clear();
    expect(grid.visitedCount()).toBe(0);
  });
});
