import { computeGridLayout, cellOrigin, cellCenter } from "./grid-utils";

describe("computeGridLayout", () => {
  it("centres a 512px area in a larger canvas", () => {
    expect(computeGridLayout(800, 600, 64)).toEqual({ x: 144, y: 44, side: 512, cellSize: 8 });
  });

  it("shrinks to the smaller canvas dimension", () => {
    expect(computeGridLayout(300, 400, 10)).toEqual({ x: 0, y: 50, side: 300, cellSize: 30 });
  });
});

describe("cellOrigin / cellCenter", () => {
  const layout = computeGridLayout(800, 600, 64);

  it("offsets by column horizontally and row vertically", () => {
    expect(cellOrigin(layout, { row: 2, col: 5 })).toEqual({ x: 184, y: 60 });
  });

  it("centres within the cell", () => {
    expect(cellCenter(layout, { row: 0, col: 0 })).toEqual({ x: 148, y: 48 });
  });
});
