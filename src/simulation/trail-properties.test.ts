import { TrailEngine } from "./trail-engine";
import { DIRECTION_VECTORS } from "./direction";
import type { GridCell, TrailConfig } from "../types/trail-types";

const MAX_TICKS = 5000;

function snapshot(engine: TrailEngine): boolean[] {
  const { size } = engine.config;
  const cells: boolean[] = [];
  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      cells.push(engine.grid.isVisited(r, c));
    }
  }
  return cells;
}

/** Steps until trapped (or MAX_TICKS), calling `check` after every tick. */
function runToEnd(engine: TrailEngine, check: (before: GridCell) => void): number {
  let ticks = 0;
  while (!engine.trapped && ticks < MAX_TICKS) {
    const before = engine.agent.location;
    engine.step();
    ticks++;
    check(before);
  }
  return ticks;
}

const configs: TrailConfig[] = [
  { size: 12, turnProbability: 0.2, forgetProbability: 0 },
  { size: 12, turnProbability: 0.8, forgetProbability: 0.3 },
  { size: 25, turnProbability: 0.5, forgetProbability: 0.1 },
  { size: 3, turnProbability: 0.5, forgetProbability: 0 },
];

describe("trail properties", () => {
  it("keeps the agent on the grid", () => {
    configs.forEach((config, ci) => {
      for (let run = 0; run < 10; run++) {
        const engine = new TrailEngine(config, { seed: `bounds-${ci}-${run}` });
        runToEnd(engine, () => {
          const { row, col } = engine.agent.location;
          expect(engine.grid.inBounds(row, col)).toBe(true);
        });
      }
    });
  });

  it("never unmarks a visited cell", () => {
    configs.forEach((config, ci) => {
      for (let run = 0; run < 5; run++) {
        const engine = new TrailEngine(config, { seed: `monotonic-${ci}-${run}` });
        let previous = snapshot(engine);
        runToEnd(engine, () => {
          const current = snapshot(engine);
          previous.forEach((wasVisited, i) => {
            if (wasVisited) expect(current[i]).toBe(true);
          });
          previous = current;
        });
      }
    });
  });

  it("leaves grid and agent untouched once trapped", () => {
    for (let run = 0; run < 10; run++) {
      const engine = new TrailEngine({ size: 8, turnProbability: 0.5, forgetProbability: 0 }, { seed: `sticky-${run}` });
      runToEnd(engine, () => undefined);
      expect(engine.trapped).toBe(true);

      const grid = snapshot(engine);
      const agent = engine.agent;
      for (let i = 0; i < 10; i++) engine.step();
      expect(snapshot(engine)).toEqual(grid);
      expect(engine.agent).toEqual(agent);
      expect(engine.trapped).toBe(true);
    }
  });

  it("marks each cell touching at most the previously marked cell", () => {
    for (let run = 0; run < 30; run++) {
      const engine = new TrailEngine(
        { size: 16, turnProbability: (run % 5) / 4, forgetProbability: 0 },
        { seed: `adjacency-${run}` },
      );
      let lastMarked: GridCell | null = null;
      let markedCount = 0;

      runToEnd(engine, before => {
        expect(engine.grid.isVisited(before.row, before.col)).toBe(true);
        markedCount++;

        for (const [dr, dc] of DIRECTION_VECTORS) {
          const r = before.row + dr;
          const c = before.col + dc;
          if (!engine.grid.inBounds(r, c) || !engine.grid.isVisited(r, c)) continue;
          expect(lastMarked).toEqual({ row: r, col: c });
        }
        lastMarked = before;
      });

      expect(engine.grid.visitedCount()).toBe(markedCount);
    }
  });

  it("marks a smaller share of ticks as the forget probability rises", () => {
    const forgetLevels = [0, 0.3, 0.6, 0.9];
    const shares = forgetLevels.map(forgetProbability => {
      let marked = 0;
      let ticks = 0;
      for (let run = 0; run < 40; run++) {
        const engine = new TrailEngine(
          { size: 30, turnProbability: 0.3, forgetProbability },
          { seed: `forget-${forgetProbability}-${run}` },
        );
        for (let i = 0; i < 300 && !engine.trapped; i++) {
          engine.step();
          ticks++;
        }
        marked += engine.grid.visitedCount();
      }
      return marked / ticks;
    });

    expect(shares[0]).toBe(1);
    for (let i = 1; i < shares.length; i++) {
      expect(shares[i]).toBeLessThan(shares[i - 1]);
    }
  });
});
