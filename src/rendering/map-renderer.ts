import { Application, Graphics } from "pixi.js";
import { AGENT_COLOR, BG_COLOR, GRID_BG_COLOR, TRAIL_COLOR } from "../constants";
import { cellCenter, cellOrigin, computeGridLayout } from "../utils/grid-utils";
import type { AgentState, ITrailGrid } from "../types/trail-types";
import type { Renderer, RendererOptions, RendererMetrics } from "../types/renderer-types";

/**
 * Draws the occupancy grid as a square map: one trail-colored rect per
 * visited cell on the grid background, with the agent as a circle on top.
 */
export async function createMapRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: BG_COLOR });
  app.ticker.stop();

  const gridBg = new Graphics();
  const trail = new Graphics();
  const agentMarker = new Graphics();
  app.stage.addChild(gridBg, trail, agentMarker);

  // Scene-update timing tracked internally via EMA
  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function update(grid: ITrailGrid, agent: AgentState, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const layout = computeGridLayout(opts.width, opts.height, grid.size);

    gridBg.clear();
    gridBg.rect(layout.x, layout.y, layout.side, layout.side).fill({ color: GRID_BG_COLOR });

    trail.clear();
    for (let row = 0; row < grid.size; row++) {
      for (let col = 0; col < grid.size; col++) {
        if (!grid.isVisited(row, col)) continue;
        const { x, y } = cellOrigin(layout, { row, col });
        trail.rect(x, y, layout.cellSize, layout.cellSize).fill({ color: TRAIL_COLOR });
      }
    }

    const center = cellCenter(layout, agent.location);
    agentMarker.clear();
    agentMarker.circle(center.x, center.y, layout.cellSize / 2).fill({ color: AGENT_COLOR });

    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return { fps: 0, sceneUpdateTimeMs };
  }

  return {
    canvas: app.canvas as unknown as HTMLCanvasElement,
    update,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
    },
    destroy() {
      app.destroy();
    },
  };
}
