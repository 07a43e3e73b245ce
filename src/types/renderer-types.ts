import type { AgentState, ITrailGrid } from "./trail-types";

export interface RendererOptions {
  width: number;
  height: number;
}

export interface RendererMetrics {
  fps: number;
  sceneUpdateTimeMs: number;
}

export interface Renderer {
  update(grid: ITrailGrid, agent: AgentState, opts: RendererOptions): RendererMetrics;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
