import React, { useRef, useEffect } from "react";
import { createMapRenderer } from "../rendering/map-renderer";
import type { Renderer, RendererMetrics } from "../types/renderer-types";
import { SimulationStepper } from "../simulation/simulation-stepper";
import type { SessionStatus, TrailSession } from "../simulation/trail-session";
import { TARGET_FPS } from "../constants";

export interface TrailCanvasProps {
  width: number;
  height: number;
  session: TrailSession;
  targetStepsPerSecond: number;
  paused: boolean;
  onStatus?: (status: SessionStatus, metrics: RendererMetrics) => void;
  onFinished?: () => void;
}

export const TrailCanvas: React.FC<TrailCanvasProps> = ({
  width, height, session, targetStepsPerSecond, paused, onStatus, onFinished,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const targetStepsPerSecondRef = useRef(targetStepsPerSecond);
  targetStepsPerSecondRef.current = targetStepsPerSecond;
  const pausedRef = useRef(paused);
  pausedRef.current = paused;
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onStatusRef = useRef(onStatus);
  onStatusRef.current = onStatus;
  const onFinishedRef = useRef(onFinished);
  onFinishedRef.current = onFinished;

  // One renderer and rAF loop per session run; destroyed on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    const stepper = new SimulationStepper(() => session.tick());

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/TARGET_FPS.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;
      let finishedReported = false;
      let lastRenderKey = "";

      function tick(timestamp: number): void {
        if (destroyed) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;
        const fps = elapsed > 0 ? 1000 / elapsed : 0;

        stepper.paused = pausedRef.current;
        stepper.targetStepsPerSecond = targetStepsPerSecondRef.current;
        stepper.advance(elapsed);

        // Skip the render when neither the trail nor the canvas size changed
        // since the last frame (paused, or the run is over).
        const { width: w, height: h } = sizeRef.current;
        const renderKey = `${session.stepCount}:${w}x${h}`;
        const engine = session.engine;
        if (engine && renderKey !== lastRenderKey) {
          const metrics = renderer.update(engine.grid, engine.agent, { width: w, height: h });
          lastRenderKey = renderKey;
          metrics.fps = fps;
          onStatusRef.current?.(session.status(), metrics);
        }

        if (stepper.done && !finishedReported) {
          finishedReported = true;
          onFinishedRef.current?.();
        }

        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    (async () => {
      const canvas = document.createElement("canvas");
      container.appendChild(canvas);
      const renderer = await createMapRenderer(canvas, sizeRef.current.width, sizeRef.current.height);

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      startRafLoop(renderer);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);
      rendererRef.current?.destroy();
      rendererRef.current = null;

      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, [session]);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  return <div ref={containerRef} />;
};
