import { TrailEngine } from "./trail-engine";
import {
  DEFAULT_SETTINGS_INPUT, parseTrailSettings, TrailSettings, TrailSettingsInput, TrailSettingsResult,
} from "./trail-config";
import { formatTrail, trailFileName, TrailExport } from "../utils/trail-export";
import type { TrailConfig } from "../types/trail-types";

export type SessionPhase = "input" | "simulating" | "finished";

export interface SessionStatus {
  phase: SessionPhase;
  stepCount: number;
  /** Step budget of the current run, 0 for none. */
  maxSteps: number;
  visitedCount: number;
  trapped: boolean;
}

export type EngineFactory = (config: TrailConfig) => TrailEngine;

/**
 * Drives one trail at a time: collects settings, steps the engine while
 * enforcing the step budget, and produces the export. The engine only knows
 * whether it is trapped; the budget lives here.
 */
export class TrailSession {
  phase: SessionPhase = "input";
  lastInput: TrailSettingsInput = { ...DEFAULT_SETTINGS_INPUT };
  stepCount = 0;

  private current: { engine: TrailEngine; settings: TrailSettings } | null = null;
  private readonly createEngine: EngineFactory;

  constructor(createEngine: EngineFactory = config => new TrailEngine(config)) {
    this.createEngine = createEngine;
  }

  get engine(): TrailEngine | null {
    return this.current?.engine ?? null;
  }

  get settings(): TrailSettings | null {
    return this.current?.settings ?? null;
  }

  /**
   * Starts a run from the form values. Invalid input leaves the session in
   * the input phase; the values are remembered either way.
   */
  start(input: TrailSettingsInput): TrailSettingsResult {
    this.lastInput = { ...input };
    const result = parseTrailSettings(input);
    if (!result.ok) {
      console.warn(result.error);
      this.phase = "input";
      return result;
    }

    let engine: TrailEngine;
    try {
      engine = this.createEngine(result.settings.config);
    } catch (err) {
      // e.g. a grid too large to allocate
      const detail = err instanceof Error ? err.message : String(err);
      const error = `Error creating trail: ${detail}. Please try a smaller grid size.`;
      console.warn(error);
      this.phase = "input";
      return { ok: false, error };
    }

    this.current = { engine, settings: result.settings };
    this.stepCount = 0;
    this.phase = "simulating";
    return result;
  }

  /** Advances the run by one tick. Returns false once the run is over. */
  tick(): boolean {
    if (this.phase !== "simulating" || !this.current) return false;

    const { engine, settings } = this.current;
    engine.step();
    this.stepCount++;

    const budgetSpent = settings.maxSteps > 0 && this.stepCount >= settings.maxSteps;
    if (engine.trapped || budgetSpent) {
      this.phase = "finished";
      return false;
    }
    return true;
  }

  /** Returns to the settings form; `lastInput` pre-fills it. */
  restart(): void {
    this.phase = "input";
  }

  exportTrail(): TrailExport | null {
    if (!this.current) return null;
    const { engine, settings } = this.current;
    return {
      fileName: trailFileName(settings.name),
      contents: formatTrail(engine.grid),
    };
  }

  status(): SessionStatus {
    const engine = this.current?.engine;
    return {
      phase: this.phase,
      stepCount: this.stepCount,
      maxSteps: this.current?.settings.maxSteps ?? 0,
      visitedCount: engine ? engine.grid.visitedCount() : 0,
      trapped: engine ? engine.trapped : false,
    };
  }
}
