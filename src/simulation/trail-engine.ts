import { START_WINDOW_RADIUS } from "../constants";
import type { AgentState, ITrailGrid, TrailConfig } from "../types/trail-types";
import { directionAt, isDirection } from "./direction";
import { TrailGrid } from "./grid";
import { validMoves, CandidateMove } from "./moves";
import { createRandomSource, pickOne, randomInt, RandomSource } from "./random";
import { InvalidTrailConfigError, validateTrailConfig } from "./trail-config";

export interface TrailEngineOptions {
  /** Seed for the engine's own generator. Ignored when `random` is given. */
  seed?: string;
  /** Replaces the engine's generator. */
  random?: RandomSource;
  /** Starting state for the first run instead of a random one. */
  start?: AgentState;
}

/**
 * Half-open range of start coordinates: a window of width 2 * START_WINDOW_RADIUS
 * centred on the grid, clamped to the grid for sizes smaller than the window.
 */
export function startWindow(size: number): [number, number] {
  const mid = Math.floor(size / 2);
  return [Math.max(0, mid - START_WINDOW_RADIUS), Math.min(size, mid + START_WINDOW_RADIUS)];
}

/**
 * Walks an agent across a square grid, leaving a one-cell-wide trail that
 * never touches itself.
 *
 * Each step:
 * 1. Mark the current cell, unless the forget draw says to skip it
 * 2. Collect the straight/left/right moves that stay on the grid and keep the
 *    trail from touching itself
 * 3. Pick one (preferring a turn with probability turnProbability), or report
 *    trapped when there is none
 *
 * Validity is checked against marked cells only, so cells skipped by the
 * forget draw do not constrain later moves.
 */
export class TrailEngine {
  readonly config: Readonly<TrailConfig>;

  private readonly cells: TrailGrid;
  private readonly random: RandomSource;
  private agentState: AgentState;
  private isTrapped = false;

  constructor(config: TrailConfig, options: TrailEngineOptions = {}) {
    this.config = validateTrailConfig(config);
    this.random = options.random ?? createRandomSource(options.seed);
    this.cells = new TrailGrid(this.config.size);
    this.agentState = this.startState(options.start);
  }

  get grid(): ITrailGrid {
    return this.cells;
  }

  get agent(): AgentState {
    const { location, heading } = this.agentState;
    return { location: { ...location }, heading };
  }

  get trapped(): boolean {
    return this.isTrapped;
  }

  /** Clears the grid and places the agent for a fresh run. */
  reset(start?: AgentState): void {
    const state = this.startState(start);
    this.cells.clear();
    this.agentState = state;
    this.isTrapped = false;
  }

  /** Advances one tick. A no-op once trapped. */
  step(): void {
    if (this.isTrapped) return;

    const { location } = this.agentState;
    if (this.random() > this.config.forgetProbability) {
      this.cells.markVisited(location.row, location.col);
    }

    const moves = validMoves(this.cells, this.agentState);
    const chosen = this.chooseMove(moves);
    if (!chosen) {
      this.isTrapped = true;
      return;
    }

    this.agentState = { location: chosen.location, heading: chosen.heading };
  }

  private chooseMove(moves: CandidateMove[]): CandidateMove | undefined {
    const straight = moves.find(m => m.move === "straight");
    const turns = moves.filter(m => m.move !== "straight");

    if (straight && turns.length > 0) {
      return this.random() < this.config.turnProbability ? pickOne(this.random, turns) : straight;
    }
    if (turns.length > 0) {
      return pickOne(this.random, turns);
    }
    return straight;
  }

  private startState(start?: AgentState): AgentState {
    const { size } = this.config;
    if (start) {
      const { row, col } = start.location;
      if (!this.cells.inBounds(row, col) || !isDirection(start.heading)) {
        throw new InvalidTrailConfigError([
          `start (${row}, ${col}) heading ${start.heading} is outside a ${size}x${size} grid`,
        ]);
      }
      return { location: { row, col }, heading: start.heading };
    }

    const [lo, hi] = startWindow(size);
    const row = randomInt(this.random, lo, hi);
    const col = randomInt(this.random, lo, hi);
    const heading = directionAt(randomInt(this.random, 0, 4));
    return { location: { row, col }, heading };
  }
}
