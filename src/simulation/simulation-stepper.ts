import { DEFAULT_STEPS_PER_SECOND } from "../constants";

/**
 * Runs a tick function at a target steps-per-second rate, independent of
 * frame rate. The tick function returns false once the run is over; the
 * stepper then stops calling it until `reset()`.
 */
export class SimulationStepper {
  targetStepsPerSecond = DEFAULT_STEPS_PER_SECOND;
  paused = false;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in tick calls per frame, in ms. */
  stepTimeMs = 0;

  /** Ticks executed by the most recent advance(). */
  lastStepsThisFrame = 0;

  private accumulator = 0;
  private finished = false;
  private readonly tickFn: () => boolean;

  /** EMA smoothing factor. ~0.05 at 30fps gives a ~660ms time constant. */
  private readonly emaAlpha = 0.05;

  constructor(tickFn: () => boolean) {
    this.tickFn = tickFn;
  }

  /** True once the tick function has reported the end of the run. */
  get done(): boolean {
    return this.finished;
  }

  /**
   * Called once per frame. Determines how many ticks to run based on
   * elapsed time and the target rate, then executes them.
   *
   * @param deltaMs milliseconds since the last frame
   */
  advance(deltaMs: number): void {
    if (this.paused || this.finished) {
      this.stepTimeMs = 0;
      this.lastStepsThisFrame = 0;
      return;
    }

    const deltaSeconds = deltaMs / 1000;
    if (deltaSeconds <= 0) return;

    this.accumulator += this.targetStepsPerSecond * deltaSeconds;
    const stepsThisFrame = Math.floor(this.accumulator);
    this.accumulator -= stepsThisFrame;

    const t0 = performance.now();
    let executed = 0;
    while (executed < stepsThisFrame) {
      executed++;
      if (!this.tickFn()) {
        this.finished = true;
        this.accumulator = 0;
        break;
      }
    }
    this.lastStepsThisFrame = executed;

    const rawStepTimeMs = performance.now() - t0;
    this.stepTimeMs =
      this.emaAlpha * rawStepTimeMs +
      (1 - this.emaAlpha) * this.stepTimeMs;

    const instantStepsPerSecond = executed / deltaSeconds;
    this.actualStepsPerSecond =
      this.emaAlpha * instantStepsPerSecond +
      (1 - this.emaAlpha) * this.actualStepsPerSecond;
  }

  /** Clears the finished flag and any fractional step carried over. */
  reset(): void {
    this.finished = false;
    this.accumulator = 0;
    this.lastStepsThisFrame = 0;
  }
}
