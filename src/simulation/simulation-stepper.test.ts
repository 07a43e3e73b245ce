import { SimulationStepper } from "./simulation-stepper";

describe("SimulationStepper", () => {
  // Minimal mock: counts ticks and ends the run after `limit` of them
  let tickCount: number;
  let limit: number;
  const tickFn = () => {
    tickCount++;
    return tickCount < limit;
  };

  beforeEach(() => {
    tickCount = 0;
    limit = Infinity;
  });

  it("runs the correct number of ticks for a given delta and target rate", () => {
    const stepper = new SimulationStepper(tickFn);
    stepper.targetStepsPerSecond = 30;

    // One 33.4ms frame at 30 ticks/s
    stepper.advance(33.4);
    expect(tickCount).toBe(1);
  });

  it("defaults to 30 ticks per second", () => {
    const stepper = new SimulationStepper(tickFn);
    stepper.advance(1000);
    expect(tickCount).toBe(30);
  });

  it("accumulates fractional ticks across frames", () => {
    const stepper = new SimulationStepper(tickFn);
    stepper.targetStepsPerSecond = 15; // half a tick per 33.4ms frame

    stepper.advance(33.4);
    expect(tickCount).toBe(0);

    stepper.advance(33.4);
    expect(tickCount).toBe(1);
  });

  it("runs zero ticks when paused", () => {
    const stepper = new SimulationStepper(tickFn);
    stepper.paused = true;

    stepper.advance(100);
    expect(tickCount).toBe(0);
    expect(stepper.lastStepsThisFrame).toBe(0);
  });

  it("stops mid-frame when the tick function reports the end of the run", () => {
    limit = 4;
    const stepper = new SimulationStepper(tickFn);
    stepper.targetStepsPerSecond = 60;

    stepper.advance(100); // 6 ticks due, the 4th ends the run
    expect(tickCount).toBe(4);
    expect(stepper.lastStepsThisFrame).toBe(4);
    expect(stepper.done).toBe(true);

    stepper.advance(100);
    expect(tickCount).toBe(4);
    expect(stepper.lastStepsThisFrame).toBe(0);
  });

  it("resumes after reset", () => {
    limit = 1;
    const stepper = new SimulationStepper(tickFn);
    stepper.advance(1000);
    expect(stepper.done).toBe(true);

    stepper.reset();
    expect(stepper.done).toBe(false);
    stepper.advance(100); // 3 ticks at 30/s, each one still past the limit
    expect(tickCount).toBe(2);
    expect(stepper.done).toBe(true);
  });

  it("tracks tick timing in milliseconds", () => {
    const stepper = new SimulationStepper(tickFn);
    stepper.advance(33.4);
    expect(stepper.stepTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("computes actual ticks per second using EMA", () => {
    const stepper = new SimulationStepper(tickFn);
    stepper.targetStepsPerSecond = 60;

    for (let i = 0; i < 120; i++) {
      stepper.advance(16.67);
    }
    expect(stepper.actualStepsPerSecond).toBeGreaterThan(50);
    expect(stepper.actualStepsPerSecond).toBeLessThan(70);
  });
});
