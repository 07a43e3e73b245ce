import { DEFAULT_TRAIL_NAME } from "../constants";
import type { TrailConfig } from "../types/trail-types";

/** Thrown when an engine is built from (or reset to) values outside their ranges. */
export class InvalidTrailConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "InvalidTrailConfigError";
    this.issues = issues;
  }
}

function isProbability(p: number): boolean {
  return Number.isFinite(p) && p >= 0 && p <= 1;
}

/** Lists every range violation in `config`; empty when the config is usable. */
export function trailConfigIssues(config: TrailConfig): string[] {
  const issues: string[] = [];
  if (!Number.isInteger(config.size) || config.size <= 0) {
    issues.push(`size must be a positive integer (got ${config.size})`);
  }
  if (!isProbability(config.turnProbability)) {
    issues.push(`turnProbability must be in [0, 1] (got ${config.turnProbability})`);
  }
  if (!isProbability(config.forgetProbability)) {
    issues.push(`forgetProbability must be in [0, 1] (got ${config.forgetProbability})`);
  }
  return issues;
}

export function validateTrailConfig(config: TrailConfig): TrailConfig {
  const issues = trailConfigIssues(config);
  if (issues.length > 0) throw new InvalidTrailConfigError(issues);
  return { ...config };
}

// ── Settings form ──

/** Raw text of the settings form. */
export interface TrailSettingsInput {
  name: string;
  size: string;
  /** Turn probability. */
  tortuosity: string;
  /** Forget probability. */
  sparsity: string;
  /** Maximum number of steps, 0 for no limit. */
  length: string;
}

export const DEFAULT_SETTINGS_INPUT: Readonly<TrailSettingsInput> = {
  name: "",
  size: "",
  tortuosity: "",
  sparsity: "",
  length: "0",
};

export interface TrailSettings {
  name: string;
  config: TrailConfig;
  maxSteps: number;
}

export type TrailSettingsResult =
  | { ok: true; settings: TrailSettings }
  | { ok: false; error: string };

export const RANGE_ERROR_MESSAGE =
  "Invalid input values. Please check ranges (0-1), size (>0), and length (>=0).";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parseInteger(field: string, text: string): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new Error(`${field} "${text}" is not a whole number`);
  }
  return Number.parseInt(trimmed, 10);
}

function parseDecimal(field: string, text: string): number {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`${field} "${text}" is not a number`);
  }
  return Number(trimmed);
}

/**
 * Parses and range-checks the settings form. Never throws: malformed or
 * out-of-range input comes back as an error message for the form to show.
 */
export function parseTrailSettings(input: TrailSettingsInput): TrailSettingsResult {
  let config: TrailConfig;
  let maxSteps: number;
  try {
    config = {
      size: parseInteger("size", input.size),
      turnProbability: parseDecimal("tortuosity", input.tortuosity),
      forgetProbability: parseDecimal("sparsity", input.sparsity),
    };
    maxSteps = parseInteger("length", input.length);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Error parsing input: ${detail}. Please ensure numbers are entered correctly.` };
  }

  if (trailConfigIssues(config).length > 0 || maxSteps < 0) {
    return { ok: false, error: RANGE_ERROR_MESSAGE };
  }

  return {
    ok: true,
    settings: {
      name: input.name || DEFAULT_TRAIL_NAME,
      config,
      maxSteps,
    },
  };
}
