import { parseArgs } from "node:util";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { TrailSession } from "../src/simulation/trail-session";
import { TrailEngine } from "../src/simulation/trail-engine";
import type { TrailSettingsInput } from "../src/simulation/trail-config";
import type { TrailExport } from "../src/utils/trail-export";

export interface CliOptions {
  input: TrailSettingsInput;
  seed?: string;
  outDir: string;
}

export const USAGE = `Usage: npm run generate -- --size <n> --tortuosity <0-1> --sparsity <0-1>
    [--name <trail name>] [--length <max steps, 0 = until trapped>] [--seed <seed>] [--out-dir <dir>]`;

/** Parses command-line flags into raw form values. Numbers are checked later by the session. */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      "name": { type: "string", default: "" },
      "size": { type: "string", default: "" },
      "tortuosity": { type: "string", default: "" },
      "sparsity": { type: "string", default: "" },
      "length": { type: "string", default: "0" },
      "seed": { type: "string" },
      "out-dir": { type: "string", default: "." },
    },
    strict: true,
  });

  return {
    input: {
      name: values.name ?? "",
      size: values.size ?? "",
      tortuosity: values.tortuosity ?? "",
      sparsity: values.sparsity ?? "",
      length: values.length ?? "0",
    },
    seed: values.seed,
    outDir: values["out-dir"] ?? ".",
  };
}

export function createSession(seed?: string): TrailSession {
  return new TrailSession(config => new TrailEngine(config, { seed }));
}

/** Ticks the session until the run ends; returns the number of steps taken. */
export function runToCompletion(session: TrailSession): number {
  while (session.tick()) {
    // keep stepping
  }
  return session.stepCount;
}

/** Writes the export into `outDir`, creating it if needed. Returns the file path. */
export async function writeTrailFile(outDir: string, exported: TrailExport): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const filePath = path.join(outDir, exported.fileName);
  await writeFile(filePath, exported.contents, "utf8");
  return filePath;
}
