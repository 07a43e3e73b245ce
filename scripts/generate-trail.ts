/* eslint-disable no-console */
/**
 * Generates a trail without the browser UI and writes its coordinate file.
 *
 * Usage: npx tsx scripts/generate-trail.ts --size 64 --tortuosity 0.2 --sparsity 0.1
 *
 * Runs the walk until the agent is trapped or --length steps have been taken,
 * then writes one "(col, row)" line per marked cell to <out-dir>/<name>.txt.
 */

import { createSession, parseCliArgs, runToCompletion, writeTrailFile, USAGE, CliOptions } from "./trail-cli";

function readOptions(): CliOptions | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(USAGE);
    return null;
  }
}

async function main() {
  const options = readOptions();
  if (!options) {
    process.exitCode = 1;
    return;
  }

  const session = createSession(options.seed);
  const result = session.start(options.input);
  if (!result.ok) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const { config, maxSteps } = result.settings;
  console.error(`Generating ${config.size}x${config.size} trail ` +
    `(tortuosity ${config.turnProbability}, sparsity ${config.forgetProbability}, ` +
    `length ${maxSteps === 0 ? "unbounded" : maxSteps})...`);

  const steps = runToCompletion(session);
  const status = session.status();
  console.error(`Stopped after ${steps} steps (${status.trapped ? "trapped" : "length reached"}), ` +
    `${status.visitedCount} marked cells`);

  const exported = session.exportTrail();
  if (!exported) return;

  try {
    const filePath = await writeTrailFile(options.outDir, exported);
    console.error(`Trail saved successfully to ${filePath}`);
  } catch (err) {
    console.error(`Error saving file: ${err instanceof Error ? err.message : err}`);
    process.exitCode = 1;
  }
}

main().catch(err => { console.error(err); process.exit(1); });
/* eslint-enable no-console */
