#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { DEFAULT_CONFIG_DIR, generateUvl, type GenerateResult } from "./pipeline.js";

export const USAGE = "Usage: istar-uvl <in.xml> <out.uvl> [configDir] [--verbose]";

/**
 * Runs one conversion for the given command-line arguments and returns the
 * process exit code. Failures are reported on stderr, never thrown.
 */
export async function run(args: readonly string[]): Promise<number> {
  const verbose = args.includes("--verbose");
  const [input, output, configDir = DEFAULT_CONFIG_DIR] = args.filter((a) => a !== "--verbose");
  if (!input || !output) {
    console.error(USAGE);
    return 1;
  }

  let result: GenerateResult;
  try {
    result = generateUvl({ input, output, configDir });
  } catch (e) {
    console.error(`istar-uvl: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  if (verbose) {
    const c = result.classification;
    console.error(`Objects: ${result.objectCount}`);
    console.error(`Root feature: ${result.rootFeature}${result.rootFromGoal ? "" : " (fallback)"}`);
    console.error(
      `Features: algorithms=${c.algorithms.length} nfrs=${c.nfrs.length} backends=${c.backends.length} integrations=${c.integrations.length}`,
    );
  }
  for (const m of result.missingCategories) {
    console.error(`warning: no mapping source for '${m}' in ${configDir}, category left empty`);
  }
  console.log(`UVL written to ${result.output}`);
  return 0;
}

// argv[1] is the bin symlink when installed, so compare real paths.
const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;
if (isMain) {
  run(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
