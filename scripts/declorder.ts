#!/usr/bin/env node
/**
 * declorder CLI: order declaration units by dependency and optionally emit
 * no-op implementations for their interfaces.
 *
 * Usage: npx tsx scripts/declorder.ts [--units a,b] [--interfaces ...] [--noop]
 */

import { parseArgs, USAGE } from "../src/cli/args.js";
import { loadDeclorderConfig } from "../src/config/declorderYaml.js";
import { buildRunConfig, type RunConfig } from "../src/config/runConfig.js";
import { ConfigError } from "../src/errors.js";
import { FileContentWriter } from "../src/pipeline/fileWriter.js";
import { runAnalysis } from "../src/run/analyzeUnits.js";

function main(): number {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  let config: RunConfig;
  try {
    config = buildRunConfig(loadDeclorderConfig(process.cwd(), parsed.configPath), parsed.overrides);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`declorder: ${err.message}`);
      return 2;
    }
    throw err;
  }

  return runAnalysis(parsed.units, config, new FileContentWriter());
}

process.exitCode = main();
