#!/usr/bin/env node
/**
 * One-shot voting matrix extraction
 *
 * Usage:
 *   npm run extract -- <slug> [alternative-slug ...]
 *
 * The slug falls back to DAO_SLUG. Ctrl+C stops at the next page boundary;
 * rerunning resumes from the checkpoint.
 *
 * Exit codes: 0 success, 130 interrupted, 1 failure.
 */

import dotenv from "dotenv";
import { loadExtractionConfig } from "../config";
import { createExtractionRun } from "../services/extraction";
import { errorMessage } from "../services/ingestion/utils";

dotenv.config();

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

async function main(): Promise<number> {
  const [slugArg, ...aliasArgs] = process.argv.slice(2);
  const config = loadExtractionConfig();
  const run = createExtractionRun(config, {
    slug: slugArg || undefined,
    alternativeSlugs: aliasArgs.length > 0 ? aliasArgs : undefined,
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      console.log(`${signal} received again, exiting now`);
      process.exit(EXIT_INTERRUPTED);
    }
    console.log(`${signal} received, stopping after the current page...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  console.log(`Starting voting matrix extraction for '${run.slug}'`);
  console.log(`Checkpoints: ${run.store.checkpointPath}`);

  const result = await run.execute(controller.signal);

  if (result.status === "interrupted") {
    console.log("Extraction interrupted. Progress saved; rerun to resume.");
    return EXIT_INTERRUPTED;
  }

  if (result.files) {
    console.log("Files written:");
    for (const file of Object.values(result.files)) {
      console.log(`  ${file}`);
    }
  }
  if (result.status === "partial") {
    console.warn("Extraction finished with partial data. Checkpoints kept for the next run.");
  }
  return EXIT_SUCCESS;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`Extraction failed: ${errorMessage(error)}`);
    process.exit(EXIT_FAILURE);
  });
