/**
 * Voting Matrix Extraction Cron Job
 *
 * Runs the configured organization's extraction on a schedule. Overlapping
 * triggers are skipped while a run (cron or HTTP) is still active.
 */

import cron from "node-cron";
import type { ExtractionConfig } from "../config";
import { createExtractionRun } from "../services/extraction";
import {
  getExtractionStatus,
  startExtraction,
  waitForActiveExtraction,
  type ExtractionRunStatus,
} from "../services/extraction-status";
import { errorMessage } from "../services/ingestion/utils";

/**
 * Starts the extraction job.
 * Schedule comes from EXTRACTION_SCHEDULE, defaulting to daily at 03:00
 */
export const startExtractVotingMatrixJob = (config: ExtractionConfig) => {
  if (!config.enableCronJobs) {
    console.log("[Cron] Voting matrix extraction job disabled via ENABLE_CRON_JOBS env variable");
    return null;
  }

  if (!config.organization.slug) {
    console.warn("[Cron] Voting matrix extraction job not scheduled: DAO_SLUG is not set");
    return null;
  }

  const task = cron.schedule(config.extractionSchedule, () => runScheduledExtraction(config));

  console.log(`[Cron] Voting matrix extraction job scheduled with cron: ${config.extractionSchedule}`);
  return task;
};

export async function runScheduledExtraction(config: ExtractionConfig): Promise<void> {
  const timestamp = new Date().toISOString();

  let started: ExtractionRunStatus | null;
  try {
    const run = createExtractionRun(config);
    started = startExtraction({
      slug: run.slug,
      trigger: "cron",
      execute: run.execute,
      stats: () => run.client.stats(),
    });
  } catch (error) {
    console.error(`[${timestamp}] Voting matrix extraction could not start: ${errorMessage(error)}`);
    return;
  }

  if (!started) {
    console.log(
      `[${timestamp}] Voting matrix extraction is still running from a previous trigger. Skipping this run.`
    );
    return;
  }

  console.log(`\n[${timestamp}] Starting voting matrix extraction job (${started.runId})...`);
  await waitForActiveExtraction();

  const finished = getExtractionStatus();
  console.log(
    `[${new Date().toISOString()}] Voting matrix extraction job finished: ${finished?.state ?? "unknown"}`
  );
}
