/**
 * Job Registry
 * Central place to start all cron jobs
 */

import type { ExtractionConfig } from "../config";
import { startExtractVotingMatrixJob } from "./extract-voting-matrix.job";

/**
 * Starts all registered cron jobs
 * Called from the cron entry point (src/cron.ts)
 */
export const startAllJobs = (config: ExtractionConfig) => {
  console.log("[Cron] Initializing all cron jobs...");

  // Voting matrix extraction (daily by default)
  startExtractVotingMatrixJob(config);

  console.log("[Cron] All cron jobs initialized");
};
