/**
 * Cron Service Entry Point
 * Runs only the cron jobs without starting the API server
 */

import dotenv from "dotenv";
import { loadExtractionConfig } from "./config";
import { abortActiveExtraction, waitForActiveExtraction } from "./services/extraction-status";
import { startAllJobs } from "./jobs";

dotenv.config();

console.log("Starting voting matrix cron service...");

const config = loadExtractionConfig();
startAllJobs(config);

console.log("✅ Voting matrix cron service is running");

// Stop an active run at its next page boundary so the checkpoint is current
const shutdown = (signal: NodeJS.Signals) => {
  console.log(`${signal} received, shutting down gracefully...`);
  abortActiveExtraction();
  waitForActiveExtraction().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    }
  );
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
