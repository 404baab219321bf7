/**
 * In-process extraction run state
 *
 * At most one extraction runs per process. The HTTP trigger and the cron job
 * both start runs through here, so they share the same overlap guard.
 */

import type { ExportedFiles } from "./export/matrix-exporter";
import type { ExtractionResult } from "./ingestion/voting-matrix.service";
import { errorMessage } from "./ingestion/utils";
import type { ClientStats } from "./tally-graphql";
import type { MatrixStatistics } from "../types/governance.types";

export type ExtractionTrigger = "http" | "cron" | "script";

export type ExtractionRunState =
  | "running"
  | "completed"
  | "partial"
  | "interrupted"
  | "failed";

export interface ExtractionRunStatus {
  runId: string;
  slug: string;
  trigger: ExtractionTrigger;
  state: ExtractionRunState;
  startedAt: string;
  finishedAt: string | null;
  error: string | null;
  files: ExportedFiles | null;
  statistics: MatrixStatistics | null;
  client: ClientStats | null;
}

export interface StartExtractionRequest {
  slug: string;
  trigger: ExtractionTrigger;
  execute: (signal: AbortSignal) => Promise<ExtractionResult>;
  stats?: () => ClientStats;
}

interface ActiveRun {
  status: ExtractionRunStatus;
  controller: AbortController;
  done: Promise<void>;
  stats?: () => ClientStats;
}

let runCounter = 0;
let active: ActiveRun | null = null;
let lastRun: ExtractionRunStatus | null = null;

export const isExtractionRunning = (): boolean => active !== null;

/**
 * The active run with live client stats, else the last finished run.
 */
export function getExtractionStatus(): ExtractionRunStatus | null {
  if (active) {
    return { ...active.status, client: active.stats ? active.stats() : active.status.client };
  }
  return lastRun ? { ...lastRun } : null;
}

/**
 * Starts a run in the background. Returns null when one is already active.
 */
export function startExtraction(request: StartExtractionRequest): ExtractionRunStatus | null {
  if (active) return null;

  runCounter++;
  const status: ExtractionRunStatus = {
    runId: `run-${Date.now()}-${runCounter}`,
    slug: request.slug,
    trigger: request.trigger,
    state: "running",
    startedAt: new Date().toISOString(),
    finishedAt: null,
    error: null,
    files: null,
    statistics: null,
    client: null,
  };
  const controller = new AbortController();

  const done = Promise.resolve()
    .then(() => request.execute(controller.signal))
    .then((result) => {
      status.state = result.status;
      status.files = result.files;
      status.statistics = result.matrix?.statistics ?? null;
      status.client = result.report.client;
    })
    .catch((error: unknown) => {
      status.state = "failed";
      status.error = errorMessage(error);
      console.error(`[Extraction] Run ${status.runId} failed: ${status.error}`);
    })
    .finally(() => {
      status.finishedAt = new Date().toISOString();
      if (request.stats && !status.client) status.client = request.stats();
      lastRun = status;
      active = null;
      console.log(`[Extraction] Run ${status.runId} finished: ${status.state}`);
    });

  active = { status, controller, done, stats: request.stats };
  console.log(`[Extraction] Run ${status.runId} started for '${request.slug}' via ${request.trigger}`);
  return { ...status };
}

/**
 * Asks the active run to stop at the next page boundary.
 */
export function abortActiveExtraction(): boolean {
  if (!active) return false;
  active.controller.abort();
  return true;
}

export async function waitForActiveExtraction(): Promise<void> {
  if (active) await active.done;
}

export function resetExtractionStatus(): void {
  active?.controller.abort();
  active = null;
  lastRun = null;
}
