/**
 * Extraction API Response Types
 */

import type { ExtractionRunStatus } from "../services/extraction-status";

/**
 * Accepted trigger (HTTP 202)
 */
export interface TriggerExtractionResponse {
  success: true;
  message: string;
  run: ExtractionRunStatus;
}

/**
 * Current run, or the last finished one
 */
export interface GetExtractionStatusResponse {
  success: true;
  running: boolean;
  run: ExtractionRunStatus | null;
}

export interface ExtractionErrorResponse {
  success: false;
  error: string;
  message?: string;
  /** Validation problems, one per offending field */
  issues?: string[];
}
