import { Request, Response } from "express";
import { z } from "zod";
import { loadExtractionConfig } from "../../config";
import { createExtractionRun } from "../../services/extraction";
import { isExtractionRunning, startExtraction } from "../../services/extraction-status";
import { errorMessage } from "../../services/ingestion/utils";
import type {
  ExtractionErrorResponse,
  TriggerExtractionResponse,
} from "../../responses/extraction.response";

const triggerBodySchema = z
  .object({
    slug: z.string().trim().min(1).optional(),
    organizationName: z.string().trim().min(1).optional(),
    alternativeSlugs: z.array(z.string().trim().min(1)).optional(),
    forceRefreshVotes: z.boolean().optional(),
    allowPartialResults: z.boolean().optional(),
  })
  .strict();

/**
 * POST /extraction/trigger
 *
 * Starts a voting matrix extraction in the background and returns at once.
 * Only one run may be active per process.
 */
export const postTriggerExtraction = (
  req: Request,
  res: Response<TriggerExtractionResponse | ExtractionErrorResponse>
) => {
  const body = triggerBodySchema.safeParse(req.body ?? {});
  if (!body.success) {
    return res.status(400).json({
      success: false,
      error: "Invalid request body",
      issues: body.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
    });
  }

  if (isExtractionRunning()) {
    console.log("[Manual Extraction] Skipped - another extraction is already running");
    return res.status(409).json({
      success: false,
      error: "Extraction already running",
      message: "A voting matrix extraction is already running. Please try again later.",
    });
  }

  try {
    const config = loadExtractionConfig();
    if (!body.data.slug && !config.organization.slug) {
      return res.status(400).json({
        success: false,
        error: "Missing organization slug",
        message: "Pass 'slug' in the body or set DAO_SLUG.",
      });
    }

    const run = createExtractionRun(config, body.data);
    const started = startExtraction({
      slug: run.slug,
      trigger: "http",
      execute: run.execute,
      stats: () => run.client.stats(),
    });
    if (!started) {
      return res.status(409).json({
        success: false,
        error: "Extraction already running",
      });
    }

    console.log(`[Manual Extraction] Triggered via API endpoint for '${run.slug}'`);
    return res.status(202).json({
      success: true,
      message: "Voting matrix extraction started",
      run: started,
    });
  } catch (error) {
    console.error("[Manual Extraction] Error:", error);
    return res.status(500).json({
      success: false,
      error: "Failed to start extraction",
      message: errorMessage(error),
    });
  }
};
