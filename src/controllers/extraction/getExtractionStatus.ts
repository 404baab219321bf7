import { Request, Response } from "express";
import {
  getExtractionStatus as readExtractionStatus,
  isExtractionRunning,
} from "../../services/extraction-status";
import type { GetExtractionStatusResponse } from "../../responses/extraction.response";

/**
 * GET /extraction/status
 */
export const getExtractionStatus = (_req: Request, res: Response<GetExtractionStatusResponse>) => {
  res.status(200).json({
    success: true,
    running: isExtractionRunning(),
    run: readExtractionStatus(),
  });
};
