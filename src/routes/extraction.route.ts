import express from "express";
import { extractionController } from "../controllers";

const router = express.Router();

/**
 * @openapi
 * /extraction/trigger:
 *   post:
 *     summary: Start a voting matrix extraction
 *     description: Runs organization, delegate, proposal and vote extraction in the background and exports the voting matrix. Resumes from checkpoints when a previous run stopped early. Only one extraction runs at a time.
 *     tags:
 *       - Extraction
 *     requestBody:
 *       required: false
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               slug:
 *                 type: string
 *                 description: Organization slug (defaults to DAO_SLUG)
 *               organizationName:
 *                 type: string
 *               alternativeSlugs:
 *                 type: array
 *                 items:
 *                   type: string
 *               forceRefreshVotes:
 *                 type: boolean
 *               allowPartialResults:
 *                 type: boolean
 *     responses:
 *       202:
 *         description: Extraction started
 *       400:
 *         description: Invalid body or no organization slug
 *       409:
 *         description: An extraction is already running
 *       500:
 *         description: Server error
 */
router.post("/trigger", extractionController.postTriggerExtraction);

/**
 * @openapi
 * /extraction/status:
 *   get:
 *     summary: Get extraction status
 *     description: Returns the active run with live client statistics, or the last finished run.
 *     tags:
 *       - Extraction
 *     responses:
 *       200:
 *         description: Extraction status
 */
router.get("/status", extractionController.getExtractionStatus);

export default router;
