/**
 * Signature Routes
 * Stored signatures with evidence and drift, plus re-analysis requests
 */

import { Router } from "express";
import type { AppContext } from "../app.js";
import { createAnalysisController } from "../controllers/analysisController.js";
import { requireAuth } from "../middlewares/auth.middleware.js";
import { strictLimiter } from "../middlewares/rateLimiting.js";

export function createSignaturesRouter(context: AppContext): Router {
  const signaturesRouter = Router();
  const controller = createAnalysisController(context);

  /**
   * GET /signatures/:transcriptId
   */
  signaturesRouter.get("/:transcriptId", controller.getSignature);

  /**
   * POST /signatures/:transcriptId/analyze
   * Requires auth; queues a re-analysis
   */
  signaturesRouter.post(
    "/:transcriptId/analyze",
    strictLimiter,
    requireAuth(context.verifyToken),
    controller.requestAnalysis
  );

  return signaturesRouter;
}
