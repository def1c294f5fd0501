/**
 * Analysis Controller
 * Thin controller for signature lookups and re-analysis requests
 */

import { Request, Response, NextFunction } from "express";
import type { AppContext } from "../app.js";
import { parseRequest } from "../middlewares/validation.js";
import { transcriptParamsSchema } from "../middlewares/schemas/brainSchemas.js";
import { describeAnalysis } from "../services/business/analysisService.js";
import { NotFoundError } from "../utils/errors.js";

export function createAnalysisController(context: AppContext) {
  return {
    /**
     * GET /signatures/:transcriptId
     */
    async getSignature(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { transcriptId } = parseRequest(transcriptParamsSchema, req.params);
        const view = await describeAnalysis(context, transcriptId);
        res.json(view);
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /signatures/:transcriptId/analyze
     * Queues a (re-)analysis with the running lexicon version.
     */
    async requestAnalysis(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { transcriptId } = parseRequest(transcriptParamsSchema, req.params);

        const transcript = await context.transcripts.findTranscript(transcriptId);
        if (!transcript) {
          throw new NotFoundError("Transcript", transcriptId);
        }

        const result = await context.enqueue({
          transcriptId,
          lexiconVersion: context.config.lexicon.version,
        });

        res.status(result.enqueued ? 202 : 200).json({
          transcriptId,
          lexiconVersion: context.config.lexicon.version,
          ...result,
        });
      } catch (error) {
        next(error);
      }
    },
  };
}
