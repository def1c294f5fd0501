/**
 * Report Controller
 * Thin controller for convergence and climate reports
 */

import { Request, Response, NextFunction } from "express";
import type { AppContext } from "../app.js";
import { parseRequest } from "../middlewares/validation.js";
import { climateQuerySchema, convergenceQuerySchema } from "../middlewares/schemas/brainSchemas.js";
import type { AggregateOptions } from "../services/business/brain/aggregator.js";
import { buildClimateSnapshot, buildConvergenceReport } from "../services/business/reportService.js";

export function createReportController(context: AppContext) {
  return {
    /**
     * GET /reports/convergence?from&to&channelId
     */
    async getConvergence(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const query = parseRequest(convergenceQuerySchema, req.query);
        const options: Partial<AggregateOptions> = {};
        if (query.outliers !== undefined) options.outlierLimit = query.outliers;
        if (query.resonant !== undefined) options.resonantLimit = query.resonant;

        const report = await buildConvergenceReport(
          context,
          { from: query.from, to: query.to, channelId: query.channelId },
          options
        );
        res.json(report);
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /reports/climate?days
     */
    async getClimate(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { days } = parseRequest(climateQuerySchema, req.query);
        res.json(await buildClimateSnapshot(context, days));
      } catch (error) {
        next(error);
      }
    },
  };
}
