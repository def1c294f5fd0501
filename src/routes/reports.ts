/**
 * Report Routes
 */

import { Router } from "express";
import type { AppContext } from "../app.js";
import { createReportController } from "../controllers/reportController.js";

export function createReportsRouter(context: AppContext): Router {
  const reportsRouter = Router();
  const controller = createReportController(context);

  reportsRouter.get("/convergence", controller.getConvergence);
  reportsRouter.get("/climate", controller.getClimate);

  return reportsRouter;
}
