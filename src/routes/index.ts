/**
 * Route Aggregator
 * Combines all routers into a single exported router.
 */

import { Router } from "express";
import type { AppContext } from "../app.js";
import { createHealthRouter } from "./health.js";
import { createSignaturesRouter } from "./signatures.js";
import { createReportsRouter } from "./reports.js";

export function createRouter(context: AppContext): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(context));
  router.use("/signatures", createSignaturesRouter(context));
  router.use("/reports", createReportsRouter(context));

  return router;
}
