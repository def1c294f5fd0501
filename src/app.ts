import express from "express";
import helmet from "helmet";
import cors from "cors";
import { createRouter } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { createErrorHandler } from "./middlewares/errorHandler.js";
import type { TokenVerifier } from "./middlewares/auth.middleware.js";
import type { BrainStore, TranscriptSource } from "./repositories/brainStore.js";
import type { TheologyConfig } from "./services/business/brain/types.js";
import type { AnalyzeTranscriptJobData } from "./config/queueNames.js";
import type { EnqueueResult } from "./services/external/queue/enqueueAnalysis.js";

/** Everything the HTTP layer needs, injected at startup. */
export interface AppContext {
  store: BrainStore;
  transcripts: TranscriptSource;
  config: TheologyConfig;
  enqueue: (data: AnalyzeTranscriptJobData) => Promise<EnqueueResult>;
  verifyToken: TokenVerifier;
  nodeEnv: string;
}

/**
 * Builds the Express application.
 * Configures global middleware and routes.
 */
export function createApp(context: AppContext): express.Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  /** Rate limiting for all routes. */
  app.use(apiLimiter);

  /** Application routes. */
  app.use(createRouter(context));

  /** Global error handler - MUST be last. */
  app.use(createErrorHandler(context.nodeEnv));

  return app;
}
