/**
 * HTTP Server Entry Point
 * Loads the theology configuration, wires the store and queue, then starts
 * the Express application and the pending-analysis sweep.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import { NODE_ENV, PENDING_SWEEP_CRON, PORT } from "./config/env.js";
import type { AnalyzeTranscriptJobData } from "./config/queueNames.js";
import { getAnalysisQueue } from "./config/queues.js";
import { supabase } from "./config/supabase.js";
import { startPendingAnalysisSweep } from "./jobs/crons/pendingAnalysisSweep.js";
import { supabaseTokenVerifier } from "./middlewares/auth.middleware.js";
import { supabaseBrainStore } from "./repositories/signatureRepository.js";
import { supabaseTranscriptSource } from "./repositories/transcriptRepository.js";
import { enqueueAnalysis } from "./services/external/queue/enqueueAnalysis.js";

// Invalid configuration is fatal before anything is served.
const config = await initializeApp().catch((error: unknown) => {
  console.error("✗ Initialization failed:", error);
  process.exit(1);
});

const transcripts = supabaseTranscriptSource;
const analysisQueue = getAnalysisQueue(config.lexicon.version);
const enqueue = (data: AnalyzeTranscriptJobData) => enqueueAnalysis(analysisQueue, data);

const app = createApp({
  store: supabaseBrainStore,
  transcripts,
  config,
  enqueue,
  verifyToken: supabaseTokenVerifier(supabase),
  nodeEnv: NODE_ENV,
});

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

server.listen(PORT, "0.0.0.0", () => {
  console.log(`Server running on 0.0.0.0:${PORT}`);

  startPendingAnalysisSweep(
    { transcripts, lexiconVersion: config.lexicon.version, enqueue },
    PENDING_SWEEP_CRON
  );

  console.log("✓ Server ready to accept requests\n");
});

/**
 * Handles graceful shutdown on SIGTERM signal.
 * Closes the server and exits the process cleanly.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
