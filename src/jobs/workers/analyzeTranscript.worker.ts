/**
 * Analyze Transcript Worker (BullMQ)
 * Scores one transcript per job with the configured lexicon. Listens only
 * to the queue of that lexicon version.
 */

import "dotenv/config";
import { Worker, type Job } from "bullmq";
import { ANALYSIS_CONCURRENCY } from "../../config/env.js";
import { initializeApp } from "../../config/init.js";
import { analysisQueueName, type AnalyzeTranscriptJobData } from "../../config/queueNames.js";
import { redis } from "../../config/redis.js";
import { supabaseBrainStore } from "../../repositories/signatureRepository.js";
import { supabaseTranscriptSource } from "../../repositories/transcriptRepository.js";
import { analyzeTranscript, type AnalysisOutcome } from "../../services/business/analysisService.js";
import { getGenericErrorMessage } from "../../utils/errorMessages.js";
import { NotFoundError } from "../../utils/errors.js";
import { assertJobLexicon } from "./lexiconGuard.js";

const config = await initializeApp();
const queueName = analysisQueueName(config.lexicon.version);
const deps = {
  store: supabaseBrainStore,
  transcripts: supabaseTranscriptSource,
  config,
};

async function handleJob(job: Job<AnalyzeTranscriptJobData>): Promise<AnalysisOutcome> {
  const { transcriptId, lexiconVersion } = job.data;
  console.log("[worker:analysis] processing", { jobId: job.id, transcriptId, lexiconVersion });

  assertJobLexicon(job.data, config.lexicon.version);

  try {
    const outcome = await analyzeTranscript(deps, transcriptId);
    await job.updateProgress({ progress: 100, status: outcome.status });
    return outcome;
  } catch (error) {
    console.error("[worker:analysis] ✗ failed", job.id, getGenericErrorMessage(error));
    if (error instanceof NotFoundError) {
      // Retrying will not make the transcript appear
      await job.discard();
    }
    throw error;
  }
}

const worker = new Worker<AnalyzeTranscriptJobData, AnalysisOutcome>(queueName, handleJob, {
  connection: redis,
  concurrency: ANALYSIS_CONCURRENCY,
  lockDuration: 120000,
});

console.log("[worker] Starting worker for queue:", queueName);
console.log("[worker] Redis connection:", redis.options.host, redis.options.port);
console.log("[worker] Concurrency:", ANALYSIS_CONCURRENCY);
console.log("[worker] Lexicon:", config.lexicon.version);
console.log("[worker] Waiting for jobs...");

worker.on("completed", (job) => {
  console.log("[worker] ✓ completed", job.id);
});

worker.on("failed", (job, err) => {
  console.error("[worker] ✗ failed", job?.id, err.message);
});

worker.on("error", (err) => {
  console.error("[worker] Worker error:", err);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[worker] ${signal} received, closing worker...`);
  await worker.close();
  await redis.quit();
  process.exit(0);
}

process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((error: unknown) => {
    console.error("[worker] Shutdown failed:", error);
    process.exit(1);
  });
});
process.on("SIGINT", () => {
  shutdown("SIGINT").catch((error: unknown) => {
    console.error("[worker] Shutdown failed:", error);
    process.exit(1);
  });
});
