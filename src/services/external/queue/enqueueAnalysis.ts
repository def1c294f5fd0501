/**
 * Enqueue analysis job for a transcript.
 * One job per (transcript, lexicon version); BullMQ dedupes on the job id.
 */

import type { Queue } from "bullmq";
import type { AnalyzeTranscriptJobData } from "../../../config/queueNames.js";

export interface EnqueueResult {
  jobId: string;
  enqueued: boolean;
}

/** BullMQ rejects ':' in custom ids */
export function analysisJobId(transcriptId: string, lexiconVersion: string): string {
  return `${transcriptId}_v${lexiconVersion}`.replace(/:/g, "_");
}

export async function enqueueAnalysis(
  queue: Queue<AnalyzeTranscriptJobData>,
  params: AnalyzeTranscriptJobData
): Promise<EnqueueResult> {
  const jobId = analysisJobId(params.transcriptId, params.lexiconVersion);

  const existingJob = await queue.getJob(jobId);

  if (existingJob) {
    const state = await existingJob.getState();

    // Already pending or running; don't duplicate
    if (state === "waiting" || state === "delayed" || state === "active" || state === "prioritized") {
      console.log(`[enqueue] Job ${jobId} already ${state}, skipping`);
      return { jobId, enqueued: false };
    }

    // Finished or failed jobs are removed so an explicit re-analysis can run
    console.log(`[enqueue] Job ${jobId} is ${state}, removing to allow re-run`);
    await existingJob.remove();
  }

  await queue.add("analyze_transcript", params, {
    jobId,
    attempts: 3,
    backoff: { type: "exponential", delay: 10_000 },
    removeOnComplete: { age: 86400, count: 1000 },
    removeOnFail: { age: 86400, count: 100 },
  });

  console.log(`[enqueue] Job ${jobId} enqueued for transcript ${params.transcriptId}`);
  return { jobId, enqueued: true };
}
