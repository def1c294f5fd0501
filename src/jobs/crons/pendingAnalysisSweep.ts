/**
 * Pending Analysis Sweep
 * Scheduled task that enqueues transcripts with no signature, or one scored
 * under another lexicon version.
 */

import cron, { type ScheduledTask } from "node-cron";
import type { TranscriptSource } from "../../repositories/brainStore.js";
import type { AnalyzeTranscriptJobData } from "../../config/queueNames.js";
import type { EnqueueResult } from "../../services/external/queue/enqueueAnalysis.js";

export interface PendingSweepDeps {
  transcripts: TranscriptSource;
  lexiconVersion: string;
  enqueue: (data: AnalyzeTranscriptJobData) => Promise<EnqueueResult>;
  batchSize?: number;
}

export interface SweepSummary {
  found: number;
  enqueued: number;
}

export async function runPendingAnalysisSweep(deps: PendingSweepDeps): Promise<SweepSummary> {
  const ids = await deps.transcripts.listPendingTranscriptIds(deps.lexiconVersion, deps.batchSize ?? 200);

  let enqueued = 0;
  for (const transcriptId of ids) {
    const result = await deps.enqueue({ transcriptId, lexiconVersion: deps.lexiconVersion });
    if (result.enqueued) enqueued++;
  }

  return { found: ids.length, enqueued };
}

/**
 * Starts the sweep on the given cron schedule.
 */
export function startPendingAnalysisSweep(deps: PendingSweepDeps, schedule: string): ScheduledTask {
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for pending sweep: ${schedule}`);
  }

  const task = cron.schedule(schedule, async () => {
    console.log("[Pending Sweep] Starting...");
    try {
      const summary = await runPendingAnalysisSweep(deps);
      console.log(`[Pending Sweep] ✓ ${summary.enqueued}/${summary.found} transcripts enqueued`);
    } catch (error) {
      console.error("[Pending Sweep] ✗ Failed:", error);
    }
  });

  console.log(`[Pending Sweep] Scheduled (${schedule})`);
  return task;
}
