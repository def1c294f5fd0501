/**
 * Analyze Batch Orchestrator
 * Runs the analysis service over a list of transcripts in process. One
 * failed transcript never stops the batch; an invalid configuration does.
 */

import {
  analyzeTranscript,
  type AnalysisDeps,
  type SkipReason,
} from "../../services/business/analysisService.js";
import { ConfigError } from "../../utils/errors.js";
import { getGenericErrorMessage } from "../../utils/errorMessages.js";

export interface BatchFailure {
  transcriptId: string;
  reason: string;
  error: string;
}

export interface BatchResult {
  scored: string[];
  skipped: { transcriptId: string; reason: SkipReason; detail: string }[];
  failed: BatchFailure[];
  /** Not attempted because the batch was aborted */
  cancelled: string[];
}

export interface BatchOptions {
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, transcriptId: string) => void | Promise<void>;
}

export async function analyzeBatchOrchestrator(
  deps: AnalysisDeps,
  transcriptIds: readonly string[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const result: BatchResult = { scored: [], skipped: [], failed: [], cancelled: [] };
  const total = transcriptIds.length;

  console.log(`[batch] analyzing ${total} transcripts with lexicon ${deps.config.lexicon.version}`);

  for (const [index, transcriptId] of transcriptIds.entries()) {
    // Cancellation is checked between items only
    if (options.signal?.aborted) {
      result.cancelled = transcriptIds.slice(index);
      console.log(`[batch] cancelled, ${result.cancelled.length} transcripts not attempted`);
      break;
    }

    try {
      const outcome = await analyzeTranscript(deps, transcriptId);
      if (outcome.status === "scored") {
        result.scored.push(transcriptId);
      } else {
        result.skipped.push({ transcriptId, reason: outcome.reason, detail: outcome.detail });
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[batch] ✗ ${transcriptId}: ${message}`);
      result.failed.push({ transcriptId, reason: getGenericErrorMessage(error), error: message });
    }

    await options.onProgress?.(index + 1, total, transcriptId);
  }

  console.log(
    `[batch] ✓ done: ${result.scored.length} scored, ${result.skipped.length} skipped, ` +
      `${result.failed.length} failed, ${result.cancelled.length} cancelled`
  );
  return result;
}
