/**
 * Lexicon Guard
 * Refuses jobs queued for a lexicon other than the one the worker runs.
 */

import { UnrecoverableError } from "bullmq";
import type { AnalyzeTranscriptJobData } from "../../config/queueNames.js";
import { compareLexiconVersions } from "../../services/business/brain/lexicon.js";

/**
 * Throws UnrecoverableError so BullMQ fails the job without retrying instead
 * of completing it unscored. Jobs only land here when they were added to
 * the wrong version's queue.
 */
export function assertJobLexicon(data: AnalyzeTranscriptJobData, workerVersion: string): void {
  if (compareLexiconVersions(data.lexiconVersion, workerVersion) !== 0) {
    throw new UnrecoverableError(
      `Job for transcript ${data.transcriptId} targets lexicon ${data.lexiconVersion}, worker runs ${workerVersion}`
    );
  }
}
