/**
 * Queue names and job payloads
 * Kept apart from queues.ts so naming needs no Redis connection.
 */

export const ANALYZE_QUEUE = "analyzeTranscript";

export interface AnalyzeTranscriptJobData {
  transcriptId: string;
  lexiconVersion: string;
}

/**
 * One analysis queue per lexicon version, so a worker only ever takes jobs
 * for the lexicon it runs. BullMQ rejects ':' in queue names.
 */
export function analysisQueueName(lexiconVersion: string): string {
  return `${ANALYZE_QUEUE}-v${lexiconVersion}`.replace(/:/g, "_");
}
