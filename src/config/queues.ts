/**
 * BullMQ queues
 */

import { Queue } from "bullmq";
import { redis } from "./redis.js";
import { analysisQueueName, type AnalyzeTranscriptJobData } from "./queueNames.js";

const analysisQueues = new Map<string, Queue<AnalyzeTranscriptJobData>>();

/**
 * Queue for one lexicon version, created on first use.
 */
export function getAnalysisQueue(lexiconVersion: string): Queue<AnalyzeTranscriptJobData> {
  const name = analysisQueueName(lexiconVersion);
  let queue = analysisQueues.get(name);
  if (!queue) {
    queue = new Queue<AnalyzeTranscriptJobData>(name, { connection: redis });
    analysisQueues.set(name, queue);
  }
  return queue;
}
