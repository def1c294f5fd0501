import { describe, expect, it, vi } from "vitest";
import {
  runPendingAnalysisSweep,
  startPendingAnalysisSweep,
} from "../../src/jobs/crons/pendingAnalysisSweep.js";
import type { AnalyzeTranscriptJobData } from "../../src/config/queueNames.js";
import { analysisJobId, type EnqueueResult } from "../../src/services/external/queue/enqueueAnalysis.js";
import { sunday } from "../helpers/fixtures.js";
import { MemoryTranscriptSource } from "../helpers/memoryBrainStore.js";

function source(...ids: string[]): MemoryTranscriptSource {
  const transcripts = new MemoryTranscriptSource();
  for (const id of ids) {
    transcripts.add({ id, channelId: "channel-a", title: null, publishedAt: sunday(0), text: "grace" });
  }
  return transcripts;
}

describe("runPendingAnalysisSweep", () => {
  it("enqueues every pending transcript for the running lexicon version", async () => {
    const enqueue = vi.fn(
      async (data: AnalyzeTranscriptJobData): Promise<EnqueueResult> => ({
        jobId: analysisJobId(data.transcriptId, data.lexiconVersion),
        enqueued: data.transcriptId !== "t-2",
      })
    );

    const summary = await runPendingAnalysisSweep({
      transcripts: source("t-1", "t-2", "t-3"),
      lexiconVersion: "1.0.0",
      enqueue,
    });

    expect(summary).toEqual({ found: 3, enqueued: 2 });
    expect(enqueue.mock.calls.map(([data]) => data)).toEqual([
      { transcriptId: "t-1", lexiconVersion: "1.0.0" },
      { transcriptId: "t-2", lexiconVersion: "1.0.0" },
      { transcriptId: "t-3", lexiconVersion: "1.0.0" },
    ]);
  });

  it("passes the batch size to the transcript source", async () => {
    const transcripts = source();
    const listPending = vi.spyOn(transcripts, "listPendingTranscriptIds");

    await runPendingAnalysisSweep({
      transcripts,
      lexiconVersion: "2.1.0",
      enqueue: vi.fn(),
      batchSize: 25,
    });

    expect(listPending).toHaveBeenCalledWith("2.1.0", 25);
  });
});

describe("analysisJobId", () => {
  it("keeps the id free of ':'", () => {
    expect(analysisJobId("yt:abc", "1.0.0")).toBe("yt_abc_v1.0.0");
  });
});

describe("startPendingAnalysisSweep", () => {
  it("rejects an invalid cron expression", () => {
    expect(() =>
      startPendingAnalysisSweep({ transcripts: source(), lexiconVersion: "1.0.0", enqueue: vi.fn() }, "every hour")
    ).toThrow("Invalid cron expression for pending sweep: every hour");
  });
});
