import { beforeEach, describe, expect, it, vi } from "vitest";
import { analyzeBatchOrchestrator } from "../../src/jobs/orchestrators/analyzeBatchOrchestrator.js";
import { ConfigError } from "../../src/utils/errors.js";
import { sunday, testConfig } from "../helpers/fixtures.js";
import { MemoryBrainStore, MemoryTranscriptSource } from "../helpers/memoryBrainStore.js";

describe("analyzeBatchOrchestrator", () => {
  let store: MemoryBrainStore;
  let transcripts: MemoryTranscriptSource;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    store = new MemoryBrainStore();
    transcripts = new MemoryTranscriptSource();
    ["t-1", "t-2", "t-3"].forEach((id, i) =>
      transcripts.add({
        id,
        channelId: "channel-a",
        title: null,
        publishedAt: sunday(i),
        text: "By grace you have been saved, and that is our hope.",
      })
    );
    transcripts.add({ id: "t-empty", channelId: "channel-a", title: null, publishedAt: sunday(4), text: "" });
  });

  it("keeps going past failed and skipped transcripts", async () => {
    store.failUpsertFor.add("t-2");

    const result = await analyzeBatchOrchestrator({ store, transcripts, config: testConfig }, [
      "t-1",
      "missing",
      "t-2",
      "t-empty",
      "t-3",
    ]);

    expect(result.scored).toEqual(["t-1", "t-3"]);
    expect(result.skipped).toEqual([
      { transcriptId: "t-empty", reason: "empty", detail: "Transcript 't-empty' has no words to score" },
    ]);
    expect(result.failed).toEqual([
      {
        transcriptId: "missing",
        reason: "Transcript not found",
        error: "Transcript with id 'missing' not found",
      },
      { transcriptId: "t-2", reason: "Storage failed", error: "Failed to store analysis: connection reset" },
    ]);
    expect(result.cancelled).toEqual([]);
    expect([...store.entries.keys()]).toEqual(["t-1", "t-3"]);
  });

  it("stops between items once aborted and reports the rest as cancelled", async () => {
    const controller = new AbortController();
    const onProgress = vi.fn((done: number) => {
      if (done === 1) controller.abort();
    });

    const result = await analyzeBatchOrchestrator(
      { store, transcripts, config: testConfig },
      ["t-1", "t-2", "t-3"],
      { signal: controller.signal, onProgress }
    );

    expect(result.scored).toEqual(["t-1"]);
    expect(result.cancelled).toEqual(["t-2", "t-3"]);
    expect(onProgress).toHaveBeenCalledTimes(1);
    expect(onProgress).toHaveBeenCalledWith(1, 3, "t-1");
  });

  it("aborts the whole batch on a configuration error", async () => {
    vi.spyOn(transcripts, "findTranscript").mockRejectedValueOnce(
      new ConfigError("Invalid theology configuration", ["categories: required"])
    );

    await expect(
      analyzeBatchOrchestrator({ store, transcripts, config: testConfig }, ["t-1", "t-2"])
    ).rejects.toBeInstanceOf(ConfigError);
    expect(store.upsertCalls).toBe(0);
  });
});
