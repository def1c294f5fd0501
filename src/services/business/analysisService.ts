/**
 * Analysis Service
 * Scores one transcript, extracts its evidence and stores both together.
 * Also assembles the read model for a single stored signature.
 */

import type { BrainStore, TranscriptSource } from "../../repositories/brainStore.js";
import { EmptyInputError, NotFoundError } from "../../utils/errors.js";
import { buildBaselineSet } from "./brain/baseline.js";
import { classify } from "./brain/driftDetector.js";
import { extractEvidence } from "./brain/evidenceExtractor.js";
import { compareLexiconVersions } from "./brain/lexicon.js";
import { buildTensionHooks, type TensionHooks } from "./brain/profile.js";
import { buildSignature, score } from "./brain/scorer.js";
import type { DriftClassification, Evidence, ScoreResult, Signature, TheologyConfig } from "./brain/types.js";

export interface AnalysisDeps {
  store: BrainStore;
  transcripts: TranscriptSource;
  config: TheologyConfig;
  clock?: () => Date;
}

export type SkipReason = "empty" | "too_short" | "superseded";

export type AnalysisOutcome =
  | {
      status: "scored";
      transcriptId: string;
      signature: Signature;
      evidenceCount: number;
    }
  | {
      status: "skipped";
      transcriptId: string;
      reason: SkipReason;
      detail: string;
    };

export interface AnalysisView {
  transcriptId: string;
  channelId: string;
  title: string | null;
  publishedAt: string;
  signature: Signature;
  evidence: Evidence[];
  drift: DriftClassification;
  hooks: TensionHooks;
}

function skipped(transcriptId: string, reason: SkipReason, detail: string): AnalysisOutcome {
  console.log(`[analysis] skipped ${transcriptId} (${reason}): ${detail}`);
  return { status: "skipped", transcriptId, reason, detail };
}

/**
 * Scores a transcript with the configured lexicon and replaces whatever was
 * stored for it, unless a newer lexicon's signature is stored. Throws NotFoundError for unknown transcripts; store
 * failures propagate as PersistenceError.
 */
export async function analyzeTranscript(deps: AnalysisDeps, transcriptId: string): Promise<AnalysisOutcome> {
  const { store, transcripts, config } = deps;
  const clock = deps.clock ?? (() => new Date());
  const { lexicon } = config;

  const transcript = await transcripts.findTranscript(transcriptId);
  if (!transcript) {
    throw new NotFoundError("Transcript", transcriptId);
  }

  const existing = await store.get(transcriptId);
  if (existing && compareLexiconVersions(existing.signature.lexiconVersion, lexicon.version) > 0) {
    return skipped(
      transcriptId,
      "superseded",
      `stored lexicon ${existing.signature.lexiconVersion} is newer than ${lexicon.version}`
    );
  }

  let result: ScoreResult;
  try {
    result = score(transcript.text, lexicon, config.scoring);
  } catch (error) {
    if (error instanceof EmptyInputError) {
      return skipped(transcriptId, "empty", new EmptyInputError(transcriptId).message);
    }
    throw error;
  }

  if (result.wordCount < config.scoring.minWordCount) {
    return skipped(
      transcriptId,
      "too_short",
      `${result.wordCount} words, minimum is ${config.scoring.minWordCount}`
    );
  }

  const evidence = extractEvidence(transcript.text, lexicon, config.evidence, config.boilerplate);
  const signature = buildSignature(transcriptId, result, lexicon, clock());

  const written = await store.upsert({
    signature,
    channelId: transcript.channelId,
    publishedAt: transcript.publishedAt,
    title: transcript.title,
    evidence,
  });

  // A newer lexicon's result landed while this one was being scored
  if (written === "superseded") {
    return skipped(transcriptId, "superseded", `a newer lexicon than ${lexicon.version} was stored meanwhile`);
  }

  console.log(
    `[analysis] ✓ scored ${transcriptId} with lexicon ${lexicon.version} ` +
      `(${result.wordCount} words, ${evidence.length} snippets)`
  );

  return { status: "scored", transcriptId, signature, evidenceCount: evidence.length };
}

/**
 * Stored signature with its evidence, drift against the channel's trailing
 * window and the derived tension hooks.
 */
export async function describeAnalysis(
  deps: Pick<AnalysisDeps, "store" | "config">,
  transcriptId: string
): Promise<AnalysisView> {
  const { store, config } = deps;

  const entry = await store.get(transcriptId);
  if (!entry) {
    throw new NotFoundError("Signature", transcriptId);
  }

  const [history, evidence] = await Promise.all([
    store.listHistory({
      channelId: entry.channelId,
      before: entry.publishedAt,
      limit: config.drift.windowSize,
      excludeTranscriptId: transcriptId,
    }),
    store.listEvidence(transcriptId),
  ]);

  const baselines = buildBaselineSet(
    history.map((h) => h.signature),
    config.lexicon
  );
  const drift = classify(entry.signature, baselines, config.drift);

  return {
    transcriptId,
    channelId: entry.channelId,
    title: entry.title ?? null,
    publishedAt: entry.publishedAt,
    signature: entry.signature,
    evidence,
    drift,
    hooks: buildTensionHooks(entry.signature.axisScores, drift, config.lexicon),
  };
}
