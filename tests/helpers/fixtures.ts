import { parseTheologyConfig, type TheologyConfigDocument } from "../../src/services/business/brain/theologyConfig.js";
import type {
  ClassifiedSignature,
  DriftClassification,
  DriftLevel,
  Signature,
  TimelineEntry,
} from "../../src/services/business/brain/types.js";

export const testConfigDocument: TheologyConfigDocument = {
  version: "1.0.0",
  categories: [
    { name: "grace", axis: "grace_vs_effort", polarity: 1, patterns: ["grace", "mercy", "free gift"] },
    { name: "effort", axis: "grace_vs_effort", polarity: -1, patterns: ["try harder", "you must", "strive"] },
    { name: "hope", axis: "hope_vs_fear", polarity: 1, patterns: ["hope", "promise"] },
    { name: "fear", axis: "hope_vs_fear", polarity: -1, patterns: ["condemnation", "wrath"] },
    { name: "scripture_reference", axis: "scripture_vs_story", polarity: 1, patterns: ["scripture", "it is written"] },
    { name: "storytelling", axis: "scripture_vs_story", polarity: -1, patterns: ["i remember", "a story"] },
    { name: "christ", patterns: ["jesus", "christ"] },
    { name: "spirit", weight: 0.5, patterns: ["holy spirit"] },
  ],
  axes: [
    { name: "grace_vs_effort", toneTags: { positive: "grace-forward", negative: "effort-forward" } },
    { name: "hope_vs_fear", toneTags: { positive: "hopeful", negative: "warning-heavy" } },
    { name: "scripture_vs_story", toneTags: { positive: "text-anchored", negative: "story-driven" } },
  ],
  distributions: { trinitarian_focus: ["christ", "spirit"] },
  scoring: { activationK: 2, minWordCount: 0 },
  evidence: { windowWords: 3, perCategoryCap: 2, maxChars: 200, bucketChars: 50 },
  boilerplate: ["\\bsubscribe\\b"],
};

export const testConfig = parseTheologyConfig(testConfigDocument);
export const testLexicon = testConfig.lexicon;

const AXES = ["grace_vs_effort", "hope_vs_fear", "scripture_vs_story"];
const CATEGORIES = ["grace", "effort", "hope", "fear", "scripture_reference", "storytelling", "christ", "spirit"];

function zeros(names: string[]): Record<string, number> {
  return Object.fromEntries(names.map((name) => [name, 0]));
}

/** A zero-filled signature in the fixture lexicon's shape. */
export function makeSignature(
  transcriptId: string,
  overrides: Partial<Omit<Signature, "transcriptId">> = {}
): Signature {
  return {
    transcriptId,
    lexiconVersion: "1.0.0",
    scoredAt: "2026-01-01T00:00:00.000Z",
    wordCount: 1000,
    categoryCounts: zeros(CATEGORIES),
    categoryDensity: zeros(CATEGORIES),
    axisScores: zeros(AXES),
    theologicalDensity: 0,
    scriptureRefs: {},
    distributions: {},
    toneTags: [],
    ...overrides,
  };
}

export function makeEntry(
  transcriptId: string,
  publishedAt: string,
  overrides: Partial<Omit<Signature, "transcriptId">> = {},
  channelId = "channel-a"
): TimelineEntry {
  return {
    signature: makeSignature(transcriptId, overrides),
    channelId,
    publishedAt,
    title: `Sermon ${transcriptId}`,
  };
}

export function makeDrift(transcriptId: string, level: DriftLevel, magnitude: number | null = null): DriftClassification {
  return { transcriptId, level, magnitude, axes: {}, categoryZScores: {} };
}

export function classified(entry: TimelineEntry, drift: DriftClassification): ClassifiedSignature {
  return { ...entry, drift };
}

/** ISO date of the Sunday `n` weeks after 2026-01-04. */
export function sunday(n: number): string {
  return new Date(Date.UTC(2026, 0, 4 + n * 7)).toISOString();
}
