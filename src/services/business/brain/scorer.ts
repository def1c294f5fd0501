/**
 * Scorer
 * Turns one transcript into a fixed-shape numeric signature.
 *
 * Counting is purely lexical: "there is no condemnation" counts toward the
 * fear category exactly like "condemnation awaits". There is no negation,
 * sentiment or grammar handling.
 */

import { EmptyInputError } from "../../../utils/errors.js";
import { deriveToneTags } from "./profile.js";
import { extractScriptureRefs } from "./scriptureRefs.js";
import { countWords, findCategoryMatches, normalizeText } from "./textMatching.js";
import { DEFAULT_SCORING } from "./theologyConfig.js";
import type { Lexicon, ScoreResult, ScoringSettings, Signature } from "./types.js";

/**
 * Dampened polarity of one axis.
 * (p - n) / (p + n), scaled by min(1, (p + n) / K) so a single keyword
 * cannot saturate the axis.
 */
export function scoreAxis(positive: number, negative: number, activationK: number): number {
  const total = positive + negative;
  if (total <= 0) {
    return 0;
  }
  const polarity = (positive - negative) / total;
  return polarity * Math.min(1, total / activationK);
}

/**
 * Scores text against a lexicon. Every category and axis appears in the
 * result, zero-filled. Throws EmptyInputError when the text has no words.
 */
export function score(
  text: string,
  lexicon: Lexicon,
  settings: ScoringSettings = DEFAULT_SCORING
): ScoreResult {
  const normalized = normalizeText(text);
  const wordCount = countWords(normalized);
  if (wordCount === 0) {
    throw new EmptyInputError();
  }

  const categoryCounts: Record<string, number> = {};
  const categoryDensity: Record<string, number> = {};
  const weighted: Record<string, number> = {};
  let weightedTotal = 0;

  for (const category of lexicon.categories) {
    const count = findCategoryMatches(normalized, category).length;
    const weightedCount = count * category.weight;
    categoryCounts[category.name] = count;
    weighted[category.name] = weightedCount;
    categoryDensity[category.name] = (weightedCount * 1000) / wordCount;
    weightedTotal += weightedCount;
  }

  const axisScores: Record<string, number> = {};
  for (const axis of lexicon.axes) {
    axisScores[axis.name] = scoreAxis(
      weighted[axis.positive] ?? 0,
      weighted[axis.negative] ?? 0,
      settings.activationK
    );
  }

  const distributions: Record<string, Record<string, number>> = {};
  for (const [name, members] of Object.entries(lexicon.distributions)) {
    const total = members.reduce((sum, member) => sum + (categoryDensity[member] ?? 0), 0);
    distributions[name] = Object.fromEntries(
      members.map((member) => [member, total > 0 ? (categoryDensity[member] ?? 0) / total : 0])
    );
  }

  return {
    wordCount,
    categoryCounts,
    categoryDensity,
    axisScores,
    theologicalDensity: (weightedTotal * 1000) / wordCount,
    scriptureRefs: extractScriptureRefs(text),
    distributions,
    toneTags: deriveToneTags(axisScores, lexicon),
  };
}

export function buildSignature(
  transcriptId: string,
  result: ScoreResult,
  lexicon: Lexicon,
  scoredAt: Date
): Signature {
  return {
    transcriptId,
    lexiconVersion: lexicon.version,
    scoredAt: scoredAt.toISOString(),
    ...result,
  };
}
