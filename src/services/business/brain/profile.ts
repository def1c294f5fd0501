/**
 * Sermon Profile
 * Reader-facing interpretation layered on a signature: tone tags from axis
 * scores and the tension hooks a report uses to frame a sermon.
 */

import type { Axis, DriftClassification, Lexicon } from "./types.js";

export const TONE_TAG_THRESHOLD = 0.25;
export const MAX_TONE_TAGS = 5;
export const IMBALANCE_THRESHOLD = 0.45;
export const DRIFT_TENSION_Z = 2;

export type Tension =
  | {
      type: "imbalance";
      axis: string;
      favored: string;
      disfavored: string;
      axisScore: number;
    }
  | {
      type: "drift";
      axis: string;
      z: number;
      note: string;
    };

export interface TensionHooks {
  dominantAxis: string | null;
  dominantDirection: string | null;
  dominantStrength: number;
  tensions: Tension[];
  questions: string[];
}

export function deriveToneTags(axisScores: Record<string, number>, lexicon: Lexicon): string[] {
  const tags: string[] = [];

  for (const axis of lexicon.axes) {
    const value = axisScores[axis.name] ?? 0;
    const tag =
      value >= TONE_TAG_THRESHOLD
        ? axis.toneTags.positive
        : value <= -TONE_TAG_THRESHOLD
          ? axis.toneTags.negative
          : null;
    if (tag) tags.push(tag);
  }

  return tags.slice(0, MAX_TONE_TAGS);
}

/**
 * Picks the dominant axis (largest |score|, first in lexicon order on ties)
 * and lists imbalance and drift tensions with follow-up questions.
 */
export function buildTensionHooks(
  axisScores: Record<string, number>,
  drift: DriftClassification | null,
  lexicon: Lexicon
): TensionHooks {
  let dominant: { axis: Axis; value: number } | null = null;
  for (const axis of lexicon.axes) {
    const value = axisScores[axis.name] ?? 0;
    if (Math.abs(value) > Math.abs(dominant?.value ?? 0)) {
      dominant = { axis, value };
    }
  }

  const tensions: Tension[] = [];
  for (const axis of lexicon.axes) {
    const value = axisScores[axis.name] ?? 0;
    if (Math.abs(value) >= IMBALANCE_THRESHOLD) {
      tensions.push({
        type: "imbalance",
        axis: axis.name,
        favored: value >= 0 ? axis.positive : axis.negative,
        disfavored: value >= 0 ? axis.negative : axis.positive,
        axisScore: value,
      });
    }
  }

  for (const axisDrift of Object.values(drift?.axes ?? {})) {
    if (axisDrift.z !== null && Math.abs(axisDrift.z) >= DRIFT_TENSION_Z) {
      tensions.push({
        type: "drift",
        axis: axisDrift.axis,
        z: axisDrift.z,
        note: "Axis deviated strongly from channel baseline",
      });
    }
  }

  const questions: string[] = [];
  if (dominant) {
    questions.push("Is this emphasis a one-off sermon topic, or a directional shift for this channel?");
  }
  if (tensions.some((t) => t.type === "drift")) {
    questions.push(
      "What changed recently (series, season, leadership, audience context) that could explain this deviation?"
    );
  }
  if (tensions.some((t) => t.type === "imbalance")) {
    questions.push("Does this imbalance clarify the gospel, or risk distorting it by omission?");
  }

  let dominantDirection: string | null = null;
  if (dominant) {
    dominantDirection = dominant.value >= 0 ? dominant.axis.positive : dominant.axis.negative;
  }

  return {
    dominantAxis: dominant?.axis.name ?? null,
    dominantDirection,
    dominantStrength: dominant?.value ?? 0,
    tensions,
    questions,
  };
}
