/**
 * Baseline
 * Mean and sample standard deviation over a window of prior signatures.
 * Recomputed from the window on every call; nothing accumulates.
 */

import type { Baseline, BaselineSet, Lexicon, Signature } from "./types.js";

function summarize(name: string, values: number[]): Baseline {
  const n = values.length;
  if (n === 0) {
    return { name, mean: 0, stddev: 0, n: 0 };
  }

  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  if (n < 2) {
    return { name, mean, stddev: 0, n };
  }

  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1);
  return { name, mean, stddev: Math.sqrt(variance), n };
}

function finiteValues(history: readonly Signature[], pick: (s: Signature) => number | undefined): number[] {
  const values: number[] = [];
  for (const signature of history) {
    const value = pick(signature);
    if (typeof value === "number" && Number.isFinite(value)) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Baseline for one axis. Signatures that lack the axis (older lexicon
 * versions) are left out of the sample.
 */
export function computeBaseline(history: readonly Signature[], axis: string): Baseline {
  return summarize(axis, finiteValues(history, (s) => s.axisScores[axis]));
}

export function computeCategoryBaseline(history: readonly Signature[], category: string): Baseline {
  return summarize(category, finiteValues(history, (s) => s.categoryDensity[category]));
}

export function buildBaselineSet(history: readonly Signature[], lexicon: Lexicon): BaselineSet {
  const axes: Record<string, Baseline> = {};
  for (const axis of lexicon.axes) {
    axes[axis.name] = computeBaseline(history, axis.name);
  }

  const categories: Record<string, Baseline> = {};
  for (const category of lexicon.categories) {
    categories[category.name] = computeCategoryBaseline(history, category.name);
  }

  return { axes, categories };
}
