/**
 * Climate
 * Period summary across every channel, compared against the period before it.
 */

import { emptyDriftDistribution } from "./aggregator.js";
import type { ClassifiedSignature, DriftLevel } from "./types.js";

export interface ClimateStats {
  count: number;
  averageDensity: number;
  averageAxes: Record<string, number>;
  topCategories: { category: string; totalDensity: number }[];
  topBooks: { book: string; totalCount: number }[];
  driftDistribution: Record<DriftLevel, number>;
  /** Percentage of sermons at moderate drift or above */
  driftRate: number;
}

export interface ClimateComparison {
  densityDelta: number | null;
  axisDeltas: Record<string, number> | null;
  driftRateDelta: number | null;
}

const DRIFTING: ReadonlySet<DriftLevel> = new Set<DriftLevel>(["moderate", "strong", "anomaly"]);

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

function topEntries(totals: Map<string, number>, limit: number): [string, number][] {
  return [...totals.entries()]
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
    .slice(0, limit);
}

export function computeClimateStats(items: readonly ClassifiedSignature[], topN = 5): ClimateStats {
  const axisSeries = new Map<string, number[]>();
  const categoryTotals = new Map<string, number>();
  const bookTotals = new Map<string, number>();
  const driftDistribution = emptyDriftDistribution();
  let drifting = 0;

  for (const { signature, drift } of items) {
    for (const [axis, value] of Object.entries(signature.axisScores)) {
      const values = axisSeries.get(axis) ?? [];
      values.push(value);
      axisSeries.set(axis, values);
    }
    for (const [category, density] of Object.entries(signature.categoryDensity)) {
      categoryTotals.set(category, (categoryTotals.get(category) ?? 0) + density);
    }
    for (const [book, count] of Object.entries(signature.scriptureRefs)) {
      bookTotals.set(book, (bookTotals.get(book) ?? 0) + count);
    }
    driftDistribution[drift.level] += 1;
    if (DRIFTING.has(drift.level)) drifting++;
  }

  const averageAxes: Record<string, number> = {};
  for (const [axis, values] of axisSeries) {
    averageAxes[axis] = mean(values);
  }

  return {
    count: items.length,
    averageDensity: mean(items.map((item) => item.signature.theologicalDensity)),
    averageAxes,
    topCategories: topEntries(categoryTotals, topN)
      .filter(([, total]) => total > 0)
      .map(([category, totalDensity]) => ({ category, totalDensity })),
    topBooks: topEntries(bookTotals, topN).map(([book, totalCount]) => ({ book, totalCount })),
    driftDistribution,
    driftRate: items.length > 0 ? (drifting / items.length) * 100 : 0,
  };
}

/** Deltas are null when the previous period has no sermons to compare against. */
export function compareClimate(current: ClimateStats, previous: ClimateStats): ClimateComparison {
  if (previous.count === 0) {
    return { densityDelta: null, axisDeltas: null, driftRateDelta: null };
  }

  const axisDeltas: Record<string, number> = {};
  for (const [axis, value] of Object.entries(current.averageAxes)) {
    const before = previous.averageAxes[axis];
    if (before !== undefined) {
      axisDeltas[axis] = value - before;
    }
  }

  return {
    densityDelta: current.averageDensity - previous.averageDensity,
    axisDeltas,
    driftRateDelta: current.driftRate - previous.driftRate,
  };
}

export interface ClimatePeriod {
  from: string;
  to: string;
  stats: ClimateStats;
}

export interface ClimateSnapshot {
  periodDays: number;
  current: ClimatePeriod;
  previous: ClimatePeriod;
  comparison: ClimateComparison;
  generatedAt: string;
}
