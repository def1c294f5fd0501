/**
 * Drift Detector
 * Classifies a signature against baselines built from its channel's prior
 * sermons. Stateless: the caller picks the window, nothing is mutated.
 */

import { buildBaselineSet } from "./baseline.js";
import { DEFAULT_DRIFT } from "./theologyConfig.js";
import type {
  AxisDrift,
  Baseline,
  BaselineSet,
  ClassifiedSignature,
  DriftClassification,
  DriftLevel,
  DriftSettings,
  DriftThresholds,
  Lexicon,
  Signature,
  TimelineEntry,
} from "./types.js";

const SEVERITY: Record<DriftLevel, number> = {
  insufficient_history: 0,
  stable: 1,
  moderate: 2,
  strong: 3,
  anomaly: 4,
};

export function severityOf(level: DriftLevel): number {
  return SEVERITY[level];
}

export function levelForZ(z: number, thresholds: DriftThresholds): Exclude<DriftLevel, "insufficient_history"> {
  const magnitude = Math.abs(z);
  if (magnitude >= thresholds.anomaly) return "anomaly";
  if (magnitude >= thresholds.strong) return "strong";
  if (magnitude >= thresholds.moderate) return "moderate";
  return "stable";
}

/**
 * A baseline yields a z-score only with enough samples and a spread above
 * epsilon. Anything else is insufficient history, which is not "stable".
 */
export function isBaselineUsable(baseline: Baseline, settings: DriftSettings): boolean {
  return baseline.n >= settings.minSampleSize && baseline.stddev > settings.stddevEpsilon;
}

function emptyBaseline(name: string): Baseline {
  return { name, mean: 0, stddev: 0, n: 0 };
}

export function classify(
  signature: Signature,
  baselines: BaselineSet,
  settings: DriftSettings = DEFAULT_DRIFT
): DriftClassification {
  const axes: Record<string, AxisDrift> = {};
  let level: DriftLevel = "insufficient_history";
  let magnitude: number | null = null;

  for (const [axis, score] of Object.entries(signature.axisScores)) {
    const baseline = baselines.axes[axis] ?? emptyBaseline(axis);

    if (!isBaselineUsable(baseline, settings)) {
      axes[axis] = { axis, score, level: "insufficient_history", z: null, baseline };
      continue;
    }

    const z = (score - baseline.mean) / baseline.stddev;
    const axisLevel = levelForZ(z, settings.thresholds);
    axes[axis] = { axis, score, level: axisLevel, z, baseline };

    if (SEVERITY[axisLevel] > SEVERITY[level]) {
      level = axisLevel;
    }
    if (magnitude === null || Math.abs(z) > magnitude) {
      magnitude = Math.abs(z);
    }
  }

  const categoryZScores: Record<string, number> = {};
  for (const [category, density] of Object.entries(signature.categoryDensity)) {
    const baseline = baselines.categories[category];
    if (baseline && isBaselineUsable(baseline, settings)) {
      categoryZScores[category] = (density - baseline.mean) / baseline.stddev;
    }
  }

  return {
    transcriptId: signature.transcriptId,
    level,
    magnitude,
    axes,
    categoryZScores,
  };
}

function publishedTime(entry: TimelineEntry): number {
  return Date.parse(entry.publishedAt);
}

/**
 * Most recent `windowSize` sermons of the same channel published strictly
 * before the target.
 */
export function selectHistoryWindow(
  pool: readonly TimelineEntry[],
  target: TimelineEntry,
  windowSize: number
): Signature[] {
  const cutoff = publishedTime(target);
  return pool
    .filter(
      (entry) =>
        entry.channelId === target.channelId &&
        entry.signature.transcriptId !== target.signature.transcriptId &&
        publishedTime(entry) < cutoff
    )
    .sort(
      (a, b) =>
        publishedTime(b) - publishedTime(a) ||
        a.signature.transcriptId.localeCompare(b.signature.transcriptId)
    )
    .slice(0, windowSize)
    .map((entry) => entry.signature);
}

/**
 * Classifies each target against its own trailing window drawn from `pool`
 * (targets plus any earlier look-back sermons).
 */
export function classifyTimeline(
  targets: readonly TimelineEntry[],
  pool: readonly TimelineEntry[],
  lexicon: Lexicon,
  settings: DriftSettings = DEFAULT_DRIFT
): ClassifiedSignature[] {
  return targets.map((target) => {
    const history = selectHistoryWindow(pool, target, settings.windowSize);
    return {
      ...target,
      drift: classify(target.signature, buildBaselineSet(history, lexicon), settings),
    };
  });
}
