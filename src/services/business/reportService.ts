/**
 * Report Service
 * Loads signatures for a period, classifies each against its channel's
 * trailing window and rolls them up.
 */

import type { BrainStore } from "../../repositories/brainStore.js";
import { BadRequestError } from "../../utils/errors.js";
import { aggregate, type AggregateOptions, type ConvergenceReport } from "./brain/aggregator.js";
import { compareClimate, computeClimateStats, type ClimateSnapshot } from "./brain/climate.js";
import { classifyTimeline } from "./brain/driftDetector.js";
import type { TheologyConfig, TimelineEntry } from "./brain/types.js";

export interface ReportDeps {
  store: BrainStore;
  config: TheologyConfig;
}

export interface ConvergencePeriod {
  from: string;
  to: string;
  channelId?: string;
}

export interface ConvergenceReportResponse extends ConvergenceReport {
  period: ConvergencePeriod;
  generatedAt: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Earlier sermons of every channel in `targets`, so the first sermons of a
 * period still get a full trailing window.
 */
async function loadLookback(
  deps: ReportDeps,
  targets: readonly TimelineEntry[],
  before: string
): Promise<TimelineEntry[]> {
  const channels = [...new Set(targets.map((t) => t.channelId))];
  const histories = await Promise.all(
    channels.map((channelId) =>
      deps.store.listHistory({ channelId, before, limit: deps.config.drift.windowSize })
    )
  );
  return histories.flat();
}

async function classifyPeriod(deps: ReportDeps, targets: TimelineEntry[], from: string) {
  const lookback = await loadLookback(deps, targets, from);
  return classifyTimeline(targets, [...lookback, ...targets], deps.config.lexicon, deps.config.drift);
}

export async function buildConvergenceReport(
  deps: ReportDeps,
  period: ConvergencePeriod,
  options: Partial<AggregateOptions> = {},
  now: Date = new Date()
): Promise<ConvergenceReportResponse> {
  if (Date.parse(period.from) >= Date.parse(period.to)) {
    throw new BadRequestError("'from' must be earlier than 'to'");
  }

  const targets = await deps.store.listInRange(period);
  const classified = await classifyPeriod(deps, targets, period.from);

  console.log(
    `[report] convergence ${period.from} → ${period.to}` +
      (period.channelId ? ` channel=${period.channelId}` : "") +
      `: ${classified.length} signatures`
  );

  const report = await aggregate(classified, (transcriptId) => deps.store.listEvidence(transcriptId), options);
  return { ...report, period, generatedAt: now.toISOString() };
}

/**
 * Last `days` days across all channels against the `days` before them.
 */
export async function buildClimateSnapshot(
  deps: ReportDeps,
  days: number,
  now: Date = new Date()
): Promise<ClimateSnapshot> {
  if (!Number.isInteger(days) || days <= 0) {
    throw new BadRequestError("'days' must be a positive integer");
  }

  const to = now.toISOString();
  const from = new Date(now.getTime() - days * DAY_MS).toISOString();
  const previousFrom = new Date(now.getTime() - 2 * days * DAY_MS).toISOString();

  const [current, previous] = await Promise.all([
    deps.store.listInRange({ from, to }),
    deps.store.listInRange({ from: previousFrom, to: from }),
  ]);

  // One pool so the current period's windows can reach into the previous one.
  const lookback = await loadLookback(deps, [...previous, ...current], previousFrom);
  const pool = [...lookback, ...previous, ...current];
  const { lexicon, drift } = deps.config;

  const currentStats = computeClimateStats(classifyTimeline(current, pool, lexicon, drift));
  const previousStats = computeClimateStats(classifyTimeline(previous, pool, lexicon, drift));

  console.log(`[report] climate ${days}d: ${currentStats.count} current, ${previousStats.count} previous`);

  return {
    periodDays: days,
    current: { from, to, stats: currentStats },
    previous: { from: previousFrom, to: from, stats: previousStats },
    comparison: compareClimate(currentStats, previousStats),
    generatedAt: now.toISOString(),
  };
}
