/**
 * Aggregator
 * Rolls classified signatures up into a convergence report: which categories
 * and axes dominate, which books recur, which sermons drifted, and which
 * sermons are worth re-reading for their dominant category.
 *
 * An evidence lookup that fails or returns nothing only marks that item as
 * having no usable evidence; the rest of the report is still produced.
 */

import type { ClassifiedSignature, DriftLevel, Evidence } from "./types.js";

export type EvidenceLookup = (transcriptId: string) => Promise<readonly Evidence[]> | readonly Evidence[];

export type EvidenceStatus = "ok" | "empty" | "unavailable";

export interface AggregateOptions {
  outlierLimit: number;
  resonantLimit: number;
  evidencePerItem: number;
  scriptureLimit: number;
}

export const DEFAULT_AGGREGATE_OPTIONS: AggregateOptions = {
  outlierLimit: 10,
  resonantLimit: 5,
  evidencePerItem: 3,
  scriptureLimit: 10,
};

export interface CategoryConvergence {
  category: string;
  totalCount: number;
  averageDensity: number;
  /** Signatures with at least one match */
  signatureCount: number;
}

export interface AxisConvergence {
  axis: string;
  mean: number;
  min: number;
  max: number;
}

export interface ScriptureConvergence {
  book: string;
  totalCount: number;
  signatureCount: number;
}

interface ItemReference {
  transcriptId: string;
  channelId: string;
  title: string | null;
  publishedAt: string;
}

export interface EvidenceAttachment {
  evidenceStatus: EvidenceStatus;
  evidence: Evidence[];
  evidenceError: string | null;
}

export interface OutlierItem extends ItemReference, EvidenceAttachment {
  level: DriftLevel;
  magnitude: number;
  /** Axis with the largest |z| */
  axis: string | null;
  z: number | null;
}

export interface ResonantItem extends ItemReference, EvidenceAttachment {
  category: string;
  density: number;
}

export interface ConvergenceReport {
  signatureCount: number;
  lexiconVersions: string[];
  averageDensity: number;
  categories: CategoryConvergence[];
  axes: AxisConvergence[];
  scripture: ScriptureConvergence[];
  driftDistribution: Record<DriftLevel, number>;
  outliers: OutlierItem[];
  resonant: ResonantItem[];
}

export function emptyDriftDistribution(): Record<DriftLevel, number> {
  return { insufficient_history: 0, stable: 0, moderate: 0, strong: 0, anomaly: 0 };
}

function reference(item: ClassifiedSignature): ItemReference {
  return {
    transcriptId: item.signature.transcriptId,
    channelId: item.channelId,
    title: item.title ?? null,
    publishedAt: item.publishedAt,
  };
}

/**
 * Category with the highest density in a signature; ties go to the
 * alphabetically first name. Null when nothing matched.
 */
export function dominantCategory(item: ClassifiedSignature): { category: string; density: number } | null {
  let best: { category: string; density: number } | null = null;
  for (const [category, density] of Object.entries(item.signature.categoryDensity)) {
    if (density <= 0) continue;
    if (
      !best ||
      density > best.density ||
      (density === best.density && category.localeCompare(best.category) < 0)
    ) {
      best = { category, density };
    }
  }
  return best;
}

export function summarizeCategories(items: readonly ClassifiedSignature[]): CategoryConvergence[] {
  const totals = new Map<string, { count: number; density: number; signatures: number }>();

  for (const { signature } of items) {
    for (const [category, count] of Object.entries(signature.categoryCounts)) {
      const entry = totals.get(category) ?? { count: 0, density: 0, signatures: 0 };
      entry.count += count;
      entry.density += signature.categoryDensity[category] ?? 0;
      if (count > 0) entry.signatures += 1;
      totals.set(category, entry);
    }
  }

  return [...totals.entries()]
    .map(([category, entry]) => ({
      category,
      totalCount: entry.count,
      averageDensity: items.length > 0 ? entry.density / items.length : 0,
      signatureCount: entry.signatures,
    }))
    .sort((a, b) => b.totalCount - a.totalCount || a.category.localeCompare(b.category));
}

function summarizeAxes(items: readonly ClassifiedSignature[]): AxisConvergence[] {
  const series = new Map<string, number[]>();
  for (const { signature } of items) {
    for (const [axis, value] of Object.entries(signature.axisScores)) {
      const values = series.get(axis) ?? [];
      values.push(value);
      series.set(axis, values);
    }
  }

  return [...series.entries()].map(([axis, values]) => {
    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const value of values) {
      sum += value;
      if (value < min) min = value;
      if (value > max) max = value;
    }
    return { axis, mean: sum / values.length, min, max };
  });
}

function summarizeScripture(items: readonly ClassifiedSignature[], limit: number): ScriptureConvergence[] {
  const totals = new Map<string, ScriptureConvergence>();
  for (const { signature } of items) {
    for (const [book, count] of Object.entries(signature.scriptureRefs)) {
      if (count <= 0) continue;
      const entry = totals.get(book) ?? { book, totalCount: 0, signatureCount: 0 };
      entry.totalCount += count;
      entry.signatureCount += 1;
      totals.set(book, entry);
    }
  }

  return [...totals.values()]
    .sort((a, b) => b.totalCount - a.totalCount || a.book.localeCompare(b.book))
    .slice(0, limit);
}

function strongestAxis(item: ClassifiedSignature): { axis: string | null; z: number | null } {
  let best: { axis: string | null; z: number | null } = { axis: null, z: null };
  for (const axisDrift of Object.values(item.drift.axes)) {
    if (axisDrift.z === null) continue;
    if (best.z === null || Math.abs(axisDrift.z) > Math.abs(best.z)) {
      best = { axis: axisDrift.axis, z: axisDrift.z };
    }
  }
  return best;
}

/**
 * Caches lookups per transcript and turns failures into an "unavailable"
 * status carrying the error message.
 */
function createEvidenceResolver(lookup: EvidenceLookup, perItem: number) {
  const cache = new Map<string, Promise<{ evidence: readonly Evidence[]; error: string | null }>>();

  const load = (transcriptId: string) => {
    let pending = cache.get(transcriptId);
    if (!pending) {
      pending = Promise.resolve()
        .then(() => lookup(transcriptId))
        .then(
          (evidence) => ({ evidence, error: null }),
          (error: unknown) => ({
            evidence: [],
            error: error instanceof Error ? error.message : String(error),
          })
        );
      cache.set(transcriptId, pending);
    }
    return pending;
  };

  return async (transcriptId: string, keep: (e: Evidence) => boolean): Promise<EvidenceAttachment> => {
    const { evidence, error } = await load(transcriptId);
    if (error !== null) {
      return { evidenceStatus: "unavailable", evidence: [], evidenceError: error };
    }
    const relevant = evidence.filter(keep).slice(0, perItem);
    return {
      evidenceStatus: relevant.length > 0 ? "ok" : "empty",
      evidence: relevant,
      evidenceError: null,
    };
  };
}

export async function aggregate(
  items: readonly ClassifiedSignature[],
  evidenceLookup: EvidenceLookup,
  options: Partial<AggregateOptions> = {}
): Promise<ConvergenceReport> {
  const settings: AggregateOptions = { ...DEFAULT_AGGREGATE_OPTIONS, ...options };
  const resolveEvidence = createEvidenceResolver(evidenceLookup, settings.evidencePerItem);

  const driftDistribution = emptyDriftDistribution();
  for (const item of items) {
    driftDistribution[item.drift.level] += 1;
  }

  const outlierCandidates = items
    .filter((item) => item.drift.level === "strong" || item.drift.level === "anomaly")
    .map((item) => ({ item, ...strongestAxis(item), magnitude: item.drift.magnitude ?? 0 }))
    .sort(
      (a, b) =>
        b.magnitude - a.magnitude ||
        a.item.signature.transcriptId.localeCompare(b.item.signature.transcriptId)
    )
    .slice(0, settings.outlierLimit);

  const outliers: OutlierItem[] = [];
  for (const candidate of outlierCandidates) {
    const attachment = await resolveEvidence(
      candidate.item.signature.transcriptId,
      (e) => candidate.axis !== null && e.axis === candidate.axis
    );
    outliers.push({
      ...reference(candidate.item),
      level: candidate.item.drift.level,
      magnitude: candidate.magnitude,
      axis: candidate.axis,
      z: candidate.z,
      ...attachment,
    });
  }

  // Best sermon per dominant category.
  const byCategory = new Map<string, { item: ClassifiedSignature; density: number }>();
  for (const item of items) {
    const dominant = dominantCategory(item);
    if (!dominant) continue;
    const current = byCategory.get(dominant.category);
    if (
      !current ||
      dominant.density > current.density ||
      (dominant.density === current.density &&
        item.signature.transcriptId.localeCompare(current.item.signature.transcriptId) < 0)
    ) {
      byCategory.set(dominant.category, { item, density: dominant.density });
    }
  }

  const resonantCandidates = [...byCategory.entries()]
    .sort(([catA, a], [catB, b]) => b.density - a.density || catA.localeCompare(catB))
    .slice(0, settings.resonantLimit);

  const resonant: ResonantItem[] = [];
  for (const [category, { item, density }] of resonantCandidates) {
    const attachment = await resolveEvidence(item.signature.transcriptId, (e) => e.category === category);
    resonant.push({ ...reference(item), category, density, ...attachment });
  }

  const densities = items.map((item) => item.signature.theologicalDensity);

  return {
    signatureCount: items.length,
    lexiconVersions: [...new Set(items.map((item) => item.signature.lexiconVersion))].sort(),
    averageDensity: densities.length > 0 ? densities.reduce((sum, v) => sum + v, 0) / densities.length : 0,
    categories: summarizeCategories(items),
    axes: summarizeAxes(items),
    scripture: summarizeScripture(items, settings.scriptureLimit),
    driftDistribution,
    outliers,
    resonant,
  };
}
