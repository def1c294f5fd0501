/**
 * Brain Types
 * Plain data shapes shared by the scorer, evidence extractor, drift detector
 * and aggregator. Everything here is behaviour-free so report renderers can
 * consume it without depending on the engine.
 */

export type Polarity = 1 | -1;

export interface PatternMatcher {
  readonly pattern: string;
  readonly regex: RegExp;
}

export interface Category {
  readonly name: string;
  readonly patterns: readonly string[];
  readonly matchers: readonly PatternMatcher[];
  readonly weight: number;
  readonly axis: string | null;
  readonly polarity: Polarity | null;
}

export interface ToneTags {
  readonly positive: string | null;
  readonly negative: string | null;
}

export interface Axis {
  readonly name: string;
  readonly label: string;
  /** Category scored on the + side */
  readonly positive: string;
  /** Category scored on the - side */
  readonly negative: string;
  readonly toneTags: ToneTags;
}

export interface Lexicon {
  readonly version: string;
  readonly categories: readonly Category[];
  readonly axes: readonly Axis[];
  readonly distributions: Readonly<Record<string, readonly string[]>>;
}

export interface ScoringSettings {
  /** Activation constant K: axis totals below K are pulled toward 0 */
  readonly activationK: number;
  readonly minWordCount: number;
}

export interface DriftThresholds {
  readonly moderate: number;
  readonly strong: number;
  readonly anomaly: number;
}

export interface DriftSettings {
  readonly windowSize: number;
  readonly minSampleSize: number;
  readonly stddevEpsilon: number;
  readonly thresholds: DriftThresholds;
}

export interface EvidenceSettings {
  readonly windowWords: number;
  readonly perCategoryCap: number;
  readonly maxChars: number;
  readonly bucketChars: number;
}

export interface TheologyConfig {
  readonly lexicon: Lexicon;
  readonly scoring: ScoringSettings;
  readonly drift: DriftSettings;
  readonly evidence: EvidenceSettings;
  readonly boilerplate: readonly RegExp[];
}

export interface ScoreResult {
  wordCount: number;
  categoryCounts: Record<string, number>;
  categoryDensity: Record<string, number>;
  axisScores: Record<string, number>;
  theologicalDensity: number;
  scriptureRefs: Record<string, number>;
  distributions: Record<string, Record<string, number>>;
  toneTags: string[];
}

export interface Signature extends ScoreResult {
  transcriptId: string;
  lexiconVersion: string;
  scoredAt: string;
}

export interface EvidenceSnippet {
  category: string;
  axis: string | null;
  keyword: string;
  snippet: string;
  position: number;
}

export interface Evidence extends EvidenceSnippet {
  transcriptId: string;
}

export const DRIFT_LEVELS = [
  "insufficient_history",
  "stable",
  "moderate",
  "strong",
  "anomaly",
] as const;

export type DriftLevel = (typeof DRIFT_LEVELS)[number];

export interface Baseline {
  /** Axis or category name */
  name: string;
  mean: number;
  stddev: number;
  n: number;
}

export interface BaselineSet {
  axes: Record<string, Baseline>;
  categories: Record<string, Baseline>;
}

export interface AxisDrift {
  axis: string;
  score: number;
  level: DriftLevel;
  z: number | null;
  baseline: Baseline;
}

export interface DriftClassification {
  transcriptId: string;
  level: DriftLevel;
  /** Largest |z| over axes with enough history */
  magnitude: number | null;
  axes: Record<string, AxisDrift>;
  categoryZScores: Record<string, number>;
}

export interface TimelineEntry {
  signature: Signature;
  channelId: string;
  publishedAt: string;
  title?: string | null;
}

export interface ClassifiedSignature extends TimelineEntry {
  drift: DriftClassification;
}
