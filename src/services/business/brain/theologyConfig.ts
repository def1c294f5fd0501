/**
 * Theology Configuration
 * The versioned document that drives a scoring run: lexicon, activation
 * constant, drift bands, evidence limits and boilerplate filters.
 */

import { z } from "zod";
import { ConfigError } from "../../../utils/errors.js";
import { buildLexicon, formatIssues, lexiconSchema } from "./lexicon.js";
import type { DriftSettings, EvidenceSettings, ScoringSettings, TheologyConfig } from "./types.js";

export const DEFAULT_SCORING: ScoringSettings = Object.freeze({
  activationK: 2,
  minWordCount: 100,
});

export const DEFAULT_DRIFT: DriftSettings = Object.freeze({
  windowSize: 8,
  minSampleSize: 3,
  stddevEpsilon: 0.05,
  thresholds: Object.freeze({ moderate: 1, strong: 2, anomaly: 3 }),
});

export const DEFAULT_EVIDENCE: EvidenceSettings = Object.freeze({
  windowWords: 28,
  perCategoryCap: 3,
  maxChars: 600,
  bucketChars: 50,
});

const scoringSchema = z.object({
  activationK: z.number().positive().default(DEFAULT_SCORING.activationK),
  minWordCount: z.number().int().nonnegative().default(DEFAULT_SCORING.minWordCount),
});

const driftSchema = z.object({
  windowSize: z.number().int().positive().default(DEFAULT_DRIFT.windowSize),
  minSampleSize: z.number().int().min(2).default(DEFAULT_DRIFT.minSampleSize),
  stddevEpsilon: z.number().nonnegative().default(DEFAULT_DRIFT.stddevEpsilon),
  thresholds: z
    .object({
      moderate: z.number().positive().default(DEFAULT_DRIFT.thresholds.moderate),
      strong: z.number().positive().default(DEFAULT_DRIFT.thresholds.strong),
      anomaly: z.number().positive().default(DEFAULT_DRIFT.thresholds.anomaly),
    })
    .default({})
    .refine((t) => t.moderate < t.strong && t.strong < t.anomaly, {
      message: "Drift thresholds must increase: moderate < strong < anomaly",
    }),
});

const evidenceSchema = z.object({
  windowWords: z.number().int().positive().default(DEFAULT_EVIDENCE.windowWords),
  perCategoryCap: z.number().int().nonnegative().default(DEFAULT_EVIDENCE.perCategoryCap),
  maxChars: z.number().int().min(40).default(DEFAULT_EVIDENCE.maxChars),
  bucketChars: z.number().int().positive().default(DEFAULT_EVIDENCE.bucketChars),
});

export const theologyConfigSchema = lexiconSchema.extend({
  scoring: scoringSchema.default({}),
  drift: driftSchema.default({}),
  evidence: evidenceSchema.default({}),
  boilerplate: z.array(z.string().min(1)).default([]),
});

export type TheologyConfigDocument = z.input<typeof theologyConfigSchema>;

/**
 * Validates a theology configuration document and returns the immutable
 * config object passed to every scoring and drift call.
 */
export function parseTheologyConfig(document: unknown): TheologyConfig {
  const parsed = theologyConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError("Invalid theology configuration", formatIssues(parsed.error));
  }

  const { scoring, drift, evidence, boilerplate, ...lexiconDocument } = parsed.data;
  const lexicon = buildLexicon(lexiconDocument);

  const issues: string[] = [];
  const boilerplateRegexes: RegExp[] = [];
  for (const pattern of boilerplate) {
    try {
      boilerplateRegexes.push(new RegExp(pattern, "iu"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      issues.push(`boilerplate pattern '${pattern}' is not a valid regex: ${reason}`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigError("Invalid theology configuration", issues);
  }

  return Object.freeze({
    lexicon,
    scoring: Object.freeze({ ...scoring }),
    drift: Object.freeze({ ...drift, thresholds: Object.freeze({ ...drift.thresholds }) }),
    evidence: Object.freeze({ ...evidence }),
    boilerplate: Object.freeze(boilerplateRegexes),
  });
}
