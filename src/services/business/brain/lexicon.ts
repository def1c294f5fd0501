/**
 * Lexicon
 * Validates a lexicon definition and builds the immutable category/axis model
 * the scorer runs on. Every problem found is reported at once in a ConfigError.
 */

import { z } from "zod";
import { ConfigError } from "../../../utils/errors.js";
import { compilePattern } from "./textMatching.js";
import type { Axis, Category, Lexicon, PatternMatcher } from "./types.js";

const categorySchema = z.object({
  name: z.string().min(1, "Category name is required"),
  patterns: z.array(z.string()).min(1, "Category must list at least one pattern"),
  weight: z.number().positive().optional(),
  axis: z.string().min(1).optional(),
  polarity: z.union([z.literal(1), z.literal(-1)]).optional(),
});

const axisSchema = z.object({
  name: z.string().min(1, "Axis name is required"),
  label: z.string().min(1).optional(),
  toneTags: z
    .object({
      positive: z.string().min(1).optional(),
      negative: z.string().min(1).optional(),
    })
    .optional(),
});

export const lexiconSchema = z.object({
  version: z.string().trim().min(1, "Lexicon version is required"),
  categories: z.array(categorySchema).min(1, "Lexicon must define at least one category"),
  axes: z.array(axisSchema).default([]),
  distributions: z.record(z.array(z.string()).min(1, "Distribution must name at least one category")).default({}),
});

export type LexiconDocument = z.output<typeof lexiconSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Parses and validates a lexicon definition.
 * Throws ConfigError on malformed axes, empty pattern lists or duplicate names.
 */
export function loadLexicon(configuration: unknown): Lexicon {
  const parsed = lexiconSchema.safeParse(configuration);
  if (!parsed.success) {
    throw new ConfigError("Invalid lexicon", formatIssues(parsed.error));
  }
  return buildLexicon(parsed.data);
}

export function buildLexicon(document: LexiconDocument): Lexicon {
  const issues: string[] = [];
  const categories = buildCategories(document, issues);
  const axes = buildAxes(document, categories, issues);
  const distributions = buildDistributions(document, categories, issues);

  if (issues.length > 0) {
    throw new ConfigError(`Invalid lexicon ${document.version}`, issues);
  }

  return Object.freeze({
    version: document.version,
    categories: Object.freeze(categories),
    axes: Object.freeze(axes),
    distributions: Object.freeze(distributions),
  });
}

function buildCategories(document: LexiconDocument, issues: string[]): Category[] {
  const seen = new Set<string>();
  const categories: Category[] = [];

  for (const raw of document.categories) {
    if (seen.has(raw.name)) {
      issues.push(`duplicate category '${raw.name}'`);
      continue;
    }
    seen.add(raw.name);

    const matchers: PatternMatcher[] = [];
    for (const pattern of raw.patterns) {
      const regex = compilePattern(pattern);
      if (!regex) {
        issues.push(`category '${raw.name}' has a pattern with no words: '${pattern}'`);
        continue;
      }
      matchers.push(Object.freeze({ pattern, regex }));
    }

    if ((raw.axis === undefined) !== (raw.polarity === undefined)) {
      issues.push(`category '${raw.name}' must set axis and polarity together`);
    }

    categories.push(
      Object.freeze({
        name: raw.name,
        patterns: Object.freeze([...raw.patterns]),
        matchers: Object.freeze(matchers),
        weight: raw.weight ?? 1,
        axis: raw.axis ?? null,
        polarity: raw.polarity ?? null,
      })
    );
  }

  return categories;
}

function buildAxes(document: LexiconDocument, categories: Category[], issues: string[]): Axis[] {
  const members = new Map<string, Category[]>();
  for (const category of categories) {
    if (category.axis === null || category.polarity === null) continue;
    const list = members.get(category.axis) ?? [];
    list.push(category);
    members.set(category.axis, list);
  }

  const declared = new Map<string, LexiconDocument["axes"][number]>();
  for (const axis of document.axes) {
    if (declared.has(axis.name)) {
      issues.push(`duplicate axis '${axis.name}'`);
      continue;
    }
    declared.set(axis.name, axis);
    if (!members.has(axis.name)) {
      issues.push(`axis '${axis.name}' has no member categories`);
    }
  }

  // Declared axes keep their order; axes only named by categories follow.
  const order = [
    ...declared.keys(),
    ...[...members.keys()].filter((name) => !declared.has(name)),
  ];

  const axes: Axis[] = [];
  for (const name of order) {
    const list = members.get(name);
    if (!list) continue;

    const positive = list.filter((c) => c.polarity === 1);
    const negative = list.filter((c) => c.polarity === -1);
    if (list.length !== 2 || positive.length !== 1 || negative.length !== 1) {
      const found = list.map((c) => `${c.name}(${c.polarity === 1 ? "+" : "-"})`).join(", ");
      issues.push(`axis '${name}' needs exactly one +1 and one -1 category, found: ${found}`);
      continue;
    }

    const meta = declared.get(name);
    axes.push(
      Object.freeze({
        name,
        label: meta?.label ?? name,
        positive: positive[0].name,
        negative: negative[0].name,
        toneTags: Object.freeze({
          positive: meta?.toneTags?.positive ?? null,
          negative: meta?.toneTags?.negative ?? null,
        }),
      })
    );
  }

  return axes;
}

function buildDistributions(
  document: LexiconDocument,
  categories: Category[],
  issues: string[]
): Record<string, readonly string[]> {
  const known = new Set(categories.map((c) => c.name));
  const distributions: Record<string, readonly string[]> = {};

  for (const [name, memberNames] of Object.entries(document.distributions)) {
    const unknown = memberNames.filter((member) => !known.has(member));
    if (unknown.length > 0) {
      issues.push(`distribution '${name}' names unknown categories: ${unknown.join(", ")}`);
    }
    if (new Set(memberNames).size !== memberNames.length) {
      issues.push(`distribution '${name}' lists a category twice`);
    }
    distributions[name] = Object.freeze([...memberNames]);
  }

  return distributions;
}

function versionSegments(part: string): string {
  return part
    .split(".")
    .map((segment) => (/^\d+$/.test(segment) ? segment.padStart(10, "0") : segment.toLowerCase()))
    .join(".");
}

/**
 * Sortable form of a lexicon version: plain string order (bytewise, as
 * with COLLATE "C") matches version order. Numeric segments compare as
 * numbers, trailing ".0" segments are ignored and a pre-release
 * ("5.4.0-beta") sorts before its release.
 */
export function lexiconVersionKey(version: string): string {
  const bare = version.trim().replace(/^v/i, "");
  const dash = bare.indexOf("-");
  const core = (dash === -1 ? bare : bare.slice(0, dash)).replace(/(\.0+)+$/, "");
  const prerelease = dash === -1 ? null : bare.slice(dash + 1);

  return `${versionSegments(core)}!${prerelease === null ? "~" : `-${versionSegments(prerelease)}`}`;
}

/**
 * Orders lexicon versions ("5.10.0" > "5.9.2" > "5.9.2-rc.1").
 * Returns a positive number when a is newer than b.
 */
export function compareLexiconVersions(a: string, b: string): number {
  const left = lexiconVersionKey(a);
  const right = lexiconVersionKey(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
