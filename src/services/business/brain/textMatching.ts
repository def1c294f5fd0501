/**
 * Text Matching
 * Normalization, word counting and pattern compilation shared by the scorer
 * and the evidence extractor.
 *
 * A compiled pattern matches the same spans on raw text as on normalized
 * text: tokens may be separated by any run of characters that normalization
 * turns into a single space.
 */

import type { Category } from "./types.js";

const STRIPPED_CHARS = /[^\p{L}\p{N}_\s:\-]/gu;
const WORD_CHAR = "[\\p{L}\\p{N}_]";
const TOKEN_SEPARATOR = "[^\\p{L}\\p{N}_:\\-]+";

export interface PatternMatch {
  start: number;
  end: number;
  pattern: string;
}

/**
 * Lowercases, replaces punctuation (except ':' and '-', kept for scripture
 * references and compounds) with spaces, and collapses whitespace.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(STRIPPED_CHARS, " ").replace(/\s+/g, " ").trim();
}

const HAS_WORD_CHAR = /[\p{L}\p{N}]/u;

/** Tokens made only of kept punctuation (":" or "-") are not words. */
export function countWords(normalized: string): number {
  return normalized === "" ? 0 : normalized.split(" ").filter((token) => HAS_WORD_CHAR.test(token)).length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiles a keyword or phrase into a case-insensitive, word-bounded regex.
 * Returns null when the pattern normalizes to nothing.
 */
export function compilePattern(pattern: string): RegExp | null {
  const tokens = normalizeText(pattern)
    .split(" ")
    .filter((token) => token.length > 0);

  if (tokens.length === 0) {
    return null;
  }

  const body = tokens.map(escapeRegExp).join(TOKEN_SEPARATOR);
  return new RegExp(`(?<!${WORD_CHAR})${body}(?!${WORD_CHAR})`, "giu");
}

/**
 * Finds non-overlapping matches of all of a category's patterns.
 * On overlap the earlier match wins; at the same start, the longer one.
 */
export function findCategoryMatches(text: string, category: Category): PatternMatch[] {
  const candidates: PatternMatch[] = [];

  for (const matcher of category.matchers) {
    for (const match of text.matchAll(matcher.regex)) {
      const start = match.index ?? 0;
      candidates.push({ start, end: start + match[0].length, pattern: matcher.pattern });
    }
  }

  candidates.sort((a, b) => a.start - b.start || b.end - a.end);

  const accepted: PatternMatch[] = [];
  let lastEnd = -1;
  for (const candidate of candidates) {
    if (candidate.start >= lastEnd) {
      accepted.push(candidate);
      lastEnd = candidate.end;
    }
  }

  return accepted;
}
