/**
 * Evidence Extractor
 * Builds the receipts behind a signature: a bounded snippet around each
 * category match, deduplicated and capped per category.
 *
 * Output is a pure function of (text, lexicon, settings, boilerplate):
 * first-N by position, no sampling.
 */

import { isBoilerplate } from "./boilerplate.js";
import { findCategoryMatches } from "./textMatching.js";
import { DEFAULT_EVIDENCE } from "./theologyConfig.js";
import type { EvidenceSettings, EvidenceSnippet, Lexicon } from "./types.js";

export const ELLIPSIS = "…";

const SENTENCE_END = /[.!?]["'”’)\]]*$/;

interface Token {
  text: string;
  start: number;
  end: number;
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0], start, end: start + match[0].length });
  }
  return tokens;
}

/** Index of the first token ending after `offset`. */
function tokenIndexAt(tokens: Token[], offset: number): number {
  let lo = 0;
  let hi = tokens.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (tokens[mid].end <= offset) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

function truncate(snippet: string, maxChars: number): string {
  if (snippet.length <= maxChars) {
    return snippet;
  }
  const cut = snippet.slice(0, maxChars - 1);
  const lastSpace = cut.lastIndexOf(" ");
  const body = (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd();
  return body.endsWith(ELLIPSIS) ? body : body + ELLIPSIS;
}

/**
 * Window of `windowWords` words either side of a match, with ellipsis
 * markers where the window does not meet a sentence boundary.
 */
function buildSnippet(
  tokens: Token[],
  start: number,
  end: number,
  settings: EvidenceSettings
): string {
  const first = tokenIndexAt(tokens, start);
  const last = Math.max(first, tokenIndexAt(tokens, end - 1));
  const lo = Math.max(0, first - settings.windowWords);
  const hi = Math.min(tokens.length, last + settings.windowWords + 1);

  let snippet = tokens
    .slice(lo, hi)
    .map((t) => t.text)
    .join(" ");

  if (lo > 0 && !SENTENCE_END.test(tokens[lo - 1].text)) {
    snippet = ELLIPSIS + snippet;
  }
  if (hi < tokens.length && !SENTENCE_END.test(tokens[hi - 1].text)) {
    snippet = snippet + ELLIPSIS;
  }

  return truncate(snippet, settings.maxChars);
}

export function extractEvidence(
  text: string,
  lexicon: Lexicon,
  settings: EvidenceSettings = DEFAULT_EVIDENCE,
  boilerplate: readonly RegExp[] = []
): EvidenceSnippet[] {
  if (!text || settings.perCategoryCap <= 0) {
    return [];
  }

  const tokens = tokenize(text);
  const evidence: EvidenceSnippet[] = [];

  for (const category of lexicon.categories) {
    const buckets = new Set<number>();
    const seenSnippets = new Set<string>();
    let taken = 0;

    for (const match of findCategoryMatches(text, category)) {
      if (taken >= settings.perCategoryCap) break;

      const bucket = Math.floor(match.start / settings.bucketChars);
      if (buckets.has(bucket)) continue;
      buckets.add(bucket);

      const snippet = buildSnippet(tokens, match.start, match.end, settings);
      if (seenSnippets.has(snippet) || isBoilerplate(snippet, boilerplate)) continue;
      seenSnippets.add(snippet);

      evidence.push({
        category: category.name,
        axis: category.axis,
        keyword: match.pattern,
        snippet,
        position: match.start,
      });
      taken++;
    }
  }

  return evidence;
}
