/**
 * Scripture Reference Extraction
 * Counts Bible book mentions (full names and common abbreviations, with an
 * optional chapter[:verse[-verse]] suffix) using the table in
 * data/scripture-books.json.
 */

import { readFileSync } from "fs";
import { z } from "zod";

const scriptureBooksSchema = z.array(
  z.object({
    book: z.string().min(1),
    aliases: z.array(z.string().min(1)).min(1),
  })
);

export type ScriptureBook = z.infer<typeof scriptureBooksSchema>[number];

const CHAPTER_VERSE = "(?:\\s+\\d{1,3}(?::\\d{1,3}(?:\\s*[-–]\\s*\\d{1,3})?)?)?";

export interface ScriptureMatcher {
  regex: RegExp;
  bookByAlias: ReadonlyMap<string, string>;
}

function aliasKey(alias: string): string {
  return alias.toLowerCase().replace(/\s+/g, "");
}

function aliasSource(alias: string): string {
  const tokens = alias.toLowerCase().trim().split(/\s+/);
  return tokens
    .map((token, i) => {
      const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
      if (i === 0) return escaped;
      return (/^\d+$/.test(tokens[i - 1]) ? "\\s*" : "\\s+") + escaped;
    })
    .join("");
}

/**
 * Builds one alternation over every alias, longest first, so "1 john" wins
 * over "john" at the same position.
 */
export function buildScriptureMatcher(books: readonly ScriptureBook[]): ScriptureMatcher {
  const bookByAlias = new Map<string, string>();
  const aliases: string[] = [];

  for (const { book, aliases: bookAliases } of books) {
    for (const alias of bookAliases) {
      bookByAlias.set(aliasKey(alias), book);
      aliases.push(alias);
    }
  }

  aliases.sort((a, b) => b.length - a.length || a.localeCompare(b));
  const alternation = aliases.map(aliasSource).join("|");
  const regex = new RegExp(
    `(?<![\\p{L}\\p{N}_])(${alternation})(?![\\p{L}\\p{N}_])${CHAPTER_VERSE}`,
    "giu"
  );

  return { regex, bookByAlias };
}

export function loadScriptureBooks(
  path: URL = new URL("../../../../data/scripture-books.json", import.meta.url)
): ScriptureBook[] {
  return scriptureBooksSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

const defaultMatcher = buildScriptureMatcher(loadScriptureBooks());

/**
 * Returns per-book reference counts; books never mentioned are omitted.
 */
export function extractScriptureRefs(
  text: string,
  matcher: ScriptureMatcher = defaultMatcher
): Record<string, number> {
  const counts: Record<string, number> = {};
  if (!text) return counts;

  for (const match of text.matchAll(matcher.regex)) {
    const book = matcher.bookByAlias.get(aliasKey(match[1]));
    if (book) {
      counts[book] = (counts[book] ?? 0) + 1;
    }
  }

  return counts;
}
