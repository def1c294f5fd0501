/**
 * Signature Repository
 * Supabase-backed BrainStore over brain_signatures and brain_evidence.
 * Writes go through the replace_brain_analysis RPC so the signature upsert
 * and the evidence replacement share one transaction, and a row from a newer
 * lexicon version is never overwritten.
 */

import { z } from "zod";
import { supabase } from "../config/supabase.js";
import { lexiconVersionKey } from "../services/business/brain/lexicon.js";
import { PersistenceError } from "../utils/errors.js";
import type { Evidence, TimelineEntry } from "../services/business/brain/types.js";
import type { AnalysisRecord, BrainStore, HistoryQuery, RangeQuery, UpsertResult } from "./brainStore.js";

const numberRecord = z.record(z.number());

const signatureRowSchema = z.object({
  transcript_id: z.string(),
  channel_id: z.string(),
  published_at: z.string(),
  title: z.string().nullable(),
  lexicon_version: z.string(),
  word_count: z.number().int().nonnegative(),
  category_counts: numberRecord,
  category_density: numberRecord,
  axis_scores: numberRecord,
  theological_density: z.number(),
  scripture_refs: numberRecord.default({}),
  distributions: z.record(numberRecord).default({}),
  tone_tags: z.array(z.string()).default([]),
  scored_at: z.string(),
});

const evidenceRowSchema = z.object({
  transcript_id: z.string(),
  category: z.string(),
  axis: z.string().nullable(),
  keyword: z.string(),
  snippet: z.string(),
  position: z.number().int(),
});

const upsertResultSchema = z.enum(["stored", "superseded"]);

type SignatureRow = z.infer<typeof signatureRowSchema>;

export interface SignatureWriteRow extends SignatureRow {
  lexicon_version_key: string;
}

const SIGNATURE_COLUMNS =
  "transcript_id, channel_id, published_at, title, lexicon_version, word_count, category_counts, category_density, axis_scores, theological_density, scripture_refs, distributions, tone_tags, scored_at";

function toEntry(row: SignatureRow): TimelineEntry {
  return {
    channelId: row.channel_id,
    publishedAt: new Date(row.published_at).toISOString(),
    title: row.title,
    signature: {
      transcriptId: row.transcript_id,
      lexiconVersion: row.lexicon_version,
      scoredAt: new Date(row.scored_at).toISOString(),
      wordCount: row.word_count,
      categoryCounts: row.category_counts,
      categoryDensity: row.category_density,
      axisScores: row.axis_scores,
      theologicalDensity: row.theological_density,
      scriptureRefs: row.scripture_refs,
      distributions: row.distributions,
      toneTags: row.tone_tags,
    },
  };
}

export function toSignatureRow(record: AnalysisRecord): SignatureWriteRow {
  const { signature } = record;
  return {
    transcript_id: signature.transcriptId,
    channel_id: record.channelId,
    published_at: record.publishedAt,
    title: record.title ?? null,
    lexicon_version: signature.lexiconVersion,
    lexicon_version_key: lexiconVersionKey(signature.lexiconVersion),
    word_count: signature.wordCount,
    category_counts: signature.categoryCounts,
    category_density: signature.categoryDensity,
    axis_scores: signature.axisScores,
    theological_density: signature.theologicalDensity,
    scripture_refs: signature.scriptureRefs,
    distributions: signature.distributions,
    tone_tags: signature.toneTags,
    scored_at: signature.scoredAt,
  };
}

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, operation: string): T[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new PersistenceError(operation, parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

/**
 * Gets the stored signature for a transcript.
 */
export async function getSignature(transcriptId: string): Promise<TimelineEntry | null> {
  const { data, error } = await supabase
    .from("brain_signatures")
    .select(SIGNATURE_COLUMNS)
    .eq("transcript_id", transcriptId)
    .maybeSingle();

  if (error) {
    throw new PersistenceError("load signature", error.message);
  }
  if (!data) {
    return null;
  }
  const [row] = parseRows(signatureRowSchema, [data], "load signature");
  return toEntry(row);
}

/**
 * Stores a signature with its evidence set in one transaction.
 */
export async function replaceAnalysis(record: AnalysisRecord): Promise<UpsertResult> {
  const evidence = record.evidence.map((e) => ({
    transcript_id: record.signature.transcriptId,
    category: e.category,
    axis: e.axis,
    keyword: e.keyword,
    snippet: e.snippet,
    position: e.position,
  }));

  const { data, error } = await supabase.rpc("replace_brain_analysis", {
    p_signature: toSignatureRow(record),
    p_evidence: evidence,
  });

  if (error) {
    throw new PersistenceError("store analysis", error.message);
  }

  const result = upsertResultSchema.safeParse(data);
  if (!result.success) {
    throw new PersistenceError("store analysis", `unexpected result ${JSON.stringify(data)}`);
  }
  return result.data;
}

export async function listEvidence(transcriptId: string): Promise<Evidence[]> {
  const { data, error } = await supabase
    .from("brain_evidence")
    .select("transcript_id, category, axis, keyword, snippet, position")
    .eq("transcript_id", transcriptId)
    .order("category", { ascending: true })
    .order("position", { ascending: true });

  if (error) {
    throw new PersistenceError("load evidence", error.message);
  }

  return parseRows(evidenceRowSchema, data, "load evidence").map(
    (row): Evidence => ({
      transcriptId: row.transcript_id,
      category: row.category,
      axis: row.axis,
      keyword: row.keyword,
      snippet: row.snippet,
      position: row.position,
    })
  );
}

/**
 * Signatures of a channel published before a date, newest first.
 */
export async function listChannelHistory(query: HistoryQuery): Promise<TimelineEntry[]> {
  let request = supabase
    .from("brain_signatures")
    .select(SIGNATURE_COLUMNS)
    .eq("channel_id", query.channelId)
    .lt("published_at", query.before);

  if (query.excludeTranscriptId) {
    request = request.neq("transcript_id", query.excludeTranscriptId);
  }

  const { data, error } = await request
    .order("published_at", { ascending: false })
    .order("transcript_id", { ascending: true })
    .limit(query.limit);

  if (error) {
    throw new PersistenceError("load history", error.message);
  }
  return parseRows(signatureRowSchema, data, "load history").map(toEntry);
}

/**
 * Signatures published in [from, to), oldest first.
 */
export async function listSignaturesInRange(query: RangeQuery): Promise<TimelineEntry[]> {
  let request = supabase
    .from("brain_signatures")
    .select(SIGNATURE_COLUMNS)
    .gte("published_at", query.from)
    .lt("published_at", query.to);

  if (query.channelId) {
    request = request.eq("channel_id", query.channelId);
  }

  const { data, error } = await request
    .order("published_at", { ascending: true })
    .order("transcript_id", { ascending: true });

  if (error) {
    throw new PersistenceError("load signatures", error.message);
  }
  return parseRows(signatureRowSchema, data, "load signatures").map(toEntry);
}

export const supabaseBrainStore: BrainStore = {
  get: getSignature,
  upsert: replaceAnalysis,
  listEvidence,
  listHistory: listChannelHistory,
  listInRange: listSignaturesInRange,
};
