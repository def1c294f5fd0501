/**
 * Transcript Repository
 * Read access to transcripts joined with their video (channel, title,
 * published date).
 */

import { z } from "zod";
import { supabase } from "../config/supabase.js";
import { lexiconVersionKey } from "../services/business/brain/lexicon.js";
import { PersistenceError } from "../utils/errors.js";
import type { TranscriptRecord, TranscriptSource } from "./brainStore.js";

const videoSchema = z.object({
  channel_id: z.string(),
  title: z.string().nullable(),
  published_at: z.string().nullable(),
});

const transcriptRowSchema = z.object({
  id: z.string(),
  text: z.string().nullable(),
  created_at: z.string(),
  // PostgREST returns a many-to-one embed as an object; older clients wrap it.
  videos: z.union([videoSchema, z.array(videoSchema).length(1).transform(([video]) => video)]),
});

const pendingRowSchema = z.object({ transcript_id: z.string() });

/**
 * Gets a transcript with its channel and publish date.
 */
export async function findTranscript(transcriptId: string): Promise<TranscriptRecord | null> {
  const { data, error } = await supabase
    .from("transcripts")
    .select("id, text, created_at, videos!inner(channel_id, title, published_at)")
    .eq("id", transcriptId)
    .maybeSingle();

  if (error) {
    throw new PersistenceError("load transcript", error.message);
  }
  if (!data) {
    return null;
  }

  const parsed = transcriptRowSchema.safeParse(data);
  if (!parsed.success) {
    throw new PersistenceError("load transcript", parsed.error.issues.map((i) => i.message).join("; "));
  }

  const row = parsed.data;
  return {
    id: row.id,
    channelId: row.videos.channel_id,
    title: row.videos.title,
    // Undated videos fall back to when the transcript was stored
    publishedAt: new Date(row.videos.published_at ?? row.created_at).toISOString(),
    text: row.text ?? "",
  };
}

/**
 * Transcripts with no signature or one from an older lexicon version,
 * oldest first.
 */
export async function listPendingTranscriptIds(lexiconVersion: string, limit: number): Promise<string[]> {
  const { data, error } = await supabase.rpc("list_pending_transcripts", {
    p_lexicon_version_key: lexiconVersionKey(lexiconVersion),
    p_limit: limit,
  });

  if (error) {
    throw new PersistenceError("list pending transcripts", error.message);
  }

  const parsed = z.array(pendingRowSchema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new PersistenceError("list pending transcripts", parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data.map((row) => row.transcript_id);
}

export const supabaseTranscriptSource: TranscriptSource = {
  findTranscript,
  listPendingTranscriptIds,
};
