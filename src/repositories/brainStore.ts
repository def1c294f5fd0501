/**
 * Brain Store
 * Persistence contract for signatures and evidence, plus the read side of
 * the transcripts table. Services depend on these interfaces only; the
 * Supabase implementations live beside them.
 */

import type { Evidence, EvidenceSnippet, TimelineEntry } from "../services/business/brain/types.js";

export interface AnalysisRecord extends TimelineEntry {
  evidence: EvidenceSnippet[];
}

export type UpsertResult = "stored" | "superseded";

export interface HistoryQuery {
  channelId: string;
  /** ISO timestamp; only sermons published strictly before it */
  before: string;
  limit: number;
  excludeTranscriptId?: string;
}

export interface RangeQuery {
  /** Inclusive ISO timestamp */
  from: string;
  /** Exclusive ISO timestamp */
  to: string;
  channelId?: string;
}

export interface BrainStore {
  get(transcriptId: string): Promise<TimelineEntry | null>;
  /**
   * Upserts the signature and replaces its evidence set. Both happen or
   * neither does. Nothing is written, and "superseded" is returned, when the
   * stored signature comes from a newer lexicon version.
   */
  upsert(record: AnalysisRecord): Promise<UpsertResult>;
  /** Ordered by category then position */
  listEvidence(transcriptId: string): Promise<Evidence[]>;
  /** Newest first */
  listHistory(query: HistoryQuery): Promise<TimelineEntry[]>;
  /** Oldest first */
  listInRange(query: RangeQuery): Promise<TimelineEntry[]>;
}

export interface TranscriptRecord {
  id: string;
  channelId: string;
  title: string | null;
  publishedAt: string;
  text: string;
}

export interface TranscriptSource {
  findTranscript(transcriptId: string): Promise<TranscriptRecord | null>;
  /** Transcripts with no signature, or one from a lexicon older than `lexiconVersion` */
  listPendingTranscriptIds(lexiconVersion: string, limit: number): Promise<string[]>;
}
