/**
 * Audit axis sign flips before switching lexicon versions
 * Run with: npm run script:audit-flips -- <candidate-config.json> <from> <to>
 *
 * Re-scores the stored signatures of a period with a candidate theology
 * configuration, in memory only, and lists axes whose sign would flip.
 */

import "dotenv/config";
import { loadTheologyConfigFile } from "../config/theology.js";
import { supabaseBrainStore } from "../repositories/signatureRepository.js";
import { supabaseTranscriptSource } from "../repositories/transcriptRepository.js";
import { buildSignature, score } from "../services/business/brain/scorer.js";
import { findAxisFlips } from "../services/business/brain/versionAudit.js";
import type { Signature } from "../services/business/brain/types.js";
import { EmptyInputError } from "../utils/errors.js";

async function auditFlips() {
  const [configPath, from, to] = process.argv.slice(2);
  if (!configPath || !from || !to) {
    throw new Error("Usage: auditFlips <candidate-config.json> <from> <to>");
  }

  const candidate = await loadTheologyConfigFile(configPath);
  const store = supabaseBrainStore;
  const transcripts = supabaseTranscriptSource;

  const stored = await store.listInRange({ from, to });
  console.log(`Re-scoring ${stored.length} signatures with lexicon ${candidate.lexicon.version}...\n`);

  const rescored: Signature[] = [];
  for (const entry of stored) {
    const transcript = await transcripts.findTranscript(entry.signature.transcriptId);
    if (!transcript) {
      console.log(`  - ${entry.signature.transcriptId}: transcript missing, skipped`);
      continue;
    }
    try {
      const result = score(transcript.text, candidate.lexicon, candidate.scoring);
      rescored.push(buildSignature(transcript.id, result, candidate.lexicon, new Date()));
    } catch (error) {
      if (!(error instanceof EmptyInputError)) throw error;
      console.log(`  - ${transcript.id}: empty transcript, skipped`);
    }
  }

  const audit = findAxisFlips(
    stored.map((entry) => entry.signature),
    rescored
  );

  console.log(`Compared: ${audit.compared}`);
  console.log(`Flips:    ${audit.flips.length}`);
  for (const [axis, count] of Object.entries(audit.flipsByAxis)) {
    console.log(`  ${axis}: ${count}`);
  }
  for (const flip of audit.flips) {
    console.log(`  ${flip.transcriptId} ${flip.axis}: ${flip.before.toFixed(3)} → ${flip.after.toFixed(3)}`);
  }
}

auditFlips()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error("\n✗ Error:", error);
    process.exit(1);
  });
