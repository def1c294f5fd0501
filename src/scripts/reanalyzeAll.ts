/**
 * Re-analyze pending transcripts in process
 * Run with: npm run script:reanalyze -- [limit]
 *
 * This script:
 * 1. Loads the theology configuration
 * 2. Lists transcripts with no signature or an older lexicon version
 * 3. Scores them one by one; Ctrl+C stops after the current transcript
 */

import "dotenv/config";
import { initializeApp } from "../config/init.js";
import { analyzeBatchOrchestrator } from "../jobs/orchestrators/analyzeBatchOrchestrator.js";
import { supabaseBrainStore } from "../repositories/signatureRepository.js";
import { supabaseTranscriptSource } from "../repositories/transcriptRepository.js";

async function reanalyzeAll() {
  const limit = parseInt(process.argv[2] || "500", 10);
  const config = await initializeApp();
  const transcripts = supabaseTranscriptSource;

  const ids = await transcripts.listPendingTranscriptIds(config.lexicon.version, limit);
  console.log(`Found ${ids.length} transcripts pending for lexicon ${config.lexicon.version}\n`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\nStopping after the current transcript...");
    controller.abort();
  });

  const result = await analyzeBatchOrchestrator(
    { store: supabaseBrainStore, transcripts, config },
    ids,
    {
      signal: controller.signal,
      onProgress: (done, total) => {
        if (done % 25 === 0 || done === total) console.log(`  ${done}/${total}`);
      },
    }
  );

  console.log(`\n✓ Scored:    ${result.scored.length}`);
  console.log(`  Skipped:   ${result.skipped.length}`);
  for (const item of result.skipped) {
    console.log(`    - ${item.transcriptId}: ${item.reason}`);
  }
  console.log(`✗ Failed:    ${result.failed.length}`);
  for (const item of result.failed) {
    console.log(`    - ${item.transcriptId}: ${item.reason} (${item.error})`);
  }
  if (result.cancelled.length > 0) {
    console.log(`  Cancelled: ${result.cancelled.length}`);
  }
}

reanalyzeAll()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error("\n✗ Error:", error);
    process.exit(1);
  });
