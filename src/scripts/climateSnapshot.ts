/**
 * Print the climate snapshot as JSON
 * Run with: npm run script:climate -- [days]
 */

import "dotenv/config";
import { initializeApp } from "../config/init.js";
import { supabaseBrainStore } from "../repositories/signatureRepository.js";
import { buildClimateSnapshot } from "../services/business/reportService.js";

async function climateSnapshot() {
  const days = parseInt(process.argv[2] || "30", 10);
  const config = await initializeApp();

  const snapshot = await buildClimateSnapshot({ store: supabaseBrainStore, config }, days);
  console.log(JSON.stringify(snapshot, null, 2));
}

climateSnapshot()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error("\n✗ Error:", error);
    process.exit(1);
  });
