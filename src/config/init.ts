/**
 * Application Initialization
 * Loads and validates the theology configuration before anything is scored.
 *
 * Note: Schema migrations should be run separately via:
 *   npx supabase db push
 */

import { THEOLOGY_CONFIG_PATH } from "./env.js";
import { loadTheologyConfigFile } from "./theology.js";
import type { TheologyConfig } from "../services/business/brain/types.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<TheologyConfig> {
  console.log("Initializing application...");

  try {
    const config = await loadTheologyConfigFile(THEOLOGY_CONFIG_PATH);
    console.log(
      `✓ Theology configuration ${config.lexicon.version} loaded ` +
        `(${config.lexicon.categories.length} categories, ${config.lexicon.axes.length} axes)`
    );
    console.log("✓ Application initialized successfully\n");
    return config;
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
