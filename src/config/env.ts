/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if required variables are missing.
 */

/** Server configuration */
export const PORT = parseInt(process.env.PORT || "3000", 10);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Supabase configuration */
export const SUPABASE_URL = getRequiredEnv("SUPABASE_URL");
export const SUPABASE_SERVICE_ROLE_KEY = getRequiredEnv("SUPABASE_SERVICE_ROLE_KEY");

/** Redis configuration (BullMQ) */
export const REDIS_URL = getRequiredEnv("REDIS_URL");

/** Theology configuration file; defaults to data/theology-config.json */
export const THEOLOGY_CONFIG_PATH = process.env.THEOLOGY_CONFIG_PATH;

/** Worker pool size for the analyzeTranscript queue */
export const ANALYSIS_CONCURRENCY = parseInt(process.env.ANALYSIS_CONCURRENCY || "4", 10);

/** Schedule for the pending-analysis sweep (every 30 minutes by default) */
export const PENDING_SWEEP_CRON = process.env.PENDING_SWEEP_CRON || "*/30 * * * *";

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}
