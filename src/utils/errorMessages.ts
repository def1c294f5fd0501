/**
 * Error Message Utility
 * Converts technical errors into short per-item reasons for batch summaries
 */

import { ConfigError, EmptyInputError, NotFoundError, PersistenceError } from "./errors.js";

/**
 * Converts technical error to generic user-friendly message
 */
export function getGenericErrorMessage(error: unknown): string {
  if (error instanceof EmptyInputError) {
    return 'Transcript is empty';
  }
  if (error instanceof NotFoundError) {
    return 'Transcript not found';
  }
  if (error instanceof PersistenceError) {
    return 'Storage failed';
  }
  if (error instanceof ConfigError) {
    return 'Invalid theology configuration';
  }

  const errorStr = String(error).toLowerCase();

  if (errorStr.includes('timeout') || errorStr.includes('timed out')) {
    return 'Processing timeout';
  }
  if (errorStr.includes('supabase') || errorStr.includes('fetch failed') || errorStr.includes('econnrefused')) {
    return 'Storage unreachable';
  }

  // Generic fallback
  return 'Analysis failed';
}
