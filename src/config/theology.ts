/**
 * Theology Configuration Loader
 * Reads the versioned JSON file and validates it. The result is passed
 * explicitly to services; nothing here caches it.
 */

import { readFile } from "fs/promises";
import { parseTheologyConfig } from "../services/business/brain/theologyConfig.js";
import type { TheologyConfig } from "../services/business/brain/types.js";
import { ConfigError } from "../utils/errors.js";

export const DEFAULT_THEOLOGY_CONFIG_URL = new URL("../../data/theology-config.json", import.meta.url);

export async function loadTheologyConfigFile(path?: string | URL): Promise<TheologyConfig> {
  const location = path ?? DEFAULT_THEOLOGY_CONFIG_URL;

  let raw: string;
  try {
    raw = await readFile(location, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read theology configuration at ${String(location)}`, [reason]);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Theology configuration at ${String(location)} is not valid JSON`, [reason]);
  }

  return parseTheologyConfig(document);
}
