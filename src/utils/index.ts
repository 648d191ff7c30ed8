/**
 * Shared utilities
 */

import * as path from "node:path";

export * from "./logger.js";
export * from "./fs.js";
export * from "./async.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_BASENAME = "ingest-watch";
export const CONFIG_DIR = "config";

export function getWorkingRoot(): string {
  return process.cwd();
}

/**
 * Locations searched for a configuration file, in priority order
 */
export function getConfigCandidates(root: string = getWorkingRoot()): string[] {
  return [
    path.join(root, `${CONFIG_BASENAME}.yaml`),
    path.join(root, `${CONFIG_BASENAME}.yml`),
    path.join(root, `${CONFIG_BASENAME}.json`),
    path.join(root, CONFIG_DIR, `${CONFIG_BASENAME}.yaml`),
    path.join(root, CONFIG_DIR, `${CONFIG_BASENAME}.json`),
  ];
}

/**
 * Where the documented default configuration is written when none exists
 */
export function getDefaultConfigPath(root: string = getWorkingRoot()): string {
  return path.join(root, CONFIG_DIR, `${CONFIG_BASENAME}.yaml`);
}
