/**
 * Helpers shared by the CLI commands
 */

import chalk from "chalk";
import { ConfigurationError, IngestWatchError } from "../core/errors.js";
import { loadConfig, type LoadedConfig } from "../core/config/config-loader.js";

export interface ConfigOption {
  config?: string;
}

export async function loadConfigForCommand(options: ConfigOption): Promise<LoadedConfig> {
  const loaded = await loadConfig({ configPath: options.config });
  if (loaded.created) {
    console.log(chalk.yellow(`No configuration found; wrote defaults to ${loaded.path}`));
  }
  return loaded;
}

/**
 * Prints a startup failure and marks the process as failed
 */
export function reportFailure(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(error.toString()));
  } else if (error instanceof IngestWatchError) {
    console.error(chalk.red(`[${error.code}] ${error.message}`));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  process.exitCode = 1;
}
