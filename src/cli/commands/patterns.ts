/**
 * patterns command - list, add, remove and validate pattern rules
 */

import * as path from "node:path";
import chalk from "chalk";
import {
  locateConfigFile,
  readConfigFile,
  validateConfigDocument,
  writeConfigFile,
} from "../../core/config/config-loader.js";
import { addPatternRule, removePatternRule } from "../../core/config/pattern-editor.js";
import { ConfigurationError, ErrorCode } from "../../core/errors.js";
import { getWorkingRoot } from "../../utils/index.js";
import { loadConfigForCommand, reportFailure, type ConfigOption } from "../shared.js";

export interface AddPatternCommandOptions extends ConfigOption {
  schema?: string;
  description?: string;
  first?: boolean;
}

export async function listPatternsCommand(options: ConfigOption): Promise<void> {
  try {
    const { config, path: configPath } = await loadConfigForCommand(options);
    console.log(chalk.dim(`Rules from ${configPath}, first match wins:`));
    console.log();
    config.patterns.forEach((rule, index) => {
      const schema = rule.destination.schema ? chalk.dim(` (schema ${rule.destination.schema})`) : "";
      console.log(`  ${String(index + 1).padStart(2)}. ${chalk.cyan(rule.pattern)} → ${rule.destination.name}${schema}`);
      if (rule.destination.description) {
        console.log(`      ${chalk.dim(rule.destination.description)}`);
      }
    });
  } catch (error) {
    reportFailure(error);
  }
}

export async function addPatternCommand(
  pattern: string,
  destination: string,
  options: AddPatternCommandOptions
): Promise<void> {
  try {
    const loaded = await loadConfigForCommand(options);
    const result = addPatternRule(
      loaded.document,
      { pattern, destination, schema: options.schema, description: options.description },
      { first: options.first }
    );
    if (!result.ok) {
      reportFailure(result.error);
      return;
    }
    await writeConfigFile(loaded.path, result.value);
    const position = options.first ? "first (highest priority)" : "last (lowest priority)";
    console.log(chalk.green(`Added "${pattern}" → ${destination} as ${position}`));
  } catch (error) {
    reportFailure(error);
  }
}

export async function removePatternCommand(pattern: string, options: ConfigOption): Promise<void> {
  try {
    const loaded = await loadConfigForCommand(options);
    const result = removePatternRule(loaded.document, pattern);
    if (!result.ok) {
      reportFailure(result.error);
      return;
    }
    await writeConfigFile(loaded.path, result.value);
    console.log(chalk.green(`Removed "${pattern}"`));
  } catch (error) {
    reportFailure(error);
  }
}

/**
 * Validates the file as it is on disk; never writes defaults.
 */
export async function validatePatternsCommand(options: ConfigOption): Promise<void> {
  const root = getWorkingRoot();
  const configPath = options.config ? path.resolve(root, options.config) : locateConfigFile(root);
  if (!configPath) {
    reportFailure(new ConfigurationError("No configuration file found", ErrorCode.CONFIG_NOT_FOUND));
    return;
  }

  try {
    const result = validateConfigDocument(await readConfigFile(configPath), configPath);
    if (!result.ok) {
      reportFailure(result.error);
      return;
    }
    console.log(chalk.green(`${configPath} is valid (${result.value.patterns.length} pattern rules)`));
  } catch (error) {
    reportFailure(error);
  }
}
