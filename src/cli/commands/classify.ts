/**
 * classify command - show where a path would be routed
 */

import chalk from "chalk";
import { PatternRouter } from "../../core/router/pattern-router.js";
import type { LoadedConfig } from "../../core/config/config-loader.js";
import { loadConfigForCommand, reportFailure, type ConfigOption } from "../shared.js";

export async function classifyCommand(filePath: string, options: ConfigOption): Promise<void> {
  let loaded: LoadedConfig;
  try {
    loaded = await loadConfigForCommand(options);
  } catch (error) {
    reportFailure(error);
    return;
  }

  const match = new PatternRouter(loaded.config.patterns).explain(filePath);
  if (!match) {
    console.log(chalk.yellow(`${filePath}: no pattern matched; the file would be ignored`));
    return;
  }

  const { destination } = match.rule;
  const schema = destination.schema ? `${destination.schema}.` : "";
  console.log(
    `${filePath} → ${chalk.cyan(`${schema}${destination.name}`)}`,
    chalk.dim(`(rule ${match.ruleIndex + 1}: "${match.rule.pattern}")`)
  );
}
