/**
 * Pattern Rule Editing
 *
 * Pure edits of the `patterns` list of a config document, used by the
 * `patterns add|remove` commands. Every edit is re-validated as a whole
 * document before it is written back.
 */

import type { ConfigDocument, PatternRuleDocument } from "./models/config.js";
import { validateConfigDocument } from "./config-loader.js";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { err, type Result } from "../../types/result.js";

export interface AddPatternOptions {
  /** Insert at the top (highest priority) instead of the bottom */
  first?: boolean;
}

export function addPatternRule(
  document: ConfigDocument,
  rule: PatternRuleDocument,
  options: AddPatternOptions = {}
): Result<ConfigDocument, ConfigurationError> {
  const patterns = options.first ? [rule, ...document.patterns] : [...document.patterns, rule];
  return validateConfigDocument({ ...document, patterns });
}

export function removePatternRule(
  document: ConfigDocument,
  pattern: string
): Result<ConfigDocument, ConfigurationError> {
  const wanted = pattern.trim().toLowerCase();
  const patterns = document.patterns.filter((rule) => rule.pattern.toLowerCase() !== wanted);
  if (patterns.length === document.patterns.length) {
    return err(new ConfigurationError(`No pattern rule "${pattern}"`, ErrorCode.INVALID_ARGUMENT));
  }
  return validateConfigDocument({ ...document, patterns });
}
