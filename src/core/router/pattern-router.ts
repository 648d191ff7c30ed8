/**
 * Pattern Router
 *
 * Maps a file path to its destination by ordered, case-insensitive substring
 * rules. Pure: the same rules and path always give the same answer, so the
 * router can be rebuilt from a reloaded Config and re-asked at any time.
 *
 * @module
 */

import type { Destination, PatternRule } from "../config/models/config.js";
import { normalizePath } from "../../utils/fs.js";

/**
 * The rule that routed a path, for `classify` output and logs
 */
export interface RouteMatch {
  ruleIndex: number;
  rule: PatternRule;
  normalizedPath: string;
}

export class PatternRouter {
  private readonly rules: readonly PatternRule[];

  constructor(rules: readonly PatternRule[]) {
    // Rules from Config are already lower-cased; rules built by hand may not be.
    this.rules = rules.map((rule) => ({ ...rule, pattern: rule.pattern.toLowerCase() }));
  }

  /**
   * Destination of the first rule whose pattern occurs in the normalized path,
   * or null when no rule matches.
   */
  classify(filePath: string): Destination | null {
    return this.explain(filePath)?.rule.destination ?? null;
  }

  explain(filePath: string): RouteMatch | null {
    const normalizedPath = normalizePath(filePath);
    for (let ruleIndex = 0; ruleIndex < this.rules.length; ruleIndex++) {
      const rule = this.rules[ruleIndex];
      if (rule && normalizedPath.includes(rule.pattern)) {
        return { ruleIndex, rule, normalizedPath };
      }
    }
    return null;
  }

  get ruleCount(): number {
    return this.rules.length;
  }
}

/**
 * One-shot form of {@link PatternRouter.classify}
 */
export function classify(filePath: string, rules: readonly PatternRule[]): Destination | null {
  return new PatternRouter(rules).classify(filePath);
}
