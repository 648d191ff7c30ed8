/**
 * Configuration Schemas
 *
 * Zod schemas for the configuration file (snake_case, as written on disk) and
 * the immutable runtime `Config` (camelCase, absolute paths, milliseconds)
 * handed to every component.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// File Schema
// =============================================================================

export const DEFAULT_SUPPORTED_EXTENSIONS = [".csv", ".xlsx", ".xls", ".xlsm"];
export const DEFAULT_IGNORE_PATTERNS = ["**/~$*", "**/.~lock.*"];
export const DEFAULT_TASK_NAME = "etl_processor.enhanced_tasks.process_excel_file";

/**
 * One ordered routing rule
 */
export const PatternRuleSchema = z
  .object({
    pattern: z.string().trim().min(1, "pattern must not be empty"),
    destination: z
      .string()
      .trim()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "destination must be an identifier (letters, digits, underscore)"),
    schema: z.string().trim().min(1).nullish(),
    description: z.string().nullish(),
  })
  .strict();

export type PatternRuleDocument = z.infer<typeof PatternRuleSchema>;

export const WatcherSettingsSchema = z
  .object({
    watch_paths: z.array(z.string().trim().min(1)).min(1, "at least one watch path is required"),
    poll_interval_seconds: z.number().positive().default(10),
    stability_delay_seconds: z.number().nonnegative().default(2),
    process_delay_seconds: z.number().nonnegative().default(0),
    max_file_size_mb: z.number().positive().default(100),
    supported_extensions: z
      .array(z.string().regex(/^\.[A-Za-z0-9]+$/, "extensions must look like .csv"))
      .min(1)
      .default(DEFAULT_SUPPORTED_EXTENSIONS),
    ignore_existing_on_startup: z.boolean().default(false),
    ignore_patterns: z.array(z.string().min(1)).default(DEFAULT_IGNORE_PATTERNS),
  })
  .strict();

export const DispatchStrategySchema = z.enum(["raw-envelope", "structured"]);
export type DispatchStrategy = z.infer<typeof DispatchStrategySchema>;

export const DispatchSettingsSchema = z
  .object({
    strategy: DispatchStrategySchema.default("raw-envelope"),
    task_name: z.string().trim().min(1).default(DEFAULT_TASK_NAME),
    queue: z.string().trim().min(1).default("celery"),
    broker_url: z.string().url().default("redis://localhost:6379/0"),
    api_url: z.string().url().default("http://localhost:5555"),
    api_username: z.string().nullish(),
    api_password: z.string().nullish(),
    source_tag: z.string().trim().min(1).default("ingest-watch"),
    timeout_seconds: z.number().positive().default(10),
  })
  .strict();

export const CompletionSettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(1).max(65535).default(5000),
  })
  .strict();

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export const LoggingSettingsSchema = z
  .object({
    level: LogLevelSchema.default("info"),
    file_logging: z.boolean().default(false),
    log_dir: z.string().min(1).default("./logs"),
  })
  .strict();

/**
 * The whole configuration file
 */
export const ConfigDocumentSchema = z
  .object({
    watcher: WatcherSettingsSchema,
    patterns: z.array(PatternRuleSchema).min(1, "at least one pattern rule is required"),
    dispatch: DispatchSettingsSchema.default({}),
    completion: CompletionSettingsSchema.default({}),
    logging: LoggingSettingsSchema.default({}),
  })
  .strict()
  .superRefine((doc, ctx) => {
    const seen = new Map<string, number>();
    doc.patterns.forEach((rule, index) => {
      const key = rule.pattern.toLowerCase();
      const first = seen.get(key);
      if (first !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["patterns", index, "pattern"],
          message: `duplicate pattern "${rule.pattern}" (already declared at patterns.${first})`,
        });
      } else {
        seen.set(key, index);
      }
    });
  });

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
export type ConfigDocumentInput = z.input<typeof ConfigDocumentSchema>;

// =============================================================================
// Runtime Config
// =============================================================================

/**
 * Where a matched file goes
 */
export interface Destination {
  /** Target identifier, e.g. a table name */
  readonly name: string;
  readonly schema?: string;
  readonly description?: string;
}

export interface PatternRule {
  /** Lower-cased substring matched against normalized paths */
  readonly pattern: string;
  readonly destination: Destination;
}

export interface WatcherSettings {
  /** Absolute watch roots */
  readonly watchPaths: readonly string[];
  readonly pollIntervalMs: number;
  readonly stabilityDelayMs: number;
  readonly processDelayMs: number;
  readonly maxFileSizeMb: number;
  readonly maxFileSizeBytes: number;
  /** Lower case, leading dot */
  readonly supportedExtensions: readonly string[];
  readonly ignoreExistingOnStartup: boolean;
  readonly ignorePatterns: readonly string[];
}

export interface DispatchSettings {
  readonly strategy: DispatchStrategy;
  readonly taskName: string;
  readonly queue: string;
  readonly brokerUrl: string;
  readonly apiUrl: string;
  readonly apiUsername?: string;
  readonly apiPassword?: string;
  readonly sourceTag: string;
  readonly timeoutMs: number;
}

export interface CompletionSettings {
  readonly enabled: boolean;
  readonly host: string;
  readonly port: number;
}

export interface LoggingSettings {
  readonly level: z.infer<typeof LogLevelSchema>;
  readonly fileLogging: boolean;
  /** Absolute */
  readonly logDir: string;
}

/**
 * Validated, frozen settings passed explicitly into every component
 */
export interface Config {
  readonly watcher: WatcherSettings;
  readonly patterns: readonly PatternRule[];
  readonly dispatch: DispatchSettings;
  readonly completion: CompletionSettings;
  readonly logging: LoggingSettings;
  /** File the config was loaded from, if any */
  readonly sourcePath?: string;
}
