/**
 * Configuration Loader
 *
 * Finds, parses and validates the configuration file, writing a documented
 * default when none exists. Produces the frozen runtime `Config`.
 *
 * @module
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";
import {
  ConfigDocumentSchema,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_SUPPORTED_EXTENSIONS,
  DEFAULT_TASK_NAME,
  type Config,
  type ConfigDocument,
  type ConfigDocumentInput,
} from "./models/config.js";
import { ConfigurationError, ErrorCode, errorMessage } from "../errors.js";
import { err, ok, unwrap, type Result } from "../../types/result.js";
import {
  createLogger,
  fileExistsSync,
  getConfigCandidates,
  getDefaultConfigPath,
  getWorkingRoot,
  writeFile,
} from "../../utils/index.js";

export type ConfigFormat = "yaml" | "json";

export interface ConfigSourceOptions {
  /** Relative watch paths and log dir resolve against this directory (default: cwd) */
  baseDir?: string;
  sourcePath?: string;
}

export interface LoadConfigOptions {
  /** Explicit file; created with defaults when missing */
  configPath?: string;
  /** Directory searched for a config file (default: cwd) */
  root?: string;
}

export interface LoadedConfig {
  config: Config;
  document: ConfigDocument;
  path: string;
  format: ConfigFormat;
  /** True when the default file was written by this call */
  created: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG_DOCUMENT: ConfigDocumentInput = {
  watcher: {
    watch_paths: ["./watch"],
    poll_interval_seconds: 10,
    stability_delay_seconds: 2,
    process_delay_seconds: 0,
    max_file_size_mb: 100,
    supported_extensions: DEFAULT_SUPPORTED_EXTENSIONS,
    ignore_existing_on_startup: false,
    ignore_patterns: DEFAULT_IGNORE_PATTERNS,
  },
  patterns: [
    { pattern: "tel_list", destination: "dim_numbers", schema: "public", description: "Telephone numbers and contact information" },
    { pattern: "customer_data", destination: "dim_customers", schema: "public", description: "Customer master data" },
    { pattern: "product_info", destination: "dim_products", schema: "public", description: "Product information and catalog" },
    { pattern: "sales_data", destination: "fact_sales", schema: "public", description: "Sales transaction data" },
    { pattern: "inventory", destination: "dim_inventory", schema: "public", description: "Inventory levels and stock data" },
    { pattern: "transactions", destination: "fact_transactions", schema: "public", description: "Financial transaction records" },
    { pattern: "reports", destination: "staging_reports", schema: "staging", description: "Temporary report staging area" },
  ],
  dispatch: {
    strategy: "raw-envelope",
    task_name: DEFAULT_TASK_NAME,
    queue: "celery",
    broker_url: "redis://localhost:6379/0",
    api_url: "http://localhost:5555",
    source_tag: "ingest-watch",
    timeout_seconds: 10,
  },
  completion: {
    enabled: true,
    host: "127.0.0.1",
    port: 5000,
  },
  logging: {
    level: "info",
    file_logging: false,
    log_dir: "./logs",
  },
};

const DEFAULT_CONFIG_HEADER = `# ingest-watch configuration
#
# watcher.watch_paths            directories scanned recursively on every poll
# watcher.poll_interval_seconds  pause between the end of one scan and the start of the next
# watcher.stability_delay_seconds  settle pause before a file's size/mtime are re-checked
# watcher.process_delay_seconds  extra delay between a file becoming stable and its dispatch
# watcher.ignore_existing_on_startup  record files present at startup without dispatching them
# patterns                       ordered rules; the first case-insensitive substring match wins
# dispatch.strategy              raw-envelope (LPUSH onto the broker list) or structured (task API)
# completion                     HTTP endpoint receiving worker completion callbacks
`;

// =============================================================================
// Validation
// =============================================================================

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Validates a raw document (parsed YAML/JSON) against the file schema
 */
export function validateConfigDocument(
  raw: unknown,
  sourcePath?: string
): Result<ConfigDocument, ConfigurationError> {
  const parsed = ConfigDocumentSchema.safeParse(raw);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issues = parsed.error.issues.map(formatIssue);
  return err(
    new ConfigurationError(`Invalid configuration (${issues.length} issue${issues.length === 1 ? "" : "s"})`, ErrorCode.CONFIG_INVALID, {
      configPath: sourcePath,
      issues,
    })
  );
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function normalizeExtension(extension: string): string {
  return extension.toLowerCase();
}

/**
 * Converts a validated document into the frozen runtime Config
 */
export function toConfig(document: ConfigDocument, options: ConfigSourceOptions = {}): Config {
  const baseDir = options.baseDir ?? getWorkingRoot();
  const { watcher, dispatch, completion, logging } = document;

  const config: Config = {
    watcher: {
      watchPaths: watcher.watch_paths.map((p) => path.resolve(baseDir, p)),
      pollIntervalMs: Math.round(watcher.poll_interval_seconds * 1000),
      stabilityDelayMs: Math.round(watcher.stability_delay_seconds * 1000),
      processDelayMs: Math.round(watcher.process_delay_seconds * 1000),
      maxFileSizeMb: watcher.max_file_size_mb,
      maxFileSizeBytes: Math.round(watcher.max_file_size_mb * 1024 * 1024),
      supportedExtensions: [...new Set(watcher.supported_extensions.map(normalizeExtension))],
      ignoreExistingOnStartup: watcher.ignore_existing_on_startup,
      ignorePatterns: [...watcher.ignore_patterns],
    },
    patterns: document.patterns.map((rule) => ({
      pattern: rule.pattern.toLowerCase(),
      destination: {
        name: rule.destination,
        ...(rule.schema ? { schema: rule.schema } : {}),
        ...(rule.description ? { description: rule.description } : {}),
      },
    })),
    dispatch: {
      strategy: dispatch.strategy,
      taskName: dispatch.task_name,
      queue: dispatch.queue,
      brokerUrl: dispatch.broker_url,
      apiUrl: dispatch.api_url.replace(/\/+$/, ""),
      ...(dispatch.api_username ? { apiUsername: dispatch.api_username } : {}),
      ...(dispatch.api_password ? { apiPassword: dispatch.api_password } : {}),
      sourceTag: dispatch.source_tag,
      timeoutMs: Math.round(dispatch.timeout_seconds * 1000),
    },
    completion: {
      enabled: completion.enabled,
      host: completion.host,
      port: completion.port,
    },
    logging: {
      level: logging.level,
      fileLogging: logging.file_logging,
      logDir: path.resolve(baseDir, logging.log_dir),
    },
    ...(options.sourcePath ? { sourcePath: options.sourcePath } : {}),
  };

  return deepFreeze(config);
}

/**
 * Validates and converts a raw document, throwing ConfigurationError on any issue
 */
export function parseConfig(raw: unknown, options: ConfigSourceOptions = {}): Config {
  const document = unwrap(validateConfigDocument(raw, options.sourcePath));
  return toConfig(document, options);
}

// =============================================================================
// File I/O
// =============================================================================

export function detectFormat(filePath: string): ConfigFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  if (ext === ".json") return "json";
  throw new ConfigurationError(`Unsupported config file format: ${ext || "(none)"}`, ErrorCode.CONFIG_UNSUPPORTED_FORMAT, {
    configPath: filePath,
  });
}

/**
 * Reads and parses a config file without validating it
 */
export async function readConfigFile(filePath: string): Promise<unknown> {
  const format = detectFormat(filePath);
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file: ${errorMessage(error)}`, ErrorCode.CONFIG_NOT_FOUND, {
      configPath: filePath,
    });
  }

  try {
    return format === "yaml" ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file: ${errorMessage(error)}`, ErrorCode.CONFIG_PARSE_FAILED, {
      configPath: filePath,
    });
  }
}

export function serializeConfigDocument(document: ConfigDocumentInput, format: ConfigFormat): string {
  if (format === "json") {
    return `${JSON.stringify(document, null, 2)}\n`;
  }
  return yaml.dump(document, { noRefs: true, lineWidth: 120, skipInvalid: true });
}

/**
 * Writes a document back in the file's own format
 */
export async function writeConfigFile(filePath: string, document: ConfigDocumentInput, header = ""): Promise<void> {
  const format = detectFormat(filePath);
  try {
    const body = serializeConfigDocument(document, format);
    await writeFile(filePath, format === "yaml" ? `${header}${body}` : body);
  } catch (error) {
    throw new ConfigurationError(`Cannot write config file: ${errorMessage(error)}`, ErrorCode.CONFIG_WRITE_FAILED, {
      configPath: filePath,
    });
  }
}

/**
 * Returns the first existing candidate, or null
 */
export function locateConfigFile(root: string = getWorkingRoot()): string | null {
  return getConfigCandidates(root).find((candidate) => fileExistsSync(candidate)) ?? null;
}

/**
 * Loads the configuration, creating the documented default when missing.
 *
 * @throws ConfigurationError when the file is unreadable or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const logger = createLogger("config");
  const root = options.root ?? getWorkingRoot();

  let configPath = options.configPath ? path.resolve(root, options.configPath) : locateConfigFile(root);
  let created = false;

  if (!configPath || !fileExistsSync(configPath)) {
    configPath = configPath ?? getDefaultConfigPath(root);
    await writeConfigFile(configPath, DEFAULT_CONFIG_DOCUMENT, DEFAULT_CONFIG_HEADER);
    created = true;
    logger.info({ configPath }, "Created default config file");
  }

  const raw = await readConfigFile(configPath);
  const document = unwrap(validateConfigDocument(raw, configPath));
  const config = toConfig(document, { baseDir: root, sourcePath: configPath });

  logger.debug({ configPath, patterns: config.patterns.length }, "Configuration loaded");

  return {
    config,
    document,
    path: configPath,
    format: detectFormat(configPath),
    created,
  };
}
