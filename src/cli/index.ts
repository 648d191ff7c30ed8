#!/usr/bin/env node

/**
 * ingest-watch CLI
 * Runs the watcher and manages its configuration
 */

import { Command } from "commander";
import chalk from "chalk";
import { startCommand } from "./commands/start.js";
import { statusCommand } from "./commands/status.js";
import {
  addPatternCommand,
  listPatternsCommand,
  removePatternCommand,
  validatePatternsCommand,
} from "./commands/patterns.js";
import { classifyCommand } from "./commands/classify.js";
import { runShutdownHooks } from "./shutdown.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("ingest-watch")
  .description("Watches folders for data files and queues each stable file once for ingestion")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("start")
  .description("Start watching and dispatching")
  .option("-c, --config <path>", "Configuration file")
  .option("-d, --debug", "Enable debug logging")
  .option("--once", "Scan twice (discover, then dispatch settled files) and exit")
  .action(startCommand);

program
  .command("status")
  .description("Show configuration and processing counts")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Show per-status counts, rules and recent dispatches")
  .action(statusCommand);

const patterns = program.command("patterns").description("Manage pattern rules");

patterns
  .command("list")
  .description("List rules in priority order")
  .option("-c, --config <path>", "Configuration file")
  .action(listPatternsCommand);

patterns
  .command("add <pattern> <destination>")
  .description("Add a rule (lowest priority unless --first)")
  .option("-c, --config <path>", "Configuration file")
  .option("-s, --schema <schema>", "Destination schema")
  .option("--description <text>", "Free-text description")
  .option("--first", "Insert as the highest-priority rule")
  .action(addPatternCommand);

patterns
  .command("remove <pattern>")
  .description("Remove a rule")
  .option("-c, --config <path>", "Configuration file")
  .action(removePatternCommand);

patterns
  .command("validate")
  .description("Validate the configuration file")
  .option("-c, --config <path>", "Configuration file")
  .action(validatePatternsCommand);

program
  .command("classify <path>")
  .description("Show the destination a path routes to")
  .option("-c, --config <path>", "Configuration file")
  .action(classifyCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG) {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, shutting down gracefully...`));

  const forceExit = setTimeout(() => {
    logger.warn("Shutdown timeout, forcing exit");
    process.exit(1);
  }, 10000);
  forceExit.unref();

  const failures = await runShutdownHooks();
  for (const failure of failures) {
    logger.error({ err: failure }, "Shutdown step failed");
  }
  process.exit(failures.length > 0 ? 1 : 0);
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
