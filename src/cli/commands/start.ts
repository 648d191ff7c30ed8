/**
 * start command - run the watcher until interrupted
 */

import chalk from "chalk";
import ora from "ora";
import { createIngestWatcher } from "../../core/app.js";
import { createDispatchClient } from "../../core/dispatch/factory.js";
import { loadConfig, type LoadedConfig } from "../../core/config/config-loader.js";
import type { WatchPipeline } from "../../core/pipeline/watch-pipeline.js";
import type { TickSummary } from "../../core/scanner/models/scan-models.js";
import { configureLogging, createLogger } from "../../utils/logger.js";
import { loadConfigForCommand, reportFailure, type ConfigOption } from "../shared.js";
import { onShutdown } from "../shutdown.js";

export interface StartOptions extends ConfigOption {
  debug?: boolean;
  once?: boolean;
}

export function formatTickSummary(summary: TickSummary): string {
  return (
    `scanned ${summary.scanned}, new ${summary.newFiles}, modified ${summary.modified}, ` +
    `stable ${summary.stable}, dispatched ${summary.dispatched}, failed ${summary.failed}, ` +
    `ignored ${summary.ignored}, errors ${summary.errors} (${summary.durationMs}ms)`
  );
}

/**
 * Discovery pass, then a dispatch pass: a file is never dispatched on the tick
 * that first sees it, so files already settled go out on the second tick.
 */
export async function runOnce(pipeline: Pick<WatchPipeline, "tick">): Promise<TickSummary> {
  const discovery = await pipeline.tick();
  const dispatch = await pipeline.tick();
  return {
    ...dispatch,
    scanned: Math.max(discovery.scanned, dispatch.scanned),
    newFiles: discovery.newFiles + dispatch.newFiles,
    modified: discovery.modified + dispatch.modified,
    ignored: discovery.ignored + dispatch.ignored,
    errors: discovery.errors + dispatch.errors,
    durationMs: discovery.durationMs + dispatch.durationMs,
  };
}

export async function startCommand(options: StartOptions): Promise<void> {
  let loaded: LoadedConfig;
  try {
    loaded = await loadConfigForCommand(options);
  } catch (error) {
    reportFailure(error);
    return;
  }

  const { config } = loaded;
  configureLogging({
    level: options.debug ? "debug" : config.logging.level,
    enableFileLogging: config.logging.fileLogging,
    logDir: config.logging.logDir,
    pretty: process.stdout.isTTY === true,
  });
  const logger = createLogger("cli");
  const watcher = createIngestWatcher(config);

  watcher.pipeline.events.on("dispatched", (record) => {
    console.log(chalk.green(`  → ${record.fileName}`), chalk.dim(`→ ${record.destination} (${record.correlationId})`));
  });
  watcher.pipeline.events.on("dispatch:failed", (record) => {
    console.log(chalk.red(`  ✗ ${record.fileName}`), chalk.dim(record.error ?? ""));
  });

  if (options.once) {
    const spinner = ora("Scanning watch paths...").start();
    try {
      const summary = await runOnce(watcher.pipeline);
      spinner.succeed(formatTickSummary(summary));
    } catch (error) {
      spinner.fail(chalk.red("Scan failed"));
      reportFailure(error);
    } finally {
      await watcher.stop();
    }
    return;
  }

  const spinner = ora("Starting watcher...").start();
  try {
    await watcher.start();
  } catch (error) {
    spinner.fail(chalk.red("Failed to start watcher"));
    await watcher.stop();
    reportFailure(error);
    return;
  }
  onShutdown(() => watcher.stop());

  spinner.succeed(chalk.green(`Watching ${config.watcher.watchPaths.length} path(s)`));
  console.log();
  for (const watchPath of config.watcher.watchPaths) {
    console.log(`  ${chalk.dim("path")}      ${watchPath}`);
  }
  console.log(`  ${chalk.dim("patterns")}  ${config.patterns.length}`);
  console.log(`  ${chalk.dim("dispatch")}  ${config.dispatch.strategy} → ${config.dispatch.taskName}`);
  if (config.completion.enabled) {
    console.log(`  ${chalk.dim("callback")}  http://${config.completion.host}:${config.completion.port}/processing_complete`);
  }
  if (options.debug) {
    console.log(chalk.yellow("\nDebug mode enabled - verbose logging active"));
  }
  console.log(chalk.dim("\nPress Ctrl+C to stop. Send SIGHUP to reload the configuration."));

  process.on("SIGHUP", () => {
    void reload();
  });

  async function reload(): Promise<void> {
    try {
      const next = await loadConfig({ configPath: loaded.path });
      await watcher.pipeline.reload(next.config, createDispatchClient(next.config.dispatch));
      console.log(chalk.cyan(`Configuration reloaded (${next.config.patterns.length} patterns)`));
    } catch (error) {
      logger.error({ err: error }, "Configuration reload failed; keeping the previous configuration");
      console.error(chalk.red(`Reload failed: ${error instanceof Error ? error.message : String(error)}`));
    }
  }
}
