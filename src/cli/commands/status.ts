/**
 * status command - configuration summary and counts from a running instance
 */

import chalk from "chalk";
import { z } from "zod";
import { summarizeConfig } from "../../core/config/config-summary.js";
import type { Config } from "../../core/config/models/config.js";
import { FILE_STATUSES } from "../../core/state/models/watched-file.js";
import { createLogger } from "../../utils/logger.js";
import type { LoadedConfig } from "../../core/config/config-loader.js";
import { loadConfigForCommand, reportFailure, type ConfigOption } from "../shared.js";

const logger = createLogger("status");

export interface StatusOptions extends ConfigOption {
  verbose?: boolean;
}

const RemoteStatusSchema = z.object({
  running: z.boolean(),
  uptimeSeconds: z.number(),
  ticks: z.number(),
  pendingDelayed: z.number(),
  state: z.object({
    queued: z.number(),
    processed: z.number(),
    total: z.number(),
    byStatus: z.record(z.number()),
  }),
  recentDispatches: z.array(
    z.object({
      fileName: z.string(),
      destination: z.string(),
      correlationId: z.string(),
      status: z.string(),
      dispatchedAt: z.number(),
    })
  ),
});

export type RemoteStatus = z.infer<typeof RemoteStatusSchema>;

/**
 * Loopback address for a bind host
 */
export function statusUrl(config: Config): string {
  const host = config.completion.host === "0.0.0.0" || config.completion.host === "::" ? "127.0.0.1" : config.completion.host;
  return `http://${host}:${config.completion.port}/status`;
}

export async function fetchRemoteStatus(url: string, timeoutMs = 2000): Promise<RemoteStatus | null> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) return null;
    const parsed = RemoteStatusSchema.safeParse(await response.json());
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logger.debug({ url, err: error }, "No running instance answered");
    return null;
  }
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  let loaded: LoadedConfig;
  try {
    loaded = await loadConfigForCommand(options);
  } catch (error) {
    reportFailure(error);
    return;
  }
  const { config } = loaded;
  const summary = summarizeConfig(config);

  console.log();
  console.log(chalk.cyan.bold("ingest-watch status"));
  console.log(chalk.dim("─".repeat(40)));

  console.log();
  console.log(chalk.white.bold("Configuration"));
  console.log(`  File:        ${chalk.dim(loaded.path)}`);
  console.log(`  Watch paths: ${summary.watchPaths.join(", ")}`);
  console.log(`  Poll:        every ${summary.pollIntervalSeconds}s, settle ${summary.stabilityDelaySeconds}s`);
  console.log(`  Extensions:  ${summary.supportedExtensions.join(", ")}`);
  console.log(`  Patterns:    ${summary.patternCount}`);
  console.log(`  Dispatch:    ${summary.strategy} → ${summary.target} (${summary.queue})`);

  if (options.verbose) {
    console.log();
    console.log(chalk.white.bold("Pattern rules"));
    config.patterns.forEach((rule, index) => {
      const schema = rule.destination.schema ? `${rule.destination.schema}.` : "";
      console.log(`  ${String(index + 1).padStart(2)}. ${rule.pattern} → ${schema}${rule.destination.name}`);
    });
  }

  console.log();
  console.log(chalk.white.bold("Processing"));
  if (!config.completion.enabled) {
    console.log(chalk.yellow("  Status endpoint disabled (completion.enabled is false)"));
    return;
  }

  const remote = await fetchRemoteStatus(statusUrl(config));
  if (!remote) {
    console.log(chalk.yellow("  Not running"));
    return;
  }

  console.log(`  Uptime:      ${remote.uptimeSeconds}s over ${remote.ticks} tick(s)`);
  console.log(`  Queued:      ${remote.state.queued}`);
  console.log(`  Processed:   ${remote.state.processed}`);
  console.log(`  Tracked:     ${remote.state.total}`);

  if (options.verbose) {
    console.log();
    console.log(chalk.white.bold("By status"));
    for (const status of FILE_STATUSES) {
      console.log(`  ${status.padEnd(12)} ${remote.state.byStatus[status] ?? 0}`);
    }
    if (remote.recentDispatches.length > 0) {
      console.log();
      console.log(chalk.white.bold("Recent dispatches"));
      for (const record of remote.recentDispatches) {
        const when = new Date(record.dispatchedAt).toISOString();
        console.log(`  ${chalk.dim(when)} ${record.fileName} → ${record.destination} [${record.status}]`);
      }
    }
  }
}
