/**
 * Flat view of a Config for `status` output and `GET /status`
 */

import type { Config, DispatchStrategy } from "./models/config.js";

export interface ConfigSummary {
  sourcePath?: string;
  watchPaths: string[];
  pollIntervalSeconds: number;
  stabilityDelaySeconds: number;
  processDelaySeconds: number;
  maxFileSizeMb: number;
  supportedExtensions: string[];
  ignoreExistingOnStartup: boolean;
  patternCount: number;
  strategy: DispatchStrategy;
  taskName: string;
  queue: string;
  /** Broker URL or task API URL, depending on strategy; credentials removed */
  target: string;
  completion: { enabled: boolean; host: string; port: number };
}

function redact(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = "***";
    return parsed.toString();
  } catch {
    return url;
  }
}

export function summarizeConfig(config: Config): ConfigSummary {
  const { watcher, dispatch, completion } = config;
  return {
    sourcePath: config.sourcePath,
    watchPaths: [...watcher.watchPaths],
    pollIntervalSeconds: watcher.pollIntervalMs / 1000,
    stabilityDelaySeconds: watcher.stabilityDelayMs / 1000,
    processDelaySeconds: watcher.processDelayMs / 1000,
    maxFileSizeMb: watcher.maxFileSizeMb,
    supportedExtensions: [...watcher.supportedExtensions],
    ignoreExistingOnStartup: watcher.ignoreExistingOnStartup,
    patternCount: config.patterns.length,
    strategy: dispatch.strategy,
    taskName: dispatch.taskName,
    queue: dispatch.queue,
    target: redact(dispatch.strategy === "raw-envelope" ? dispatch.brokerUrl : dispatch.apiUrl),
    completion: { enabled: completion.enabled, host: completion.host, port: completion.port },
  };
}
