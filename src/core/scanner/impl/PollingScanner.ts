/**
 * Polling Scanner
 *
 * One pass over every watch root per tick. Decides which files are new,
 * modified, stable or excluded, and records that in the State Tracker. The
 * scanner never dispatches; it hands stable files back to the pipeline.
 *
 * @module
 */

import type { Config } from "../../config/models/config.js";
import type { IStateTracker } from "../../state/interfaces/IStateTracker.js";
import type { IFileSource } from "../interfaces/IFileSource.js";
import { emptyTickSummary, type ScanOutcome, type StableFile } from "../models/scan-models.js";
import { checkStability } from "../stability.js";
import { PatternRouter } from "../../router/pattern-router.js";
import { errorMessage } from "../../errors.js";
import { sleep as defaultSleep, type SleepFn } from "../../../utils/async.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import type { FileStats } from "../../../utils/fs.js";

// =============================================================================
// Types
// =============================================================================

export interface PollingScannerOptions {
  /** Settle pause between the two stats of a candidate */
  sleep?: SleepFn;
  logger?: Logger;
  now?: () => number;
}

// =============================================================================
// Polling Scanner
// =============================================================================

export class PollingScanner {
  private readonly source: IFileSource;
  private readonly tracker: IStateTracker;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;
  private readonly now: () => number;
  private completedScans = 0;

  constructor(source: IFileSource, tracker: IStateTracker, options: PollingScannerOptions = {}) {
    this.source = source;
    this.tracker = tracker;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger("scanner");
    this.now = options.now ?? Date.now;
  }

  get scanCount(): number {
    return this.completedScans;
  }

  /**
   * Runs one pass with the given config. The config is used as-is for the
   * whole pass; a reload takes effect on the next call.
   */
  async scan(config: Config): Promise<ScanOutcome> {
    const startedAt = this.now();
    const summary = emptyTickSummary();
    const stable: StableFile[] = [];
    const modified: string[] = [];
    const router = new PatternRouter(config.patterns);
    const baseline = this.completedScans === 0 && config.watcher.ignoreExistingOnStartup;

    const paths = await this.listAll(config);
    summary.scanned = paths.length;

    for (const filePath of paths) {
      let stats: FileStats;
      try {
        stats = await this.source.stat(filePath);
      } catch (error) {
        summary.errors++;
        this.logger.warn({ path: filePath, error: errorMessage(error) }, "Failed to stat file; skipping this tick");
        continue;
      }
      if (!stats.isFile) continue;

      if (baseline && this.tracker.get(filePath) === undefined) {
        this.tracker.observe(filePath, stats.mtimeMs, stats.size);
        this.tracker.markIgnored(filePath, "baseline");
        summary.ignored++;
        this.logger.debug({ path: filePath, outcome: "baseline" }, "Existing file ignored at startup");
        continue;
      }

      const transition = this.tracker.observe(filePath, stats.mtimeMs, stats.size);

      switch (transition.kind) {
        case "excluded":
          break;

        case "new": {
          const destination = router.classify(filePath);
          if (!destination) {
            this.tracker.markIgnored(filePath, "no-match");
            summary.ignored++;
            this.logger.info({ path: filePath, outcome: "no-match" }, "No pattern matched; file ignored");
            break;
          }
          if (this.exceedsLimit(stats, config)) {
            this.markTooLarge(filePath, stats, config);
            summary.ignored++;
            break;
          }
          summary.newFiles++;
          this.logger.info({ path: filePath, destination: destination.name }, "New file detected");
          break;
        }

        case "modified":
          summary.modified++;
          modified.push(filePath);
          this.logger.info(
            { path: filePath, previousStatus: transition.previousStatus },
            "Modified file detected"
          );
          if (this.exceedsLimit(stats, config)) {
            this.markTooLarge(filePath, stats, config);
            summary.ignored++;
          }
          break;

        case "unchanged": {
          if (transition.file.status !== "candidate" || stats.size === 0) break;

          const result = await checkStability(
            this.source,
            filePath,
            { mtimeMs: stats.mtimeMs, size: stats.size },
            config.watcher.stabilityDelayMs,
            this.sleep
          );

          if (result.kind === "error") {
            summary.errors++;
            this.logger.warn({ path: filePath, error: result.reason }, "Stability check failed");
            break;
          }
          if (result.kind === "not-ready") {
            this.logger.debug({ path: filePath, reason: result.reason }, "File not ready");
            break;
          }

          const destination = router.classify(filePath);
          if (!destination) {
            this.tracker.markIgnored(filePath, "no-match");
            summary.ignored++;
            this.logger.info({ path: filePath, outcome: "no-match" }, "No pattern matched; file ignored");
            break;
          }
          if (this.tracker.markStable(filePath, stats.mtimeMs)) {
            summary.stable++;
            stable.push({ path: filePath, mtimeMs: stats.mtimeMs, size: stats.size, destination });
          }
          break;
        }
      }
    }

    this.completedScans++;
    summary.durationMs = this.now() - startedAt;
    return { stable, modified, summary };
  }

  private async listAll(config: Config): Promise<string[]> {
    const seen = new Set<string>();
    const options = {
      extensions: config.watcher.supportedExtensions,
      ignore: config.watcher.ignorePatterns,
    };

    for (const root of config.watcher.watchPaths) {
      if (!(await this.source.rootExists(root))) {
        this.logger.warn({ root }, "Watch path does not exist; skipping");
        continue;
      }
      try {
        for (const filePath of await this.source.list(root, options)) {
          seen.add(filePath);
        }
      } catch (error) {
        this.logger.error({ root, error: errorMessage(error) }, "Failed to list watch path");
      }
    }
    return [...seen];
  }

  private exceedsLimit(stats: FileStats, config: Config): boolean {
    return stats.size > config.watcher.maxFileSizeBytes;
  }

  private markTooLarge(filePath: string, stats: FileStats, config: Config): void {
    this.tracker.markIgnored(filePath, "too-large");
    this.logger.warn(
      { path: filePath, size: stats.size, limitMb: config.watcher.maxFileSizeMb, outcome: "too-large" },
      "File exceeds size limit; ignored until modified"
    );
  }
}
