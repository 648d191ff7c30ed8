/**
 * Watch Pipeline
 *
 * The poll loop. Each tick scans, dispatches stable files (or schedules them
 * when a process delay is set), then drains due delayed dispatches. The next
 * tick is scheduled only after the previous one finishes, so ticks never
 * overlap.
 *
 * @module
 */

import type { Config } from "../config/models/config.js";
import { ConfigHolder } from "../config/config-holder.js";
import { summarizeConfig } from "../config/config-summary.js";
import type { IStateTracker } from "../state/interfaces/IStateTracker.js";
import type { IDispatchClient } from "../dispatch/interfaces/IDispatchClient.js";
import { DispatchLog } from "../dispatch/dispatch-log.js";
import type { IProcessingEventLog } from "../history/processing-event-log.js";
import { PollingScanner } from "../scanner/impl/PollingScanner.js";
import type { IFileSource } from "../scanner/interfaces/IFileSource.js";
import { DelayedDispatchScheduler } from "../scanner/delayed-dispatch.js";
import type { StableFile, TickSummary } from "../scanner/models/scan-models.js";
import { CompletionListener } from "../completion/impl/CompletionListener.js";
import { Dispatcher, type DispatchOutcome } from "./dispatcher.js";
import type { PipelineEvents } from "./pipeline-events.js";
import type { StatusReport, StatusSource } from "./status.js";
import { toError, type DispatchError } from "../errors.js";
import { partition, type Result } from "../../types/result.js";
import { EventBus } from "../../utils/events.js";
import type { SleepFn } from "../../utils/async.js";
import { createLogger, type Logger } from "../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export interface WatchPipelineDeps {
  config: Config;
  source: IFileSource;
  tracker: IStateTracker;
  client: IDispatchClient;
  eventLog: IProcessingEventLog;
  dispatchLog?: DispatchLog;
  events?: EventBus<PipelineEvents>;
  logger?: Logger;
  /** Settle pause inside a tick */
  sleep?: SleepFn;
  now?: () => number;
}

// =============================================================================
// Watch Pipeline
// =============================================================================

export class WatchPipeline implements StatusSource {
  readonly events: EventBus<PipelineEvents>;
  readonly completions: CompletionListener;
  readonly dispatchLog: DispatchLog;

  private readonly configHolder: ConfigHolder;
  private readonly tracker: IStateTracker;
  private readonly scanner: PollingScanner;
  private readonly dispatcher: Dispatcher;
  private readonly scheduler = new DelayedDispatchScheduler();
  private readonly logger: Logger;
  private readonly now: () => number;

  private client: IDispatchClient;
  private running = false;
  private stopped = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<TickSummary> | null = null;
  private startedAt?: number;
  private tickCount = 0;
  private lastTick?: TickSummary;
  /** Set by a reload; no-match exclusions are cleared when the next tick starts */
  private rulesChanged = false;

  constructor(deps: WatchPipelineDeps) {
    this.configHolder = new ConfigHolder(deps.config);
    this.configHolder.onSwap(() => {
      this.rulesChanged = true;
    });
    this.tracker = deps.tracker;
    this.client = deps.client;
    this.events = deps.events ?? new EventBus<PipelineEvents>();
    this.dispatchLog = deps.dispatchLog ?? new DispatchLog();
    this.logger = deps.logger ?? createLogger("pipeline");
    this.now = deps.now ?? Date.now;

    this.events.onHandlerError = (error, event) => {
      this.logger.warn({ err: toError(error), event }, "Event subscriber threw");
    };

    this.scanner = new PollingScanner(deps.source, deps.tracker, {
      sleep: deps.sleep,
      logger: this.logger.child({ component: "scanner" }),
      now: this.now,
    });
    this.dispatcher = new Dispatcher(deps.client, deps.tracker, this.dispatchLog, deps.eventLog, {
      logger: this.logger.child({ component: "dispatch" }),
      events: this.events,
      now: this.now,
    });
    this.completions = new CompletionListener(deps.tracker, this.dispatchLog, deps.eventLog, {
      logger: this.logger.child({ component: "completion" }),
      events: this.events,
      now: this.now,
    });
  }

  get config(): Config {
    return this.configHolder.current;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Runs the first tick immediately and keeps polling until {@link stop}.
   */
  async start(): Promise<void> {
    if (this.running || this.stopped) return;
    this.running = true;
    this.startedAt = this.now();
    this.logger.info(
      {
        watchPaths: this.config.watcher.watchPaths,
        pollIntervalMs: this.config.watcher.pollIntervalMs,
        strategy: this.client.strategy,
      },
      "Watch pipeline started"
    );
    await this.loop();
  }

  /**
   * Prevents new ticks and waits for the in-flight tick to finish.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight.catch((error: unknown) => {
        this.logger.debug({ err: toError(error) }, "In-flight tick failed during stop");
      });
    }
    await this.client.close();
    this.logger.info({ ticks: this.tickCount }, "Watch pipeline stopped");
  }

  /**
   * Swaps in a new configuration. Takes effect at the start of the next tick,
   * which also clears every no-match exclusion so the new rules apply to files
   * already seen. A tick in flight finishes with the rules it started with.
   */
  reload(config: Config, client?: IDispatchClient): Promise<void> {
    this.configHolder.swap(config);
    this.events.emit("config:reloaded", { version: this.configHolder.version });
    this.logger.info({ version: this.configHolder.version }, "Configuration reloaded");

    if (!client) return Promise.resolve();
    const previous = this.dispatcher.replaceClient(client);
    this.client = client;
    return previous.close();
  }

  // ===========================================================================
  // Ticks
  // ===========================================================================

  /**
   * Runs one tick. Concurrent calls share the in-flight tick.
   */
  tick(): Promise<TickSummary> {
    if (!this.inFlight) {
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async loop(): Promise<void> {
    if (!this.running) return;
    try {
      await this.tick();
    } catch (error) {
      const failure = toError(error);
      this.logger.error({ err: failure }, "Tick failed");
      this.events.emit("tick:error", { error: failure });
    }
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.loop();
    }, this.config.watcher.pollIntervalMs);
  }

  private async runTick(): Promise<TickSummary> {
    const config = this.config;
    if (this.rulesChanged) {
      this.rulesChanged = false;
      const clearedNoMatch = this.tracker.invalidateNoMatch();
      this.events.emit("rules:applied", { version: this.configHolder.version, clearedNoMatch });
      this.logger.info({ version: this.configHolder.version, clearedNoMatch }, "No-match exclusions cleared");
    }
    const startedAt = this.now();
    const outcome = await this.scanner.scan(config);
    const summary = outcome.summary;

    for (const path of outcome.modified) {
      if (this.scheduler.cancel(path)) {
        this.logger.debug({ path }, "Pending delayed dispatch cancelled");
      }
    }

    const immediate: StableFile[] = [];
    for (const file of outcome.stable) {
      if (config.watcher.processDelayMs > 0) {
        this.scheduler.schedule(file, this.now() + config.watcher.processDelayMs);
        this.logger.debug({ path: file.path, delayMs: config.watcher.processDelayMs }, "Dispatch scheduled");
      } else {
        immediate.push(file);
      }
    }
    immediate.push(...this.scheduler.drainDue(this.now()));

    const results: Result<DispatchOutcome, DispatchError>[] = [];
    for (const file of immediate) {
      results.push(await this.dispatcher.dispatch(file));
    }
    const { oks, errs } = partition(results);
    summary.dispatched = oks.filter((dispatched) => dispatched.kind === "dispatched").length;
    summary.failed = errs.length;
    summary.durationMs = this.now() - startedAt;

    this.tickCount++;
    this.lastTick = summary;
    this.logger.debug({ ...summary }, "Tick complete");
    this.events.emit("tick:complete", { ...summary });
    return summary;
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  status(): StatusReport {
    return {
      running: this.running,
      startedAt: this.startedAt === undefined ? undefined : new Date(this.startedAt).toISOString(),
      uptimeSeconds: this.startedAt === undefined ? 0 : Math.floor((this.now() - this.startedAt) / 1000),
      ticks: this.tickCount,
      lastTick: this.lastTick ? { ...this.lastTick } : undefined,
      state: this.tracker.snapshot(),
      pendingDelayed: this.scheduler.size,
      recentDispatches: this.dispatchLog.recent(20),
      config: summarizeConfig(this.config),
    };
  }
}
