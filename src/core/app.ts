/**
 * Composition root
 *
 * Wires one Config into the scanner, tracker, dispatch client, pipeline and
 * completion server. Everything is injectable so tests and embedders can
 * replace the filesystem or the broker.
 *
 * @module
 */

import type { Config } from "./config/models/config.js";
import type { IDispatchClient } from "./dispatch/interfaces/IDispatchClient.js";
import { createDispatchClient } from "./dispatch/factory.js";
import { ProcessingEventLog, type IProcessingEventLog } from "./history/processing-event-log.js";
import type { IFileSource } from "./scanner/interfaces/IFileSource.js";
import { NodeFileSource } from "./scanner/impl/NodeFileSource.js";
import type { IStateTracker } from "./state/interfaces/IStateTracker.js";
import { StateTracker } from "./state/impl/StateTracker.js";
import { WatchPipeline } from "./pipeline/watch-pipeline.js";
import { CompletionServer } from "./completion/impl/CompletionServer.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface IngestWatcherOptions {
  source?: IFileSource;
  tracker?: IStateTracker;
  client?: IDispatchClient;
  eventLog?: IProcessingEventLog;
  logger?: Logger;
}

export interface IngestWatcher {
  pipeline: WatchPipeline;
  server: CompletionServer;
  eventLog: IProcessingEventLog;
  /** Starts the completion server (when enabled) and then the poll loop */
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createIngestWatcher(config: Config, options: IngestWatcherOptions = {}): IngestWatcher {
  const logger = options.logger ?? createLogger("ingest-watch");
  const eventLog = options.eventLog ?? new ProcessingEventLog({ logDir: config.logging.logDir });

  const pipeline = new WatchPipeline({
    config,
    source: options.source ?? new NodeFileSource(),
    tracker: options.tracker ?? new StateTracker(),
    client: options.client ?? createDispatchClient(config.dispatch),
    eventLog,
    logger: logger.child({ component: "pipeline" }),
  });

  const server = new CompletionServer(pipeline.completions, pipeline, eventLog, {
    logger: logger.child({ component: "completion-server" }),
  });

  let serverStarted = false;

  return {
    pipeline,
    server,
    eventLog,
    async start() {
      const { completion } = pipeline.config;
      if (completion.enabled) {
        await server.start({ host: completion.host, port: completion.port });
        serverStarted = true;
      }
      await pipeline.start();
    },
    async stop() {
      await pipeline.stop();
      if (serverStarted) {
        serverStarted = false;
        await server.stop();
      }
    },
  };
}
