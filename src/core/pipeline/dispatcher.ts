/**
 * Dispatcher
 *
 * Sends one stable file through the dispatch client and records the outcome
 * in the State Tracker, the dispatch log and the processing event log.
 *
 * @module
 */

import type { IDispatchClient } from "../dispatch/interfaces/IDispatchClient.js";
import type { DispatchLog } from "../dispatch/dispatch-log.js";
import type { DispatchRecord } from "../dispatch/models/dispatch-record.js";
import type { IStateTracker } from "../state/interfaces/IStateTracker.js";
import type { IProcessingEventLog } from "../history/processing-event-log.js";
import type { StableFile } from "../scanner/models/scan-models.js";
import type { PipelineEvents } from "./pipeline-events.js";
import { DispatchError, ErrorCode } from "../errors.js";
import { fromPromiseWith, ok, err, type Result } from "../../types/result.js";
import { baseName } from "../../utils/fs.js";
import type { EventBus } from "../../utils/events.js";
import { createLogger, type Logger } from "../../utils/logger.js";

/**
 * `skipped` means the (path, mtime) was already dispatched or the file
 * changed after it was found stable.
 */
export type DispatchOutcome =
  | { kind: "dispatched"; record: DispatchRecord }
  | { kind: "skipped"; reason: string };

export interface DispatcherOptions {
  logger?: Logger;
  events?: EventBus<PipelineEvents>;
  now?: () => number;
}

export class Dispatcher {
  private client: IDispatchClient;
  private readonly tracker: IStateTracker;
  private readonly dispatchLog: DispatchLog;
  private readonly eventLog: IProcessingEventLog;
  private readonly logger: Logger;
  private readonly events?: EventBus<PipelineEvents>;
  private readonly now: () => number;

  constructor(
    client: IDispatchClient,
    tracker: IStateTracker,
    dispatchLog: DispatchLog,
    eventLog: IProcessingEventLog,
    options: DispatcherOptions = {}
  ) {
    this.client = client;
    this.tracker = tracker;
    this.dispatchLog = dispatchLog;
    this.eventLog = eventLog;
    this.logger = options.logger ?? createLogger("dispatch");
    this.events = options.events;
    this.now = options.now ?? Date.now;
  }

  /** Swaps the client; returns the previous one for the caller to close. */
  replaceClient(client: IDispatchClient): IDispatchClient {
    const previous = this.client;
    this.client = client;
    return previous;
  }

  async dispatch(file: StableFile): Promise<Result<DispatchOutcome, DispatchError>> {
    if (!this.tracker.canDispatch(file.path, file.mtimeMs)) {
      return ok({ kind: "skipped", reason: "already dispatched or changed" });
    }

    const client = this.client;
    const result = await fromPromiseWith(client.dispatch(file.path, file.destination), (error) =>
      error instanceof DispatchError
        ? error
        : new DispatchError(String(error), ErrorCode.DISPATCH_FAILED, {
            filePath: file.path,
            destination: file.destination.name,
          })
    );

    const base = {
      path: file.path,
      fileName: baseName(file.path),
      destination: file.destination.name,
      schema: file.destination.schema,
      mtime: file.mtimeMs,
      dispatchedAt: this.now(),
      strategy: client.strategy,
    };

    if (!result.ok) {
      const record: DispatchRecord = {
        ...base,
        correlationId: "",
        status: "error",
        error: result.error.message,
      };
      this.tracker.markDispatchFailed(file.path, file.mtimeMs, result.error.message);
      this.dispatchLog.add(record);
      this.logger.error(
        { path: file.path, destination: file.destination.name, outcome: "error", code: result.error.code, err: result.error },
        "Dispatch failed; file returns to candidate"
      );
      await this.eventLog.record(file.path, "error", result.error.message);
      this.events?.emit("dispatch:failed", { ...record });
      return err(result.error);
    }

    const correlationId = result.value;
    if (!this.tracker.markDispatched(file.path, file.mtimeMs, correlationId, file.destination)) {
      this.logger.warn(
        { path: file.path, correlationId },
        "File changed while its dispatch was in flight; the worker may receive an outdated version"
      );
      return ok({ kind: "skipped", reason: "changed during dispatch" });
    }

    const record: DispatchRecord = { ...base, correlationId, status: "sent" };
    this.dispatchLog.add(record);
    this.logger.info(
      { path: file.path, destination: file.destination.name, correlationId, outcome: "dispatched", strategy: client.strategy },
      "File dispatched"
    );
    await this.eventLog.record(file.path, "triggered", `Task ID: ${correlationId}`);
    this.events?.emit("dispatched", { ...record });
    return ok({ kind: "dispatched", record: { ...record } });
  }
}
