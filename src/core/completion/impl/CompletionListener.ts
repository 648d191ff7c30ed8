/**
 * Completion Listener
 *
 * Matches worker completion reports to the most recent dispatch of the same
 * file name and closes out the file's lifecycle. Reports for files this
 * process never dispatched are logged and answered as unmatched.
 *
 * @module
 */

import type { IStateTracker } from "../../state/interfaces/IStateTracker.js";
import type { DispatchLog } from "../../dispatch/dispatch-log.js";
import type { IProcessingEventLog } from "../../history/processing-event-log.js";
import type { CompletionEvent, CompletionResult } from "../models/completion.js";
import { baseName } from "../../../utils/fs.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import type { EventBus } from "../../../utils/events.js";
import type { PipelineEvents } from "../../pipeline/pipeline-events.js";

export interface CompletionListenerOptions {
  logger?: Logger;
  events?: EventBus<PipelineEvents>;
  now?: () => number;
}

export class CompletionListener {
  private readonly tracker: IStateTracker;
  private readonly dispatchLog: DispatchLog;
  private readonly eventLog: IProcessingEventLog;
  private readonly logger: Logger;
  private readonly events?: EventBus<PipelineEvents>;
  private readonly now: () => number;

  constructor(
    tracker: IStateTracker,
    dispatchLog: DispatchLog,
    eventLog: IProcessingEventLog,
    options: CompletionListenerOptions = {}
  ) {
    this.tracker = tracker;
    this.dispatchLog = dispatchLog;
    this.eventLog = eventLog;
    this.logger = options.logger ?? createLogger("completion");
    this.events = options.events;
    this.now = options.now ?? Date.now;
  }

  async onCompletion(event: CompletionEvent): Promise<CompletionResult> {
    const filename = baseName(event.filename);
    const record = this.dispatchLog.latestForFileName(filename);
    const details = `Worker: ${event.workerId ?? "unknown"}, Details: ${event.details ?? ""}`;
    const logStatus = event.status === "success" ? "completed_success" : "completed_failure";

    if (!record) {
      this.logger.info({ filename, status: event.status, outcome: "unmatched" }, "Completion for unknown file");
      await this.eventLog.record(event.filename, logStatus, details);
      const result: CompletionResult = { filename, status: event.status, matched: false, transitioned: false };
      this.events?.emit("completion", result);
      return result;
    }

    this.dispatchLog.acknowledge(record.correlationId, this.now());
    const transitioned = this.tracker.markCompleted(record.path, event.status, event.details, record.mtime);

    this.logger.info(
      {
        path: record.path,
        destination: record.destination,
        correlationId: record.correlationId,
        outcome: event.status,
        workerId: event.workerId,
        transitioned,
      },
      "Processing complete"
    );
    await this.eventLog.record(record.path, logStatus, details);

    const result: CompletionResult = {
      filename,
      status: event.status,
      matched: true,
      transitioned,
      path: record.path,
      correlationId: record.correlationId,
    };
    this.events?.emit("completion", result);
    return result;
  }
}
