/**
 * Raw Envelope Dispatch Client
 *
 * Builds the task message by hand and pushes it straight onto the broker
 * list. No deduplication: downstream must tolerate a duplicate after a
 * timeout that actually delivered.
 */

import type { Destination, DispatchSettings } from "../../config/models/config.js";
import type { IDispatchClient, ListTransport } from "../interfaces/IDispatchClient.js";
import { buildTaskRequest } from "../models/task-request.js";
import { buildEnvelope, encodeEnvelope, type EnvelopeOptions } from "../envelope.js";
import { toDispatchError } from "./dispatch-errors.js";
import { DispatchError, ErrorCode, errorMessage } from "../../errors.js";
import { timeout } from "../../../utils/async.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

export interface RawEnvelopeDispatchClientOptions {
  logger?: Logger;
  now?: () => number;
  envelope?: Omit<EnvelopeOptions, "queue">;
}

export class RawEnvelopeDispatchClient implements IDispatchClient {
  readonly strategy = "raw-envelope" as const;

  private readonly transport: ListTransport;
  private readonly settings: DispatchSettings;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly envelopeOptions: Omit<EnvelopeOptions, "queue">;

  constructor(transport: ListTransport, settings: DispatchSettings, options: RawEnvelopeDispatchClientOptions = {}) {
    this.transport = transport;
    this.settings = settings;
    this.logger = options.logger ?? createLogger("dispatch");
    this.now = options.now ?? Date.now;
    this.envelopeOptions = options.envelope ?? {};
  }

  async dispatch(filePath: string, destination: Destination): Promise<string> {
    const request = buildTaskRequest(filePath, destination, this.settings, this.now());
    const target = `list "${this.settings.queue}"`;

    let payload: string;
    try {
      payload = encodeEnvelope(buildEnvelope(request, { ...this.envelopeOptions, queue: this.settings.queue }));
    } catch (error) {
      throw new DispatchError(
        `Could not serialize task message: ${errorMessage(error)}`,
        ErrorCode.DISPATCH_SERIALIZATION_FAILED,
        { filePath, destination: destination.name }
      );
    }

    try {
      const depth = await timeout(
        this.transport.push(this.settings.queue, payload),
        this.settings.timeoutMs,
        `LPUSH to ${this.settings.queue} timed out after ${this.settings.timeoutMs}ms`
      );
      this.logger.debug(
        { correlationId: request.correlationId, queue: this.settings.queue, depth },
        "Task message pushed"
      );
    } catch (error) {
      throw toDispatchError(error, request, target);
    }

    return request.correlationId;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}
