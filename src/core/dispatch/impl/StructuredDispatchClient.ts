/**
 * Structured Dispatch Client
 *
 * Hands task name, args and kwargs to a QueueClient and lets it build the
 * message.
 */

import type { Destination, DispatchSettings } from "../../config/models/config.js";
import type { IDispatchClient, QueueClient } from "../interfaces/IDispatchClient.js";
import { buildTaskRequest } from "../models/task-request.js";
import { toDispatchError } from "./dispatch-errors.js";
import { timeout } from "../../../utils/async.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

export interface StructuredDispatchClientOptions {
  logger?: Logger;
  now?: () => number;
}

export class StructuredDispatchClient implements IDispatchClient {
  readonly strategy = "structured" as const;

  private readonly queue: QueueClient;
  private readonly settings: DispatchSettings;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(queue: QueueClient, settings: DispatchSettings, options: StructuredDispatchClientOptions = {}) {
    this.queue = queue;
    this.settings = settings;
    this.logger = options.logger ?? createLogger("dispatch");
    this.now = options.now ?? Date.now;
  }

  async dispatch(filePath: string, destination: Destination): Promise<string> {
    const request = buildTaskRequest(filePath, destination, this.settings, this.now());

    try {
      const taskId = await timeout(
        this.queue.enqueue(request.taskName, request.args, request.kwargs, {
          taskId: request.correlationId,
          queue: this.settings.queue,
        }),
        this.settings.timeoutMs,
        `Enqueue of ${request.taskName} timed out after ${this.settings.timeoutMs}ms`
      );
      if (taskId !== request.correlationId) {
        this.logger.debug({ correlationId: request.correlationId, taskId }, "Queue assigned its own task id");
      }
    } catch (error) {
      throw toDispatchError(error, request, this.settings.apiUrl);
    }

    return request.correlationId;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
