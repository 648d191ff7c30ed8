/**
 * HTTP Queue Client
 *
 * Enqueues tasks through a Flower-style task API:
 * `POST {apiUrl}/api/task/async-apply/{taskName}`.
 */

import { z } from "zod";
import type { EnqueueOptions, QueueClient } from "../interfaces/IDispatchClient.js";
import type { TaskArgs, TaskKwargs } from "../models/task-request.js";
import { DispatchError, ErrorCode } from "../../errors.js";

const AsyncApplyResponseSchema = z
  .object({
    "task-id": z.string().min(1),
    state: z.string().optional(),
  })
  .passthrough();

export interface HttpQueueClientOptions {
  apiUrl: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

export class HttpQueueClient implements QueueClient {
  private readonly apiUrl: string;
  private readonly authorization?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpQueueClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    if (options.username) {
      const token = Buffer.from(`${options.username}:${options.password ?? ""}`, "utf-8").toString("base64");
      this.authorization = `Basic ${token}`;
    }
  }

  endpointFor(taskName: string): string {
    return `${this.apiUrl}/api/task/async-apply/${encodeURIComponent(taskName)}`;
  }

  async enqueue(taskName: string, args: TaskArgs, kwargs: TaskKwargs, options: EnqueueOptions): Promise<string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }

    const body: Record<string, unknown> = { args, kwargs, task_id: options.taskId };
    if (options.queue) {
      body.queue = options.queue;
    }

    const response = await this.fetchFn(this.endpointFor(taskName), {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new DispatchError(
        `Task API rejected ${taskName}: HTTP ${response.status}`,
        ErrorCode.DISPATCH_REJECTED,
        { status: response.status, body: text.slice(0, 500) }
      );
    }

    const parsed = AsyncApplyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DispatchError("Task API response did not include a task id", ErrorCode.DISPATCH_REJECTED, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data["task-id"];
  }

  async close(): Promise<void> {
    // fetch keeps no connection state of its own
  }
}
