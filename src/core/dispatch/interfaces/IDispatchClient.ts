/**
 * Dispatch Client Interfaces
 *
 * One client contract, two strategies. The raw-envelope client writes a
 * hand-built protocol message onto a broker list through a ListTransport;
 * the structured client asks a QueueClient to enqueue the task.
 *
 * @module
 */

import type { Destination, DispatchStrategy } from "../../config/models/config.js";
import type { TaskArgs, TaskKwargs } from "../models/task-request.js";

// =============================================================================
// Dispatch Client
// =============================================================================

export interface IDispatchClient {
  readonly strategy: DispatchStrategy;

  /**
   * Places one unit of work for `filePath` on the queue.
   *
   * @returns the correlation id, which is also the task id on the queue
   * @throws DispatchError when the unit of work did not reach the queue
   */
  dispatch(filePath: string, destination: Destination): Promise<string>;

  /** Releases broker connections. Safe to call more than once. */
  close(): Promise<void>;
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Push-only view of a broker list
 */
export interface ListTransport {
  /** Left-pushes `payload` onto `key`; resolves to the new list length. */
  push(key: string, payload: string): Promise<number>;
  close(): Promise<void>;
}

export interface EnqueueOptions {
  /** Task id to assign; queues that ignore it return their own */
  taskId: string;
  queue?: string;
}

/**
 * Structured task-queue API
 */
export interface QueueClient {
  /** @returns the id the queue assigned to the task */
  enqueue(taskName: string, args: TaskArgs, kwargs: TaskKwargs, options: EnqueueOptions): Promise<string>;
  close(): Promise<void>;
}
