/**
 * Task Request Model
 *
 * The strategy-independent description of one unit of work: both dispatch
 * clients send exactly this task name, args and kwargs.
 */

import { randomBytes } from "node:crypto";
import * as path from "node:path";
import type { Destination } from "../../config/models/config.js";
import { baseName } from "../../../utils/fs.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type TaskArgs = JsonValue[];
export type TaskKwargs = { [key: string]: JsonValue };

export interface TaskRequest {
  taskName: string;
  args: TaskArgs;
  kwargs: TaskKwargs;
  /** Also the queue-level task id */
  correlationId: string;
  fileName: string;
  filePath: string;
  destination: Destination;
  createdAt: number;
}

export interface TaskRequestSettings {
  taskName: string;
  sourceTag: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * `YYYYMMDD_HHMMSS` in local time
 */
export function formatBatchTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Unique per dispatch attempt: file name, dispatch time and a random suffix
 * for attempts that land in the same millisecond.
 */
export function createCorrelationId(fileName: string, at: number): string {
  return `${fileName}_${at}_${randomBytes(4).toString("hex")}`;
}

export function buildTaskRequest(
  filePath: string,
  destination: Destination,
  settings: TaskRequestSettings,
  now: number = Date.now()
): TaskRequest {
  const fileName = baseName(filePath);
  const stem = path.parse(fileName).name;

  const kwargs: TaskKwargs = {
    auto_triggered: true,
    filepath: filePath,
    table_name: destination.name,
    source_name: `${stem}_${formatBatchTimestamp(new Date(now))}`,
    source: settings.sourceTag,
  };
  if (destination.schema) {
    kwargs.schema = destination.schema;
  }

  return {
    taskName: settings.taskName,
    args: [fileName],
    kwargs,
    correlationId: createCorrelationId(fileName, now),
    fileName,
    filePath,
    destination,
    createdAt: now,
  };
}
