/**
 * Maps transport failures onto DispatchError codes
 */

import { DispatchError, ErrorCode, errorMessage } from "../../errors.js";
import type { TaskRequest } from "../models/task-request.js";
import { TimeoutError } from "../../../utils/async.js";

const UNREACHABLE_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EHOSTUNREACH", "ETIMEDOUT"]);

/** ioredis rejects with these when the broker cannot be reached; they carry no system code */
const UNREACHABLE_ERROR_NAMES = new Set(["MaxRetriesPerRequestError"]);
const CONNECTION_CLOSED_MESSAGE = "Connection is closed.";

function isConnectionLoss(error: unknown): boolean {
  return (
    error instanceof Error && (UNREACHABLE_ERROR_NAMES.has(error.name) || error.message === CONNECTION_CLOSED_MESSAGE)
  );
}

function systemCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return systemCode(error.cause);
  }
  return undefined;
}

export function toDispatchError(error: unknown, request: TaskRequest, target: string): DispatchError {
  if (error instanceof DispatchError) return error;

  const context = {
    filePath: request.filePath,
    destination: request.destination.name,
    correlationId: request.correlationId,
    target,
  };

  if (error instanceof TimeoutError || (error instanceof Error && error.name === "TimeoutError")) {
    return new DispatchError(`Timed out dispatching to ${target}`, ErrorCode.DISPATCH_TIMEOUT, context);
  }

  const code = systemCode(error);
  if (code !== undefined && UNREACHABLE_CODES.has(code)) {
    return new DispatchError(
      `Broker unreachable at ${target}: ${errorMessage(error)}`,
      ErrorCode.DISPATCH_BROKER_UNREACHABLE,
      { ...context, systemCode: code }
    );
  }

  if (isConnectionLoss(error)) {
    return new DispatchError(
      `Broker unreachable at ${target}: ${errorMessage(error)}`,
      ErrorCode.DISPATCH_BROKER_UNREACHABLE,
      context
    );
  }

  return new DispatchError(`Dispatch to ${target} failed: ${errorMessage(error)}`, ErrorCode.DISPATCH_FAILED, context);
}
