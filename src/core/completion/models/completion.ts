/**
 * Completion Models
 *
 * Wire payload of `POST /processing_complete` and what the listener reports
 * back for it.
 */

import { z } from "zod";
import type { CompletionOutcome } from "../../state/models/watched-file.js";

export const CompletionPayloadSchema = z.object({
  filename: z.string().trim().min(1, "filename is required"),
  status: z.enum(["success", "failure"]),
  details: z.string().nullish(),
  worker_id: z.union([z.string(), z.number()]).nullish(),
  timestamp: z.string().nullish(),
});

export type CompletionPayload = z.infer<typeof CompletionPayloadSchema>;

/**
 * A worker's report that it finished (or gave up on) a file
 */
export interface CompletionEvent {
  /** Bare file name, or a path whose base name is used */
  filename: string;
  status: CompletionOutcome;
  details?: string;
  workerId?: string;
  timestamp?: string;
}

export interface CompletionResult {
  filename: string;
  status: CompletionOutcome;
  /** A dispatch record was found for the file name */
  matched: boolean;
  /** The tracked file moved to completed or failed */
  transitioned: boolean;
  path?: string;
  correlationId?: string;
}

export function toCompletionEvent(payload: CompletionPayload): CompletionEvent {
  return {
    filename: payload.filename,
    status: payload.status,
    details: payload.details ?? undefined,
    workerId: payload.worker_id === null || payload.worker_id === undefined ? undefined : String(payload.worker_id),
    timestamp: payload.timestamp ?? undefined,
  };
}
