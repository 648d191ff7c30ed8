/**
 * Watched File Model
 *
 * One entry per distinct path the scanner has ever listed.
 */

import type { Destination } from "../../config/models/config.js";

/**
 * Lifecycle of a watched file.
 *
 * unseen → candidate → stable → dispatched → completed | failed
 * Any status may move to ignored; a new mtime moves any status back to candidate
 * except an ignored no-match, which only a config reload clears.
 */
export type FileStatus =
  | "unseen"
  | "candidate"
  | "stable"
  | "dispatched"
  | "completed"
  | "failed"
  | "ignored";

export const FILE_STATUSES: readonly FileStatus[] = [
  "unseen",
  "candidate",
  "stable",
  "dispatched",
  "completed",
  "failed",
  "ignored",
];

export type IgnoreReason = "no-match" | "baseline" | "too-large";

export type CompletionOutcome = "success" | "failure";

export interface WatchedFile {
  path: string;
  /** Forward slashes, lower case */
  normalizedPath: string;
  lastSeenMtime: number;
  lastSeenSize: number;
  status: FileStatus;
  ignoreReason?: IgnoreReason;
  /** mtime of the observation that was last dispatched */
  dispatchedMtime?: number;
  correlationId?: string;
  destination?: Destination;
  lastError?: string;
  completionDetails?: string;
  firstSeenAt: number;
  updatedAt: number;
}

/**
 * Result of recording one stat of a file
 */
export type ObserveTransition =
  /** First time this path was listed; now a candidate */
  | { kind: "new"; file: WatchedFile }
  /** mtime or size differs from the previous tick; reset to candidate */
  | { kind: "modified"; file: WatchedFile; previousStatus: FileStatus }
  /** Same mtime and size as the previous tick */
  | { kind: "unchanged"; file: WatchedFile }
  /** Permanently excluded until a reload (no rule matched) */
  | { kind: "excluded"; file: WatchedFile };

/**
 * Counters reported by the `status` command and `GET /status`
 */
export interface StateSnapshot {
  /** Stable (awaiting dispatch) plus dispatched (awaiting completion) */
  queued: number;
  /** Completed plus failed */
  processed: number;
  total: number;
  byStatus: Record<FileStatus, number>;
}
