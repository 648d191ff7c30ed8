/**
 * IStateTracker - authority on "has this file already been dispatched"
 *
 * Every method is a synchronous critical section over a single map: nothing
 * awaits while the map is being mutated, so scanner and completion mutations
 * are serialized by the event loop and the map is never held across I/O.
 *
 * @module
 */

import type { Destination } from "../../config/models/config.js";
import type {
  CompletionOutcome,
  IgnoreReason,
  ObserveTransition,
  StateSnapshot,
  WatchedFile,
} from "../models/watched-file.js";

export interface IStateTracker {
  /**
   * Records a stat of `path`. New paths become candidates; a changed mtime or
   * size resets the file to candidate.
   */
  observe(path: string, mtimeMs: number, size: number): ObserveTransition;

  /** Candidate → stable, only while `mtimeMs` is still the last seen mtime. */
  markStable(path: string, mtimeMs: number): boolean;

  /** Whether a dispatch for this (path, mtime) is still allowed. */
  canDispatch(path: string, mtimeMs: number): boolean;

  /**
   * Stable → dispatched. At most once per distinct (path, mtime); later calls
   * for the same pair return false.
   */
  markDispatched(path: string, mtimeMs: number, correlationId: string, destination: Destination): boolean;

  /** Stable → candidate after a failed dispatch, so the next tick retries. */
  markDispatchFailed(path: string, mtimeMs: number, reason: string): boolean;

  markIgnored(path: string, reason: IgnoreReason): boolean;

  /** Dispatched → completed | failed. */
  markCompleted(path: string, outcome: CompletionOutcome, details?: string, mtimeMs?: number): boolean;

  /** Clears every no-match exclusion; returns how many were cleared. */
  invalidateNoMatch(): number;

  get(path: string): WatchedFile | undefined;
  entries(): WatchedFile[];
  snapshot(): StateSnapshot;
}
