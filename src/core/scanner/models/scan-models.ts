/**
 * Scanner Models
 */

import type { Destination } from "../../config/models/config.js";
import type { FileStats } from "../../../utils/fs.js";
import type { ScanError } from "../../errors.js";

/**
 * Outcome of re-stat'ing a candidate after the settle delay
 */
export type StabilityResult =
  | { kind: "not-ready"; reason: string; stats?: FileStats }
  | { kind: "stable"; stats: FileStats }
  | { kind: "error"; reason: string; error: ScanError };

/**
 * A file that passed the stability check and has a destination
 */
export interface StableFile {
  path: string;
  mtimeMs: number;
  size: number;
  destination: Destination;
}

/**
 * Counters for one poll tick
 */
export interface TickSummary {
  scanned: number;
  newFiles: number;
  modified: number;
  stable: number;
  dispatched: number;
  failed: number;
  ignored: number;
  errors: number;
  durationMs: number;
}

export function emptyTickSummary(): TickSummary {
  return {
    scanned: 0,
    newFiles: 0,
    modified: 0,
    stable: 0,
    dispatched: 0,
    failed: 0,
    ignored: 0,
    errors: 0,
    durationMs: 0,
  };
}

export interface ScanOutcome {
  /** Files to dispatch (or schedule) this tick, in listing order */
  stable: StableFile[];
  /** Paths whose mtime or size changed since the previous tick */
  modified: string[];
  summary: TickSummary;
}
