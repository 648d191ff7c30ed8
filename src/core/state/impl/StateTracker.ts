/**
 * In-memory State Tracker
 *
 * Process-local map of path → WatchedFile. Rebuilt from disk on every start;
 * nothing is persisted.
 */

import type { Destination } from "../../config/models/config.js";
import type { IStateTracker } from "../interfaces/IStateTracker.js";
import type {
  CompletionOutcome,
  FileStatus,
  IgnoreReason,
  ObserveTransition,
  StateSnapshot,
  WatchedFile,
} from "../models/watched-file.js";
import { normalizePath } from "../../../utils/fs.js";

export interface StateTrackerOptions {
  now?: () => number;
}

export class StateTracker implements IStateTracker {
  private readonly files = new Map<string, WatchedFile>();
  private readonly now: () => number;

  constructor(options: StateTrackerOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  observe(path: string, mtimeMs: number, size: number): ObserveTransition {
    const timestamp = this.now();
    const existing = this.files.get(path);

    if (!existing) {
      const file: WatchedFile = {
        path,
        normalizedPath: normalizePath(path),
        lastSeenMtime: mtimeMs,
        lastSeenSize: size,
        status: "candidate",
        firstSeenAt: timestamp,
        updatedAt: timestamp,
      };
      this.files.set(path, file);
      return { kind: "new", file: { ...file } };
    }

    const changed = existing.lastSeenMtime !== mtimeMs || existing.lastSeenSize !== size;
    existing.lastSeenMtime = mtimeMs;
    existing.lastSeenSize = size;

    if (existing.status === "unseen") {
      existing.status = "candidate";
      existing.ignoreReason = undefined;
      existing.updatedAt = timestamp;
      return { kind: "new", file: { ...existing } };
    }

    if (existing.status === "ignored" && existing.ignoreReason === "no-match") {
      return { kind: "excluded", file: { ...existing } };
    }

    if (changed) {
      const previousStatus = existing.status;
      existing.status = "candidate";
      existing.ignoreReason = undefined;
      existing.lastError = undefined;
      existing.updatedAt = timestamp;
      return { kind: "modified", file: { ...existing }, previousStatus };
    }

    return { kind: "unchanged", file: { ...existing } };
  }

  markStable(path: string, mtimeMs: number): boolean {
    const file = this.files.get(path);
    if (!file || file.status !== "candidate" || file.lastSeenMtime !== mtimeMs) {
      return false;
    }
    file.status = "stable";
    file.updatedAt = this.now();
    return true;
  }

  canDispatch(path: string, mtimeMs: number): boolean {
    const file = this.files.get(path);
    return (
      file !== undefined &&
      file.status === "stable" &&
      file.lastSeenMtime === mtimeMs &&
      file.dispatchedMtime !== mtimeMs
    );
  }

  markDispatched(path: string, mtimeMs: number, correlationId: string, destination: Destination): boolean {
    if (!this.canDispatch(path, mtimeMs)) {
      return false;
    }
    const file = this.files.get(path);
    if (!file) return false;
    file.status = "dispatched";
    file.dispatchedMtime = mtimeMs;
    file.correlationId = correlationId;
    file.destination = destination;
    file.lastError = undefined;
    file.completionDetails = undefined;
    file.updatedAt = this.now();
    return true;
  }

  markDispatchFailed(path: string, mtimeMs: number, reason: string): boolean {
    const file = this.files.get(path);
    if (!file || file.status !== "stable" || file.lastSeenMtime !== mtimeMs) {
      return false;
    }
    file.status = "candidate";
    file.lastError = reason;
    file.updatedAt = this.now();
    return true;
  }

  markIgnored(path: string, reason: IgnoreReason): boolean {
    const file = this.files.get(path);
    if (!file) return false;
    file.status = "ignored";
    file.ignoreReason = reason;
    file.updatedAt = this.now();
    return true;
  }

  markCompleted(path: string, outcome: CompletionOutcome, details?: string, mtimeMs?: number): boolean {
    const file = this.files.get(path);
    if (!file || file.status !== "dispatched") {
      return false;
    }
    if (mtimeMs !== undefined && file.dispatchedMtime !== mtimeMs) {
      return false;
    }
    file.status = outcome === "success" ? "completed" : "failed";
    file.completionDetails = details;
    file.updatedAt = this.now();
    return true;
  }

  invalidateNoMatch(): number {
    let cleared = 0;
    const timestamp = this.now();
    for (const file of this.files.values()) {
      if (file.status === "ignored" && file.ignoreReason === "no-match") {
        file.status = "unseen";
        file.ignoreReason = undefined;
        file.updatedAt = timestamp;
        cleared++;
      }
    }
    return cleared;
  }

  get(path: string): WatchedFile | undefined {
    const file = this.files.get(path);
    return file ? { ...file } : undefined;
  }

  entries(): WatchedFile[] {
    return [...this.files.values()].map((file) => ({ ...file }));
  }

  snapshot(): StateSnapshot {
    const byStatus: Record<FileStatus, number> = {
      unseen: 0,
      candidate: 0,
      stable: 0,
      dispatched: 0,
      completed: 0,
      failed: 0,
      ignored: 0,
    };
    for (const file of this.files.values()) {
      byStatus[file.status]++;
    }
    return {
      queued: byStatus.stable + byStatus.dispatched,
      processed: byStatus.completed + byStatus.failed,
      total: this.files.size,
      byStatus,
    };
  }
}
