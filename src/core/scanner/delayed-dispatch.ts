/**
 * Delayed Dispatch Scheduler
 *
 * Holds stable files until `process_delay_seconds` has passed. Entries are
 * drained by the poll loop at the end of every tick; a modification cancels
 * the pending entry.
 */

import type { StableFile } from "./models/scan-models.js";

interface PendingDispatch {
  file: StableFile;
  fireAt: number;
}

export class DelayedDispatchScheduler {
  private readonly pending = new Map<string, PendingDispatch>();

  schedule(file: StableFile, fireAt: number): void {
    this.pending.set(file.path, { file, fireAt });
  }

  cancel(filePath: string): boolean {
    return this.pending.delete(filePath);
  }

  has(filePath: string): boolean {
    return this.pending.has(filePath);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Removes and returns every entry due at `now`, earliest first. */
  drainDue(now: number): StableFile[] {
    const due = [...this.pending.values()]
      .filter((entry) => entry.fireAt <= now)
      .sort((a, b) => a.fireAt - b.fireAt);
    for (const entry of due) {
      this.pending.delete(entry.file.path);
    }
    return due.map((entry) => entry.file);
  }

  clear(): void {
    this.pending.clear();
  }
}
