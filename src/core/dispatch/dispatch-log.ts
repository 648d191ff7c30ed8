/**
 * Dispatch Log
 *
 * Bounded in-memory history of dispatch attempts, newest last.
 */

import type { DispatchRecord } from "./models/dispatch-record.js";
import { baseName } from "../../utils/fs.js";

export const DEFAULT_MAX_DISPATCH_RECORDS = 1000;

export class DispatchLog {
  private readonly records: DispatchRecord[] = [];
  private readonly maxRecords: number;

  constructor(maxRecords: number = DEFAULT_MAX_DISPATCH_RECORDS) {
    this.maxRecords = Math.max(1, maxRecords);
  }

  add(record: DispatchRecord): void {
    this.records.push(record);
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Most recent record for a file name that reached the queue. Accepts a bare
   * name or a path; comparison is case-insensitive.
   */
  latestForFileName(fileName: string): DispatchRecord | undefined {
    const wanted = baseName(fileName).toLowerCase();
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (record && record.status !== "error" && record.fileName.toLowerCase() === wanted) {
        return record;
      }
    }
    return undefined;
  }

  byCorrelationId(correlationId: string): DispatchRecord | undefined {
    return this.records.find((record) => record.correlationId === correlationId);
  }

  acknowledge(correlationId: string, at: number = Date.now()): boolean {
    const record = this.byCorrelationId(correlationId);
    if (!record || record.status === "error") return false;
    record.status = "acknowledged";
    record.acknowledgedAt = at;
    return true;
  }

  /** Newest first */
  recent(limit = 20): DispatchRecord[] {
    if (limit <= 0) return [];
    return this.records
      .slice(-limit)
      .reverse()
      .map((record) => ({ ...record }));
  }
}
