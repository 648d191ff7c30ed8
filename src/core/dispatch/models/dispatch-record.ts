/**
 * Dispatch Record Model
 *
 * One entry per dispatch attempt. Kept in memory only; used for logging and
 * for matching completion callbacks back to files.
 */

import type { DispatchStrategy } from "../../config/models/config.js";

export type DispatchRecordStatus = "sent" | "acknowledged" | "error";

export interface DispatchRecord {
  correlationId: string;
  path: string;
  fileName: string;
  destination: string;
  schema?: string;
  /** mtime of the observation that was dispatched */
  mtime: number;
  dispatchedAt: number;
  strategy: DispatchStrategy;
  status: DispatchRecordStatus;
  error?: string;
  acknowledgedAt?: number;
}
