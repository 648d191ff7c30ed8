/**
 * Status Report
 */

import type { StateSnapshot } from "../state/models/watched-file.js";
import type { DispatchRecord } from "../dispatch/models/dispatch-record.js";
import type { TickSummary } from "../scanner/models/scan-models.js";
import type { ConfigSummary } from "../config/config-summary.js";

export interface StatusReport {
  running: boolean;
  startedAt?: string;
  uptimeSeconds: number;
  ticks: number;
  lastTick?: TickSummary;
  state: StateSnapshot;
  pendingDelayed: number;
  recentDispatches: DispatchRecord[];
  config: ConfigSummary;
}

export interface StatusSource {
  status(): StatusReport;
}
