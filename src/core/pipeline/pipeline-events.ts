/**
 * Events published by the watch pipeline
 */

import type { TickSummary } from "../scanner/models/scan-models.js";
import type { DispatchRecord } from "../dispatch/models/dispatch-record.js";
import type { CompletionResult } from "../completion/models/completion.js";

export interface PipelineEvents {
  "tick:complete": TickSummary;
  "tick:error": { error: Error };
  dispatched: DispatchRecord;
  "dispatch:failed": DispatchRecord;
  completion: CompletionResult;
  "config:reloaded": { version: number };
  "rules:applied": { version: number; clearedNoMatch: number };
}
