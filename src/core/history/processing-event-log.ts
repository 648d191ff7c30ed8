/**
 * Processing Event Log
 *
 * Append-only JSON-lines history of dispatches and completions, written to
 * `<logDir>/processing_events.log` and read back by `GET /processing_history`.
 *
 * @module
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { baseName, ensureDirectory } from "../../utils/fs.js";
import { createLogger, type Logger } from "../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export const PROCESSING_EVENTS_FILE = "processing_events.log";

export const ProcessingEventStatusSchema = z.enum(["triggered", "error", "completed_success", "completed_failure"]);
export type ProcessingEventStatus = z.infer<typeof ProcessingEventStatusSchema>;

export const ProcessingEventSchema = z.object({
  timestamp: z.string(),
  filepath: z.string(),
  filename: z.string(),
  status: ProcessingEventStatusSchema,
  details: z.string(),
});

export type ProcessingEvent = z.infer<typeof ProcessingEventSchema>;

/**
 * Where dispatch and completion outcomes are recorded
 */
export interface IProcessingEventLog {
  /** Never rejects; write failures are logged */
  record(filepath: string, status: ProcessingEventStatus, details?: string): Promise<void>;
  /** Last `limit` events, oldest first */
  recent(limit?: number): Promise<ProcessingEvent[]>;
}

export interface ProcessingEventLogOptions {
  logDir: string;
  fileName?: string;
  logger?: Logger;
  now?: () => Date;
}

// =============================================================================
// Implementation
// =============================================================================

export class ProcessingEventLog implements IProcessingEventLog {
  readonly filePath: string;

  private readonly logger: Logger;
  private readonly now: () => Date;
  /** Appends run one after another so lines never interleave */
  private pending: Promise<void> = Promise.resolve();

  constructor(options: ProcessingEventLogOptions) {
    this.filePath = path.join(options.logDir, options.fileName ?? PROCESSING_EVENTS_FILE);
    this.logger = options.logger ?? createLogger("event-log");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Appends one event. Write failures are logged, never thrown.
   */
  record(filepath: string, status: ProcessingEventStatus, details = ""): Promise<void> {
    const event: ProcessingEvent = {
      timestamp: this.now().toISOString(),
      filepath,
      filename: baseName(filepath),
      status,
      details,
    };
    const line = `${JSON.stringify(event)}\n`;

    this.pending = this.pending.then(async () => {
      try {
        await ensureDirectory(path.dirname(this.filePath));
        await fsPromises.appendFile(this.filePath, line, "utf-8");
      } catch (error) {
        this.logger.warn({ err: error, file: this.filePath, status }, "Failed to append processing event");
      }
    });
    return this.pending;
  }

  /**
   * Last `limit` events, oldest first. Malformed lines are skipped; a missing
   * file reads as empty.
   */
  async recent(limit = 50): Promise<ProcessingEvent[]> {
    await this.pending;

    let content: string;
    try {
      content = await fsPromises.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const events: ProcessingEvent[] = [];
    for (const line of content.split("\n")) {
      if (line.trim() === "") continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        continue;
      }
      const parsed = ProcessingEventSchema.safeParse(raw);
      if (parsed.success) {
        events.push(parsed.data);
      }
    }
    return limit > 0 ? events.slice(-limit) : [];
  }
}
