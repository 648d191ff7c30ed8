/**
 * In-process stand-ins shared by the test suites
 */

import * as path from "node:path";
import { parseConfig, DEFAULT_CONFIG_DOCUMENT } from "../config/config-loader.js";
import type { Config, ConfigDocumentInput, Destination } from "../config/models/config.js";
import type { IDispatchClient } from "../dispatch/interfaces/IDispatchClient.js";
import type {
  IProcessingEventLog,
  ProcessingEvent,
  ProcessingEventStatus,
} from "../history/processing-event-log.js";
import type { IFileSource, ListOptions } from "../scanner/interfaces/IFileSource.js";
import { DispatchError, ErrorCode } from "../errors.js";
import { baseName, hasSupportedExtension, type FileStats } from "../../utils/fs.js";

// =============================================================================
// Config
// =============================================================================

export interface TestConfigOverrides {
  watcher?: Partial<ConfigDocumentInput["watcher"]>;
  patterns?: ConfigDocumentInput["patterns"];
  dispatch?: ConfigDocumentInput["dispatch"];
}

export function makeConfig(overrides: TestConfigOverrides = {}): Config {
  return parseConfig(
    {
      watcher: {
        watch_paths: ["/watch"],
        poll_interval_seconds: 10,
        stability_delay_seconds: 2,
        ...overrides.watcher,
      },
      patterns: overrides.patterns ?? DEFAULT_CONFIG_DOCUMENT.patterns,
      dispatch: overrides.dispatch ?? {},
      completion: { enabled: false },
      logging: { level: "silent", log_dir: "/tmp/ingest-watch-test-logs" },
    },
    { baseDir: "/" }
  );
}

// =============================================================================
// File Source
// =============================================================================

interface MemoryFile {
  size: number;
  mtimeMs: number;
}

/**
 * Files live in a map; writes are explicit so tests control every mtime.
 */
export class MemoryFileSource implements IFileSource {
  readonly statCalls: string[] = [];
  private readonly roots: Set<string>;
  private readonly files = new Map<string, MemoryFile>();
  private readonly failing = new Set<string>();
  /** Applied right after the next stat of the given path */
  private readonly afterStat = new Map<string, () => void>();

  constructor(roots: string[] = ["/watch"]) {
    this.roots = new Set(roots);
  }

  write(filePath: string, size: number, mtimeMs: number): void {
    this.files.set(filePath, { size, mtimeMs });
  }

  remove(filePath: string): void {
    this.files.delete(filePath);
  }

  failStat(filePath: string, failing = true): void {
    if (failing) this.failing.add(filePath);
    else this.failing.delete(filePath);
  }

  onNextStat(filePath: string, action: () => void): void {
    this.afterStat.set(filePath, action);
  }

  async rootExists(root: string): Promise<boolean> {
    return this.roots.has(root);
  }

  async list(root: string, options: ListOptions): Promise<string[]> {
    const prefix = root.endsWith("/") ? root : `${root}/`;
    return [...this.files.keys()]
      .filter((file) => file.startsWith(prefix) && hasSupportedExtension(file, options.extensions))
      .sort();
  }

  async stat(filePath: string): Promise<FileStats> {
    this.statCalls.push(filePath);
    if (this.failing.has(filePath)) {
      throw new Error(`EACCES: permission denied, stat '${filePath}'`);
    }
    const file = this.files.get(filePath);
    if (!file) {
      throw new Error(`ENOENT: no such file or directory, stat '${filePath}'`);
    }
    const stats: FileStats = {
      path: filePath,
      size: file.size,
      mtimeMs: file.mtimeMs,
      isFile: true,
      extension: path.extname(filePath).toLowerCase(),
    };
    const action = this.afterStat.get(filePath);
    if (action) {
      this.afterStat.delete(filePath);
      action();
    }
    return stats;
  }
}

// =============================================================================
// Dispatch Client
// =============================================================================

export interface RecordedDispatch {
  path: string;
  destination: Destination;
}

export class RecordingDispatchClient implements IDispatchClient {
  readonly strategy = "raw-envelope" as const;
  readonly calls: RecordedDispatch[] = [];
  closed = 0;
  private failures = 0;

  /** The next `count` dispatches reject as if the broker were down */
  failNext(count = 1): void {
    this.failures = count;
  }

  async dispatch(filePath: string, destination: Destination): Promise<string> {
    if (this.failures > 0) {
      this.failures--;
      throw new DispatchError("Broker unreachable at list \"celery\"", ErrorCode.DISPATCH_BROKER_UNREACHABLE, {
        filePath,
        destination: destination.name,
      });
    }
    this.calls.push({ path: filePath, destination });
    return `${baseName(filePath)}_${this.calls.length}`;
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

// =============================================================================
// Event Log
// =============================================================================

export class MemoryEventLog implements IProcessingEventLog {
  readonly events: ProcessingEvent[] = [];

  async record(filepath: string, status: ProcessingEventStatus, details = ""): Promise<void> {
    this.events.push({
      timestamp: new Date(0).toISOString(),
      filepath,
      filename: baseName(filepath),
      status,
      details,
    });
  }

  async recent(limit = 50): Promise<ProcessingEvent[]> {
    return limit > 0 ? this.events.slice(-limit) : [];
  }
}
