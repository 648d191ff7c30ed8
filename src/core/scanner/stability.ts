/**
 * Stability Check
 *
 * A candidate is stable when, after the settle delay, its mtime and size
 * still match what the tick observed and it is not empty.
 */

import type { IFileSource } from "./interfaces/IFileSource.js";
import type { StabilityResult } from "./models/scan-models.js";
import { ErrorCode, ScanError, errorMessage } from "../errors.js";
import { sleep as defaultSleep, type SleepFn } from "../../utils/async.js";
import type { FileStats } from "../../utils/fs.js";

export interface ObservedStat {
  mtimeMs: number;
  size: number;
}

export async function checkStability(
  source: IFileSource,
  filePath: string,
  observed: ObservedStat,
  settleMs: number,
  sleep: SleepFn = defaultSleep
): Promise<StabilityResult> {
  if (settleMs > 0) {
    await sleep(settleMs);
  }

  let stats: FileStats;
  try {
    stats = await source.stat(filePath);
  } catch (error) {
    const reason = errorMessage(error);
    return {
      kind: "error",
      reason,
      error: new ScanError(`Could not re-stat ${filePath}: ${reason}`, ErrorCode.SCAN_STAT_FAILED, { filePath }),
    };
  }

  if (stats.mtimeMs !== observed.mtimeMs || stats.size !== observed.size) {
    return { kind: "not-ready", reason: "changed during settle window", stats };
  }
  if (stats.size === 0) {
    return { kind: "not-ready", reason: "empty", stats };
  }
  return { kind: "stable", stats };
}
