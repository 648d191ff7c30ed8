/**
 * File System Utilities
 * Discovery, stat and path helpers used by the scanner and config loader
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * File statistics with the fields the scanner compares between ticks
 */
export interface FileStats {
  path: string;
  size: number;
  /** Modification time, ms since epoch */
  mtimeMs: number;
  isFile: boolean;
  extension: string;
}

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Forward slashes and lower case. Matching only; never used to open files.
 */
export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").toLowerCase();
}

/**
 * Base name of a path written with either separator
 */
export function baseName(filePath: string): string {
  const normalized = filePath.replace(/\\/g, "/");
  const index = normalized.lastIndexOf("/");
  return index >= 0 ? normalized.slice(index + 1) : normalized;
}

/**
 * Case-insensitive extension check. `extensions` must be lower case with a leading dot.
 */
export function hasSupportedExtension(filePath: string, extensions: readonly string[]): boolean {
  return extensions.includes(path.extname(filePath).toLowerCase());
}

/**
 * Get file statistics
 */
export async function getFileStats(filePath: string): Promise<FileStats> {
  const stats = await fsPromises.stat(filePath);
  return {
    path: filePath,
    size: stats.size,
    mtimeMs: stats.mtimeMs,
    isFile: stats.isFile(),
    extension: path.extname(filePath).toLowerCase(),
  };
}

/**
 * Find files matching glob patterns
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const {
    patterns,
    ignore = [],
    cwd = process.cwd(),
    absolute = true,
    onlyFiles = true,
  } = options;

  return fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    ignore,
    dot: false,
    followSymbolicLinks: false,
    suppressErrors: true,
  });
}

/**
 * Check if a directory exists
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fsPromises.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Synchronous file exists check
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content, "utf-8");
}
