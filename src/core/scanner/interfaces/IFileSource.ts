/**
 * File Source Interface
 *
 * What the scanner needs from a filesystem. The Node implementation lists
 * with fast-glob; tests substitute an in-memory source.
 *
 * @module
 */

import type { FileStats } from "../../../utils/fs.js";

export interface ListOptions {
  /** Lower case, leading dot */
  extensions: readonly string[];
  /** Glob patterns, relative to the root */
  ignore: readonly string[];
}

export interface IFileSource {
  rootExists(root: string): Promise<boolean>;

  /** Absolute paths of every supported file under `root`, recursively */
  list(root: string, options: ListOptions): Promise<string[]>;

  /** @throws when the file cannot be stat'ed */
  stat(filePath: string): Promise<FileStats>;
}
