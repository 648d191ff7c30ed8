/**
 * Node File Source
 *
 * Lists with fast-glob and filters extensions case-insensitively, so
 * `REPORT.CSV` is picked up by a `.csv` rule on every platform.
 */

import type { IFileSource, ListOptions } from "../interfaces/IFileSource.js";
import {
  directoryExists,
  findFiles,
  getFileStats,
  hasSupportedExtension,
  type FileStats,
} from "../../../utils/fs.js";

export class NodeFileSource implements IFileSource {
  async rootExists(root: string): Promise<boolean> {
    return directoryExists(root);
  }

  async list(root: string, options: ListOptions): Promise<string[]> {
    const files = await findFiles({
      patterns: ["**/*"],
      ignore: [...options.ignore],
      cwd: root,
      absolute: true,
    });
    return files.filter((file) => hasSupportedExtension(file, options.extensions)).sort();
  }

  async stat(filePath: string): Promise<FileStats> {
    return getFileStats(filePath);
  }
}
