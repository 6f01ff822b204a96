import path from "node:path";

import { isInventoryArtifact } from "./inventory-paths";

export type InventoryIgnoreOptions = {
  // absolute path of the persisted table
  outputFilePath: string;
  tempFilePrefixes: readonly string[];
};

export function isExcludedDirName(name: string, excludedDirNames: readonly string[]): boolean {
  return excludedDirNames.includes(name);
}

export function isTransientFileName(name: string, tempFilePrefixes: readonly string[]): boolean {
  return tempFilePrefixes.some((prefix) => name.startsWith(prefix));
}

/**
 * Files the scanner never lists: the output table under any directory (same
 * name, case-insensitive), the table's own backups and temp saves in its
 * directory, and lock/temp files left by editors.
 */
export function isIgnoredFile(absPath: string, options: InventoryIgnoreOptions): boolean {
  const name = path.basename(absPath);
  const output = path.resolve(options.outputFilePath);

  if (name.toLowerCase() === path.basename(output).toLowerCase()) return true;
  if (path.dirname(path.resolve(absPath)) === path.dirname(output) && isInventoryArtifact(name, output)) {
    return true;
  }
  return isTransientFileName(name, options.tempFilePrefixes);
}
