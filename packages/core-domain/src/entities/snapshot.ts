import type { FileRecord } from "./file-record";

export interface InventorySnapshot {
  sourceFolder: string;
  // absolute path of the persisted table for this folder
  location: string;
  records: FileRecord[];
}

/**
 * Index records by `fullPath`. A key seen twice keeps the position of its
 * first occurrence and the values of its last one.
 */
export function indexByFullPath(records: readonly FileRecord[]): Map<string, FileRecord> {
  const byPath = new Map<string, FileRecord>();
  for (const record of records) {
    byPath.set(record.fullPath, record);
  }
  return byPath;
}

export function dedupeByFullPath(records: readonly FileRecord[]): FileRecord[] {
  return [...indexByFullPath(records).values()];
}
