import {
  formatTopics,
  isFileStatus,
  parseTopics,
  type FileRecord,
  type FileStatus,
  type InventoryRow,
} from "@file-inventory/core-domain";

type RawRow = Record<string, string | number | null | undefined>;

export function recordToRow(record: FileRecord): InventoryRow {
  return {
    FolderPath: record.folderPath,
    FileName: record.fileName,
    Extension: record.extension,
    SizeBytes: record.sizeBytes,
    LastModified: record.lastModified,
    FullPath: record.fullPath,
    ContentHint: record.contentHint,
    IdentifiedTopics: formatTopics(record.topics),
    Status: record.status,
    ManualNotes: record.manualNotes,
  };
}

function text(value: string | number | null | undefined): string {
  return value === null || value === undefined ? "" : String(value);
}

function integer(value: string | number | null | undefined): number {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : 0;
  const parsed = Number.parseInt(text(value), 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function status(value: string | number | null | undefined): FileStatus {
  const s = text(value).trim();
  if (isFileStatus(s)) return s;
  // older tables wrote "Removed (Not Found)"
  if (s.startsWith("Removed")) return "Removed";
  return "Active";
}

/**
 * Rebuild a record from a stored row, filling absent columns with defaults.
 * Returns null for rows without a key.
 */
export function rowToRecord(row: RawRow): FileRecord | null {
  const fullPath = text(row.FullPath).trim();
  if (!fullPath) return null;

  return {
    folderPath: text(row.FolderPath),
    fileName: text(row.FileName),
    extension: text(row.Extension),
    sizeBytes: integer(row.SizeBytes),
    lastModified: text(row.LastModified),
    fullPath,
    contentHint: text(row.ContentHint),
    topics: parseTopics(text(row.IdentifiedTopics)),
    status: status(row.Status),
    manualNotes: text(row.ManualNotes),
  };
}
