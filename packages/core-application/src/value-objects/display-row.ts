import { formatTopics, type FileRecord, type FileStatus } from "@file-inventory/core-domain";

export const OPEN_FOLDER_ACTION = "📂";

/** Presentation projection handed to the UI collaborator. */
export type DisplayRow = {
  action: string;
  fileName: string;
  status: FileStatus;
  lastModified: string;
  topics: string;
  contentHint: string;
  manualNotes: string;
  fullPath: string;
};

export function toDisplayRow(record: FileRecord): DisplayRow {
  return {
    action: OPEN_FOLDER_ACTION,
    fileName: record.fileName,
    status: record.status,
    lastModified: record.lastModified,
    topics: formatTopics(record.topics),
    contentHint: record.contentHint,
    manualNotes: record.manualNotes,
    fullPath: record.fullPath,
  };
}
