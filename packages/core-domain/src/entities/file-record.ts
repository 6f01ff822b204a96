export type FileStatus = "Active" | "Updated" | "Added" | "Removed";

export const FILE_STATUSES: readonly FileStatus[] = ["Active", "Updated", "Added", "Removed"];

export interface FileRecord {
  folderPath: string;
  fileName: string;
  extension: string;
  sizeBytes: number;
  lastModified: string;

  // primary key: absolute, resolved path
  fullPath: string;

  contentHint: string;
  topics: string[];
  status: FileStatus;
  manualNotes: string;
}

export function isFileStatus(value: unknown): value is FileStatus {
  return typeof value === "string" && (FILE_STATUSES as readonly string[]).includes(value);
}

/** Text shown for an empty topic list, both on disk and in search. */
export const NO_TOPICS = "N/A";

export function formatTopics(topics: readonly string[]): string {
  return topics.length > 0 ? topics.join(", ") : NO_TOPICS;
}

/**
 * Inverse of {@link formatTopics}. Anything starting with `N/A` (including
 * older annotated forms such as `N/A (Access error)`) reads back as no topics.
 */
export function parseTopics(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed || trimmed.startsWith(NO_TOPICS)) return [];
  return trimmed
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}
