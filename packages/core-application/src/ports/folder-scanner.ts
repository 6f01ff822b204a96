import type { FileRecord, TopicRule } from "@file-inventory/core-domain";
import type { InventoryWarning } from "../application/errors";

export type ScanRequest = {
  rootFolder: string;
  // persisted table; skipped when it lives inside the scanned tree
  outputFilePath: string;
  excludedDirNames: readonly string[];
  tempFilePrefixes: readonly string[];
  topicRules: readonly TopicRule[];
};

export type ScanResult =
  | { ok: true; records: FileRecord[]; warnings: InventoryWarning[] }
  | { ok: false; kind: "FolderNotFound"; message: string };

export interface FolderScanner {
  /** Fresh records, status `Added`, in traversal order. */
  scan(request: ScanRequest): Promise<ScanResult>;
}
