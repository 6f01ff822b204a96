import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import type { FileRecord } from "@file-inventory/core-domain";
import type { FolderScanner, ScanRequest, ScanResult } from "../ports/folder-scanner";
import type { Logger } from "../ports/logger";
import { describeError, type InventoryWarning } from "../application/errors";
import { describeContent } from "./content-hints";
import { isExcludedDirName, isIgnoredFile } from "./inventory-ignore";

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

const byName = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/**
 * Walks a folder tree and builds one {@link FileRecord} per file. Within a
 * directory, files are listed before subdirectories, both in name order.
 */
export class NodeFolderScanner implements FolderScanner {
  constructor(private readonly logger: Logger) {}

  async scan(request: ScanRequest): Promise<ScanResult> {
    const root = path.resolve(request.rootFolder);
    if (!(await isDirectory(root))) {
      return { ok: false, kind: "FolderNotFound", message: `Start folder '${request.rootFolder}' not found.` };
    }

    const records: FileRecord[] = [];
    const warnings: InventoryWarning[] = [];
    await this.walk(root, request, records, warnings);

    this.logger.debug("Folder scanned", { root, files: records.length, skipped: warnings.length });
    return { ok: true, records, warnings };
  }

  private async walk(
    dir: string,
    request: ScanRequest,
    records: FileRecord[],
    warnings: InventoryWarning[]
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.skip(warnings, dir, err);
      return;
    }

    // links are followed when the entry is stat'ed
    const files = entries.filter((e) => !e.isDirectory()).sort(byName);
    const dirs = entries
      .filter((e) => e.isDirectory() && !isExcludedDirName(e.name, request.excludedDirNames))
      .sort(byName);

    for (const entry of files) {
      const abs = path.join(dir, entry.name);
      if (isIgnoredFile(abs, request)) continue;

      try {
        const record = await this.buildRecord(dir, entry.name, abs, request);
        if (record) records.push(record);
      } catch (err) {
        this.skip(warnings, abs, err);
      }
    }

    for (const entry of dirs) {
      await this.walk(path.join(dir, entry.name), request, records, warnings);
    }
  }

  private async buildRecord(
    dir: string,
    fileName: string,
    abs: string,
    request: ScanRequest
  ): Promise<FileRecord | null> {
    const stat = await fs.stat(abs);
    if (!stat.isFile()) return null;

    const extension = path.extname(fileName).toLowerCase();
    const { contentHint, topics } = await describeContent(abs, extension, request.topicRules);

    return {
      folderPath: dir,
      fileName,
      extension,
      sizeBytes: stat.size,
      lastModified: stat.mtime.toISOString(),
      fullPath: abs,
      contentHint,
      topics,
      status: "Added",
      manualNotes: "",
    };
  }

  private skip(warnings: InventoryWarning[], p: string, err: unknown) {
    const message = `Could not process '${p}': ${describeError(err)}. Skipping.`;
    this.logger.warn(message, { path: p });
    warnings.push({ kind: "RecordReadFailure", path: p, message });
  }
}
