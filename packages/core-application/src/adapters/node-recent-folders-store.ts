import fs from "node:fs/promises";
import path from "node:path";

import type { RecentFoldersStore } from "../ports/recent-folders-store";
import type { Logger } from "../ports/logger";
import { describeError } from "../application/errors";
import { isDirectory } from "./node-folder-scanner";

export const DEFAULT_MAX_RECENT_FOLDERS = 15;

/**
 * Most-recently-used folder list kept as a plain text file, one path per
 * line, newest first.
 */
export class NodeRecentFoldersStore implements RecentFoldersStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
    private readonly maxEntries: number = DEFAULT_MAX_RECENT_FOLDERS
  ) {}

  async list(): Promise<string[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn("Could not read recent folders", { file: this.filePath, error: describeError(err) });
      }
      return [];
    }

    const unique: string[] = [];
    for (const line of raw.split(/\r?\n/)) {
      const p = line.trim();
      if (p && !unique.includes(p)) unique.push(p);
    }
    return unique.slice(0, this.maxEntries);
  }

  async add(folder: string): Promise<void> {
    const p = folder.trim();
    if (!p || !(await isDirectory(p))) return;

    const current = (await this.list()).filter((x) => x !== p);
    current.unshift(p);

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, current.slice(0, this.maxEntries).join("\n") + "\n", "utf-8");
    } catch (err) {
      this.logger.warn("Could not write recent folders", { file: this.filePath, error: describeError(err) });
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
