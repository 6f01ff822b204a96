import fs from "node:fs/promises";
import path from "node:path";

import { dedupeByFullPath, KEY_COLUMN, type FileRecord, type InventoryRow } from "@file-inventory/core-domain";
import type { InventoryStore, LoadResult, RecoveryResult, SaveResult } from "../ports/inventory-store";
import type { StoredTable, TableCodec } from "../ports/table-codec";
import type { Logger } from "../ports/logger";
import { systemClock, type Clock } from "../ports/clock";
import {
  describeError,
  SaveVerificationFailedError,
  type InventoryWarning,
} from "../application/errors";
import {
  backupTimestamp,
  recoveryTempPathsFor,
  rollingBackupPathFor,
  rotatingBackupPrefixFor,
  tempPathFor,
} from "./inventory-paths";
import { recordToRow, rowToRecord } from "./inventory-rows";
import { LocationLock } from "./location-lock";

export const DEFAULT_MAX_BACKUPS = 5;
const PARTIAL_SUFFIX = ".partial";

export type NodeInventoryStoreOptions = {
  codec: TableCodec;
  logger: Logger;
  clock?: Clock;
  maxBackups?: number;
  lock?: LocationLock;
};

async function fileSize(p: string): Promise<number | null> {
  try {
    const stat = await fs.stat(p);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

/** Copy through a sibling so `dest` is either the old file or the full copy. */
async function copyAtomic(src: string, dest: string): Promise<void> {
  const partial = `${dest}${PARTIAL_SUFFIX}`;
  try {
    await fs.copyFile(src, partial);
    await fs.rename(partial, dest);
  } finally {
    await fs.rm(partial, { force: true });
  }
}

/**
 * Keeps the inventory table on disk. Saves never replace the current file
 * until the new one has been written and read back; each save also refreshes
 * a rolling `.bak` copy and a capped set of timestamped backups.
 */
export class NodeInventoryStore implements InventoryStore {
  private readonly codec: TableCodec;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly maxBackups: number;
  private readonly lock: LocationLock;

  constructor(options: NodeInventoryStoreOptions) {
    this.codec = options.codec;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    this.lock = options.lock ?? new LocationLock();
  }

  /* ---------------- load ---------------- */

  load(location: string): Promise<LoadResult> {
    return this.lock.run(location, () => this.loadUnlocked(path.resolve(location)));
  }

  private async loadUnlocked(location: string): Promise<LoadResult> {
    if ((await fileSize(location)) === null) {
      this.logger.info("Inventory file not found, a new one will be created", { location });
      return { records: [], warnings: [] };
    }

    const corrupt = (message: string): LoadResult => {
      this.logger.error(message, { location });
      return { records: [], warnings: [{ kind: "LoadCorrupt", path: location, message }] };
    };

    let table: StoredTable;
    try {
      table = await this.codec.read(location);
    } catch (err) {
      return corrupt(`Could not load inventory '${location}': ${describeError(err)}. Inventory will be rebuilt.`);
    }

    if (!table.columns.includes(KEY_COLUMN)) {
      return corrupt(`'${KEY_COLUMN}' column missing in '${location}'. Inventory will be rebuilt.`);
    }

    const records: FileRecord[] = [];
    for (const row of table.rows) {
      const record = rowToRecord(row);
      if (record) records.push(record);
    }

    const unique = dedupeByFullPath(records);
    this.logger.info("Inventory loaded", { location, records: unique.length });
    return { records: unique, warnings: [] };
  }

  /* ---------------- save ---------------- */

  save(records: readonly FileRecord[], location: string): Promise<SaveResult> {
    return this.lock.run(location, () => this.saveUnlocked(records, path.resolve(location)));
  }

  private async saveUnlocked(records: readonly FileRecord[], location: string): Promise<SaveResult> {
    const warnings: InventoryWarning[] = [];
    const rows = dedupeByFullPath(records).map(recordToRow);
    // an empty file is neither a source of notes nor worth a backup
    const hasContent = ((await fileSize(location)) ?? 0) > 0;

    if (hasContent) {
      await this.mergeExistingNotes(rows, location, warnings);
      await this.createBackups(location, warnings);
    }

    const temp = tempPathFor(location);
    try {
      await fs.mkdir(path.dirname(location), { recursive: true });
      await this.codec.write(temp, rows);
      await this.verify(temp, rows.length);
      await fs.rename(temp, location);
    } catch (err) {
      await fs.rm(temp, { force: true }).catch((rmErr: unknown) => {
        this.logger.warn("Could not remove temporary save file", { temp, error: describeError(rmErr) });
      });

      const kind = err instanceof SaveVerificationFailedError ? "SaveVerificationFailed" : "SaveFailed";
      const message = `Saving inventory to '${location}' failed: ${describeError(err)}`;
      this.logger.error(message, { location, kind });
      return { ok: false, kind, message, warnings };
    }

    this.logger.info("Inventory saved", { location, rows: rows.length });
    return { ok: true, rowCount: rows.length, warnings };
  }

  /** Fill blank notes from the file being replaced, so a blank edit never erases a saved note. */
  private async mergeExistingNotes(
    rows: InventoryRow[],
    location: string,
    warnings: InventoryWarning[]
  ): Promise<void> {
    let existingNotes: Map<string, string>;
    try {
      const table = await this.codec.read(location);
      existingNotes = new Map();
      for (const raw of table.rows) {
        const record = rowToRecord(raw);
        if (record && record.manualNotes.trim()) existingNotes.set(record.fullPath, record.manualNotes);
      }
    } catch (err) {
      const message = `Could not read existing notes from '${location}': ${describeError(err)}`;
      this.logger.warn(message, { location });
      warnings.push({ kind: "LoadCorrupt", path: location, message });
      return;
    }

    for (const row of rows) {
      const current = row.ManualNotes === null ? "" : String(row.ManualNotes);
      const key = String(row.FullPath);
      const saved = existingNotes.get(key);
      if (!current.trim() && saved !== undefined) row.ManualNotes = saved;
    }
  }

  private async createBackups(location: string, warnings: InventoryWarning[]): Promise<void> {
    try {
      await copyAtomic(location, rollingBackupPathFor(location));
    } catch (err) {
      this.backupWarning(location, warnings, err);
    }

    try {
      const rotating = `${location}.bak.${backupTimestamp(this.clock.now())}`;
      await copyAtomic(location, rotating);
      await this.pruneRotatingBackups(location);
    } catch (err) {
      this.backupWarning(location, warnings, err);
    }
  }

  private backupWarning(location: string, warnings: InventoryWarning[], err: unknown) {
    const message = `Backup creation failed: ${describeError(err)}`;
    this.logger.warn(message, { location });
    warnings.push({ kind: "SaveFailed", path: location, message });
  }

  /** Timestamped backups of `location`, oldest first. */
  async listRotatingBackups(location: string): Promise<string[]> {
    const dir = path.dirname(path.resolve(location));
    const prefix = rotatingBackupPrefixFor(location);

    const names = (await fs.readdir(dir)).filter(
      (name) => name.startsWith(prefix) && !name.endsWith(PARTIAL_SUFFIX)
    );

    const withTimes = await Promise.all(
      names.map(async (name) => {
        const stat = await fs.stat(path.join(dir, name));
        const createdMs = stat.birthtimeMs > 0 ? stat.birthtimeMs : stat.ctimeMs;
        return { file: path.join(dir, name), name, createdMs };
      })
    );

    withTimes.sort((a, b) => a.createdMs - b.createdMs || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return withTimes.map((b) => b.file);
  }

  private async pruneRotatingBackups(location: string): Promise<void> {
    const backups = await this.listRotatingBackups(location);
    const excess = backups.length - this.maxBackups;
    for (const file of backups.slice(0, Math.max(0, excess))) {
      await fs.rm(file, { force: true });
      this.logger.debug("Removed old backup", { file });
    }
  }

  private async verify(temp: string, expectedRows: number): Promise<void> {
    const size = await fileSize(temp);
    if (!size) {
      throw new SaveVerificationFailedError(`temporary file '${temp}' is missing or empty`, temp);
    }

    let table: StoredTable;
    try {
      table = await this.codec.read(temp);
    } catch (err) {
      throw new SaveVerificationFailedError(`temporary file '${temp}' cannot be read back`, temp, err);
    }

    if (!table.columns.includes(KEY_COLUMN)) {
      throw new SaveVerificationFailedError(`temporary file '${temp}' has no '${KEY_COLUMN}' column`, temp);
    }
    if (table.rows.length !== expectedRows) {
      throw new SaveVerificationFailedError(
        `temporary file '${temp}' holds ${table.rows.length} rows, expected ${expectedRows}`,
        temp
      );
    }
  }

  /* ---------------- recovery ---------------- */

  async recover(location: string): Promise<RecoveryResult> {
    const resolved = path.resolve(location);
    try {
      return await this.lock.run(resolved, () => this.recoverUnlocked(resolved));
    } catch (err) {
      const message = `Recovery attempt failed: ${describeError(err)}`;
      this.logger.error(message, { location: resolved });
      return {
        recovered: false,
        source: null,
        warnings: [{ kind: "RecoveryExhausted", path: resolved, message }],
      };
    }
  }

  private async isReadable(file: string): Promise<boolean> {
    if (!(await fileSize(file))) return false;
    try {
      const table = await this.codec.read(file);
      return table.columns.includes(KEY_COLUMN);
    } catch (err) {
      this.logger.warn("Recovery candidate is unreadable", { file, error: describeError(err) });
      return false;
    }
  }

  private async recoverUnlocked(location: string): Promise<RecoveryResult> {
    const size = await fileSize(location);
    if (size) return { recovered: false, source: null, warnings: [] };

    const backup = rollingBackupPathFor(location);
    let tempExists = false;
    for (const temp of recoveryTempPathsFor(location)) {
      if ((await fileSize(temp)) === null) continue;
      tempExists = true;
      if (await this.isReadable(temp)) {
        await fs.rename(temp, location);
        this.logger.info("Recovered inventory from temporary save file", { location, temp });
        return { recovered: true, source: "temp", warnings: [] };
      }
      await fs.rm(temp, { force: true });
    }

    const backupExists = (await fileSize(backup)) !== null;
    if (backupExists && (await this.isReadable(backup))) {
      await copyAtomic(backup, location);
      this.logger.info("Recovered inventory from backup file", { location });
      return { recovered: true, source: "backup", warnings: [] };
    }

    // nothing to do on a first run
    if (size === null && !tempExists && !backupExists) {
      return { recovered: false, source: null, warnings: [] };
    }

    const message = `No usable temporary or backup file to recover '${location}'`;
    this.logger.warn(message, { location });
    return { recovered: false, source: null, warnings: [{ kind: "RecoveryExhausted", path: location, message }] };
  }
}
