import path from "node:path";

import {
  emptyChangeSet,
  type ChangeSet,
  type FileRecord,
  type InventorySnapshot,
} from "@file-inventory/core-domain";
import type { FolderScanner } from "../ports/folder-scanner";
import type { InventoryStore } from "../ports/inventory-store";
import type { Logger } from "../ports/logger";
import { systemClock, type Clock } from "../ports/clock";
import type { InventoryConfig } from "../config/inventory-config";
import type { InventoryWarning } from "../application/errors";
import { LocationLock } from "../adapters/location-lock";
import { isDirectory } from "../adapters/node-folder-scanner";
import { toDisplayRow, type DisplayRow } from "../value-objects/display-row";
import type { NoteEdit } from "../value-objects/note-edit";
import { filterRecords, type FilterCriteria } from "./inventory-filter";
import { reconcile, summarizeChanges } from "./reconcile";

export type ScanOutcome = {
  ok: boolean;
  snapshot: InventorySnapshot | null;
  rows: DisplayRow[];
  statusMessage: string;
  changes: ChangeSet;
  warnings: InventoryWarning[];
  saved: boolean;
};

export type NotesSaveOutcome = {
  ok: boolean;
  snapshot: InventorySnapshot;
  statusMessage: string;
  lastSaved: string;
};

export type InventoryServiceDeps = {
  scanner: FolderScanner;
  store: InventoryStore;
  logger: Logger;
  config: Pick<
    InventoryConfig,
    "inventoryFileName" | "excludedDirNames" | "tempFilePrefixes" | "topicRules"
  >;
  clock?: Clock;
};

/** `YYYY-MM-DD HH:MM:SS` in local time. */
function formatSavedAt(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Entry point for a UI or any other caller: scan a folder against its
 * persisted inventory, save note edits, and project/filter rows.
 */
export class InventoryService {
  private readonly clock: Clock;
  // serializes whole requests per inventory file
  private readonly requests = new LocationLock();

  constructor(private readonly deps: InventoryServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  locationFor(folder: string): string {
    return path.join(path.resolve(folder), this.deps.config.inventoryFileName);
  }

  async scanFolder(folder: string): Promise<ScanOutcome> {
    const trimmed = folder.trim();
    if (!trimmed || !(await isDirectory(trimmed))) {
      return this.failedScan("Error: Invalid folder path.", [
        { kind: "FolderNotFound", path: trimmed, message: `Folder '${trimmed}' not found.` },
      ]);
    }

    const location = this.locationFor(trimmed);
    return this.requests.run(location, () => this.scanUnlocked(path.resolve(trimmed), location));
  }

  private async scanUnlocked(folder: string, location: string): Promise<ScanOutcome> {
    const { logger, scanner, store, config } = this.deps;
    logger.info("Starting scan", { folder, location });

    const recovery = await store.recover(location);
    const loaded = await store.load(location);
    const warnings = [...recovery.warnings, ...loaded.warnings];

    const scan = await scanner.scan({
      rootFolder: folder,
      outputFilePath: location,
      excludedDirNames: config.excludedDirNames,
      tempFilePrefixes: config.tempFilePrefixes,
      topicRules: config.topicRules,
    });
    if (!scan.ok) {
      return this.failedScan(`Error: ${scan.message}`, [
        ...warnings,
        { kind: scan.kind, path: folder, message: scan.message },
      ]);
    }
    warnings.push(...scan.warnings);

    const { records, changes } = reconcile(scan.records, loaded.records);
    const snapshot: InventorySnapshot = { sourceFolder: folder, location, records };

    const saveResult = await store.save(records, location);
    warnings.push(...saveResult.warnings);

    let statusMessage = summarizeChanges(changes);
    if (!saveResult.ok) {
      warnings.push({ kind: saveResult.kind, path: location, message: saveResult.message });
      statusMessage += " Warning: the inventory file could not be saved.";
    }

    logger.info(statusMessage, { folder, warnings: warnings.length });
    return {
      ok: true,
      snapshot,
      rows: records.map(toDisplayRow),
      statusMessage,
      changes,
      warnings,
      saved: saveResult.ok,
    };
  }

  private failedScan(statusMessage: string, warnings: InventoryWarning[]): ScanOutcome {
    this.deps.logger.warn(statusMessage, { warnings: warnings.length });
    return {
      ok: false,
      snapshot: null,
      rows: [],
      statusMessage,
      changes: emptyChangeSet(),
      warnings,
      saved: false,
    };
  }

  /**
   * Apply note edits keyed by `fullPath` and persist the snapshot. Edits for
   * unknown paths are ignored.
   */
  async saveNotes(snapshot: InventorySnapshot, edits: readonly NoteEdit[]): Promise<NotesSaveOutcome> {
    const lastSaved = formatSavedAt(this.clock.now());

    if (snapshot.records.length === 0) {
      return { ok: false, snapshot, statusMessage: "Cannot save: Master data is empty.", lastSaved: "Never" };
    }

    const notes = new Map(edits.map((e) => [e.fullPath, e.manualNotes]));
    const records: FileRecord[] = snapshot.records.map((r) => {
      const note = notes.get(r.fullPath);
      return note === undefined ? r : { ...r, manualNotes: note };
    });
    const updated: InventorySnapshot = { ...snapshot, records };

    const result = await this.requests.run(snapshot.location, () =>
      this.deps.store.save(records, snapshot.location)
    );
    if (!result.ok) {
      return { ok: false, snapshot: updated, statusMessage: "Error: Failed to save notes to file.", lastSaved: "Error" };
    }

    return {
      ok: true,
      snapshot: updated,
      statusMessage: `Notes saved successfully to ${path.basename(snapshot.location)}. (at ${lastSaved})`,
      lastSaved,
    };
  }

  filter(snapshot: InventorySnapshot | null, criteria: FilterCriteria): DisplayRow[] {
    if (!snapshot) return [];
    return filterRecords(snapshot.records, criteria).map(toDisplayRow);
  }
}
