import type { FileRecord } from "@file-inventory/core-domain";
import type { InventoryWarning } from "../application/errors";

export type LoadResult = {
  records: FileRecord[];
  warnings: InventoryWarning[];
};

export type SaveResult =
  | { ok: true; rowCount: number; warnings: InventoryWarning[] }
  | { ok: false; kind: "SaveVerificationFailed" | "SaveFailed"; message: string; warnings: InventoryWarning[] };

export type RecoveryResult = {
  recovered: boolean;
  source: "temp" | "backup" | null;
  warnings: InventoryWarning[];
};

export interface InventoryStore {
  /** Never throws; corrupt or missing tables load as empty. */
  load(location: string): Promise<LoadResult>;
  save(records: readonly FileRecord[], location: string): Promise<SaveResult>;
  /** Restores a missing or empty table from leftover artifacts. Never throws. */
  recover(location: string): Promise<RecoveryResult>;
}
