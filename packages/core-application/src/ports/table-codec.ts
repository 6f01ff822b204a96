import type { InventoryRow } from "@file-inventory/core-domain";

export type StoredTable = {
  // header names as found in the file, in file order
  columns: string[];
  rows: Array<Record<string, string | number | null>>;
};

/**
 * Physical container of the inventory table. Implementations throw when a
 * file cannot be opened or parsed.
 */
export interface TableCodec {
  read(filePath: string): Promise<StoredTable>;
  write(filePath: string, rows: readonly InventoryRow[]): Promise<void>;
}
