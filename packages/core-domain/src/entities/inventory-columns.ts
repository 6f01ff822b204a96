/**
 * Column layout of the persisted inventory table. Order is significant: it is
 * the order written to disk.
 */
export const INVENTORY_COLUMNS = [
  "FolderPath",
  "FileName",
  "Extension",
  "SizeBytes",
  "LastModified",
  "FullPath",
  "ContentHint",
  "IdentifiedTopics",
  "Status",
  "ManualNotes",
] as const;

export type InventoryColumn = (typeof INVENTORY_COLUMNS)[number];

export const KEY_COLUMN: InventoryColumn = "FullPath";

/** One stored row; `null` is an empty cell. */
export type InventoryRow = Record<InventoryColumn, string | number | null>;
