import { Workbook, type CellValue, type Worksheet } from "exceljs";

import { INVENTORY_COLUMNS, type InventoryRow } from "@file-inventory/core-domain";
import type { StoredTable, TableCodec } from "../ports/table-codec";
import { TableFormatError } from "../application/errors";

export const SHEET_NAME = "File Inventory";
const MAX_COLUMN_WIDTH = 70;

/** Flatten an exceljs cell value into the scalar the store works with. */
export function cellToScalar(value: CellValue | undefined): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "boolean") return String(value);
  if (value instanceof Date) return value.toISOString();

  if ("richText" in value) return value.richText.map((part) => part.text).join("");
  if ("text" in value) return String(value.text);
  if ("result" in value) {
    const result = value.result;
    if (result === undefined || result === null) return null;
    if (typeof result === "object" && "error" in result) return null;
    return cellToScalar(result);
  }
  if ("error" in value) return null;
  return null;
}

function readHeader(sheet: Worksheet): string[] {
  const header = sheet.getRow(1);
  const columns: string[] = [];
  for (let col = 1; col <= header.cellCount; col++) {
    const name = cellToScalar(header.getCell(col).value);
    columns.push(name === null ? "" : String(name).trim());
  }
  return columns;
}

function columnWidth(rows: readonly InventoryRow[], column: (typeof INVENTORY_COLUMNS)[number]): number {
  let longest = column.length;
  for (const row of rows) {
    const value = row[column];
    if (value !== null) longest = Math.max(longest, String(value).length);
  }
  return Math.min(longest + 2, MAX_COLUMN_WIDTH);
}

/**
 * Stores the inventory as a single-sheet `.xlsx` workbook: header row first,
 * one row per record, columns sized to their content.
 */
export class XlsxTableCodec implements TableCodec {
  async read(filePath: string): Promise<StoredTable> {
    const workbook = new Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (err) {
      throw new TableFormatError(`Cannot open workbook '${filePath}'`, filePath, err);
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) throw new TableFormatError(`Workbook '${filePath}' has no worksheet`, filePath);

    const columns = readHeader(sheet);
    const rows: StoredTable["rows"] = [];

    for (let r = 2; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      if (!row.hasValues) continue;

      const record: Record<string, string | number | null> = {};
      columns.forEach((name, index) => {
        if (name) record[name] = cellToScalar(row.getCell(index + 1).value);
      });
      rows.push(record);
    }

    return { columns, rows };
  }

  async write(filePath: string, rows: readonly InventoryRow[]): Promise<void> {
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet(SHEET_NAME);

    sheet.columns = INVENTORY_COLUMNS.map((column) => ({
      header: column,
      key: column,
      width: columnWidth(rows, column),
    }));
    for (const row of rows) {
      sheet.addRow(row);
    }

    await workbook.xlsx.writeFile(filePath);
  }
}
