/**
 * CSV export: header row with the fixed column labels, then one line per row.
 * UTF-8 with a byte-order mark so spreadsheet tools pick the right encoding.
 * Pure read of the sheet; totals are only present if the caller summarized first.
 */

import ExcelJS from "exceljs";
import { formatDateISO, formatFixed2 } from "@/lib/format";
import { COLUMN_LABELS, FIXED_COLUMNS } from "./schema";
import type { ColumnSpec, Row, Sheet } from "./schema";
import { projectRows } from "./sheet";

export const CSV_BOM = "\ufeff";
export const CSV_DELIMITER = ",";
export const CSV_ROW_DELIMITER = "\n";

const CSV_SHEET = "ledger";

/** Cell text for one column. Derived values come from the live projection. */
export function exportCellText(row: Row, column: ColumnSpec): string {
  const raw = row[column.key];
  if (column.key === "amount") return raw;
  if (column.kind === "number") return formatFixed2(raw);
  if (column.kind === "date") return formatDateISO(raw) || raw.trim();
  return raw;
}

export function exportRowCells(row: Row): string[] {
  return FIXED_COLUMNS.map((column) => exportCellText(row, column));
}

export async function exportCsv(sheet: Sheet): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(CSV_SHEET);
  worksheet.addRow([...COLUMN_LABELS]);
  for (const row of projectRows(sheet)) {
    worksheet.addRow(exportRowCells(row));
  }

  const body = await workbook.csv.writeBuffer({
    sheetName: CSV_SHEET,
    formatterOptions: { delimiter: CSV_DELIMITER, rowDelimiter: CSV_ROW_DELIMITER },
  });
  return Buffer.concat([Buffer.from(CSV_BOM, "utf8"), Buffer.from(body)]);
}
