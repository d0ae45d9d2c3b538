/**
 * Excel export: one worksheet per ledger sheet, frozen header, numeric cells as
 * numbers with two-decimal format, and a 合计 row summing the amount column.
 */

import ExcelJS from "exceljs";
import { formatDateISO } from "@/lib/format";
import { parseDecimal, toNumber } from "./decimal";
import { FIXED_COLUMNS } from "./schema";
import type { Row, Sheet } from "./schema";
import { projectRows, sheetName } from "./sheet";
import { totalOf } from "./summarizer";

export const TOTAL_LABEL = "合计";
export const FALLBACK_SHEET_NAME = "运输明细";

const NUMBER_FORMAT = "0.00";
const AMOUNT_COLUMN = FIXED_COLUMNS.findIndex((c) => c.key === "amount") + 1;

const HEADER_FILL: ExcelJS.Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FFE5E7EB" },
};

export function sanitizeSheetName(name: string, fallback: string = FALLBACK_SHEET_NAME): string {
  const cleaned = name.replace(/[/\\?*\[\]:]/g, "").trim().slice(0, 31);
  return cleaned || fallback;
}

function columnLetter(col: number): string {
  let n = col;
  let out = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

function cellValue(row: Row, col: number): ExcelJS.CellValue {
  const column = FIXED_COLUMNS[col];
  const raw = row[column.key];
  if (column.kind === "number") {
    const parsed = parseDecimal(raw);
    if (parsed != null) return toNumber(parsed);
    return raw.trim() || null;
  }
  if (column.kind === "date") return formatDateISO(raw) || raw.trim() || null;
  return raw || null;
}

export async function buildSheetWorkbook(sheet: Sheet): Promise<ExcelJS.Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date(sheet.createdAt);
  workbook.modified = new Date(sheet.modifiedAt);

  const ws = workbook.addWorksheet(sanitizeSheetName(sheetName(sheet)), {
    views: [{ state: "frozen", ySplit: 1 }],
  });

  FIXED_COLUMNS.forEach((column, c) => {
    const cell = ws.getCell(1, c + 1);
    cell.value = column.label;
    cell.font = { bold: true };
    cell.fill = HEADER_FILL;
    cell.alignment = { horizontal: "center" };
    ws.getColumn(c + 1).width = column.kind === "date" ? 12 : 14;
  });

  const rows = projectRows(sheet);
  rows.forEach((row, i) => {
    const r = i + 2;
    FIXED_COLUMNS.forEach((column, c) => {
      const cell = ws.getCell(r, c + 1);
      cell.value = cellValue(row, c);
      if (column.kind === "number") {
        cell.numFmt = NUMBER_FORMAT;
        cell.alignment = { horizontal: "right" };
      }
    });
  });

  const totalRow = rows.length + 2;
  const amountLetter = columnLetter(AMOUNT_COLUMN);
  ws.getCell(totalRow, 1).value = TOTAL_LABEL;
  ws.getCell(totalRow, 1).font = { bold: true };
  const totalCell = ws.getCell(totalRow, AMOUNT_COLUMN);
  totalCell.value = {
    formula: `SUM(${amountLetter}2:${amountLetter}${totalRow - 1})`,
    result: toNumber(totalOf(sheet)),
    date1904: false,
  };
  totalCell.numFmt = NUMBER_FORMAT;
  totalCell.font = { bold: true };
  totalCell.alignment = { horizontal: "right" };

  return workbook.xlsx.writeBuffer();
}
