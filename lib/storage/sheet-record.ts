/**
 * Persisted sheet record. Only source fields are stored: load dates and
 * amounts are recomputed whenever the sheet is read.
 */

import { parseIsoDate, toIsoDate } from "@/lib/table-engine/date-sequencer";
import { parseDecimal, toFixed } from "@/lib/table-engine/decimal";
import { EDITABLE_FIELDS } from "@/lib/table-engine/schema";
import type { RowInput, Settings, Sheet, SheetMeta } from "@/lib/table-engine/schema";
import { applyRowDefaults, blankRow, classifySheetName, sheetName } from "@/lib/table-engine/sheet";
import { isRecord, readString } from "./json-file";

export const RECORD_VERSION = 1;

export interface SheetRecord {
  version: typeof RECORD_VERSION;
  id: string;
  name: string;
  startDate: string;
  rows: RowInput[];
  createdAt: string;
  modifiedAt: string;
  totalAmount: string | null;
}

export function toSheetRecord(sheet: Sheet): SheetRecord {
  return {
    version: RECORD_VERSION,
    id: sheet.id,
    name: sheetName(sheet),
    startDate: sheet.startDate,
    rows: sheet.rows.map((row) => ({ ...row })),
    createdAt: sheet.createdAt,
    modifiedAt: sheet.modifiedAt,
    totalAmount: sheet.totalAmount,
  };
}

function decodeRow(raw: unknown, settings: Settings): RowInput {
  const source: Record<string, unknown> = isRecord(raw) ? raw : {};
  const row = blankRow({ defaultVehicle: "", defaultModel: "" });
  for (const key of EDITABLE_FIELDS) row[key] = readString(source, key);
  return applyRowDefaults(row, settings);
}

/**
 * Decode a stored record. Returns null when the value is not a usable sheet
 * (no id, no valid start date); the caller decides how to report it.
 */
export function fromSheetRecord(raw: unknown, settings: Settings): Sheet | null {
  if (!isRecord(raw)) return null;
  const id = readString(raw, "id").trim();
  const start = parseIsoDate(readString(raw, "startDate"));
  if (!id || !start) return null;
  const startDate = toIsoDate(start);
  const rows = Array.isArray(raw.rows) ? raw.rows.map((r) => decodeRow(r, settings)) : [];
  const name = readString(raw, "name").trim() || `${startDate}-`;
  const total = parseDecimal(readString(raw, "totalAmount"));
  const createdAt = readString(raw, "createdAt");
  return {
    id,
    naming: classifySheetName(name, startDate),
    startDate,
    rows,
    createdAt,
    modifiedAt: readString(raw, "modifiedAt") || createdAt,
    totalAmount: total == null ? null : toFixed(total, 2),
  };
}

export function toSheetMeta(sheet: Sheet): SheetMeta {
  return {
    id: sheet.id,
    name: sheetName(sheet),
    startDate: sheet.startDate,
    rowCount: sheet.rows.length,
    createdAt: sheet.createdAt,
    modifiedAt: sheet.modifiedAt,
  };
}
