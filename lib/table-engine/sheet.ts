/**
 * Sheet model: creation, row edits and the derived row projection.
 * Every edit returns a new Sheet; callers decide when to persist.
 */

import { EmptySheetError, InvalidDateError } from "@/lib/errors";
import { formatRowAmount } from "./amount";
import { lastLoadDate, loadDates, localIsoDate, parseIsoDate, toIsoDate } from "./date-sequencer";
import { AMOUNT_INPUTS } from "./schema";
import type { EditableField, Row, RowInput, Settings, Sheet, SheetNaming } from "./schema";

const FINALIZED_NAME = /^(\d{4}-\d{2}-\d{2})-(\d{4}-\d{2}-\d{2})$/;

export function openNaming(startDate: string): SheetNaming {
  return { kind: "open", startDate };
}

export function sheetDisplayName(naming: SheetNaming): string {
  switch (naming.kind) {
    case "open":
      return `${naming.startDate}-`;
    case "finalized":
      return `${naming.startDate}-${naming.endDate}`;
    case "custom":
      return naming.name;
  }
}

export function sheetName(sheet: Sheet): string {
  return sheetDisplayName(sheet.naming);
}

/** Classify a stored or user-typed name against the sheet's start date. */
export function classifySheetName(name: string, startDate: string): SheetNaming {
  if (name === `${startDate}-`) return openNaming(startDate);
  const finalized = name.match(FINALIZED_NAME);
  if (finalized && parseIsoDate(finalized[1]) && parseIsoDate(finalized[2])) {
    return { kind: "finalized", startDate: finalized[1], endDate: finalized[2] };
  }
  return { kind: "custom", name };
}

/** Blank start date means today; anything else must be a calendar date. */
export function resolveStartDate(raw: string | null | undefined, now: Date): string {
  const value = String(raw ?? "").trim();
  if (!value) return localIsoDate(now);
  const parsed = parseIsoDate(value);
  if (!parsed) throw new InvalidDateError(value);
  return toIsoDate(parsed);
}

export function blankRow(settings: Pick<Settings, "defaultVehicle" | "defaultModel">): RowInput {
  return {
    loadPlace: "",
    vehicle: settings.defaultVehicle,
    productModel: settings.defaultModel,
    loadNetWeight: "",
    unloadDate: "",
    unloadPlace: "",
    unloadWeightTons: "",
    freightRate: "",
    settledTons: "",
  };
}

/** Fill a blank vehicle/model with the configured defaults. */
export function applyRowDefaults(
  row: RowInput,
  settings: Pick<Settings, "defaultVehicle" | "defaultModel">
): RowInput {
  return {
    ...row,
    vehicle: row.vehicle.trim() ? row.vehicle : settings.defaultVehicle,
    productModel: row.productModel.trim() ? row.productModel : settings.defaultModel,
  };
}

function requireRowCount(count: number): number {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Row count must be a positive integer, got ${count}`);
  }
  return count;
}

export interface NewSheetInput {
  id: string;
  startDate: string;
  rowCount: number;
  settings: Settings;
  now: Date;
}

export function newSheet(input: NewSheetInput): Sheet {
  const startDate = resolveStartDate(input.startDate, input.now);
  const count = requireRowCount(input.rowCount);
  const timestamp = input.now.toISOString();
  return {
    id: input.id,
    naming: openNaming(startDate),
    startDate,
    rows: Array.from({ length: count }, () => blankRow(input.settings)),
    createdAt: timestamp,
    modifiedAt: timestamp,
    totalAmount: null,
  };
}

/** Full 11-field view of every row, with load date and amount derived now. */
export function projectRows(sheet: Sheet): Row[] {
  const dates = loadDates(sheet.startDate, sheet.rows.length);
  return sheet.rows.map((row, i) => ({ ...row, loadDate: dates[i], amount: formatRowAmount(row) }));
}

function requireRowIndex(sheet: Sheet, rowIndex: number): void {
  if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= sheet.rows.length) {
    throw new RangeError(`Row index ${rowIndex} out of range (0..${sheet.rows.length - 1})`);
  }
}

export function projectRow(sheet: Sheet, rowIndex: number): Row {
  requireRowIndex(sheet, rowIndex);
  return projectRows(sheet)[rowIndex];
}

export function lastRowLoadDate(sheet: Sheet): string | null {
  return lastLoadDate(sheet.startDate, sheet.rows.length);
}

export function setCell(sheet: Sheet, rowIndex: number, field: EditableField, value: string): Sheet {
  requireRowIndex(sheet, rowIndex);
  const rows = sheet.rows.map((row, i) => (i === rowIndex ? { ...row, [field]: value } : row));
  return {
    ...sheet,
    rows,
    totalAmount: AMOUNT_INPUTS.includes(field) ? null : sheet.totalAmount,
  };
}

export function resizeRows(sheet: Sheet, count: number, settings: Settings): Sheet {
  requireRowCount(count);
  if (count === sheet.rows.length) return sheet;
  const rows =
    count < sheet.rows.length
      ? sheet.rows.slice(0, count)
      : [...sheet.rows, ...Array.from({ length: count - sheet.rows.length }, () => blankRow(settings))];
  return { ...sheet, rows, totalAmount: null };
}

export function addRow(sheet: Sheet, settings: Settings): Sheet {
  return resizeRows(sheet, sheet.rows.length + 1, settings);
}

export function removeLastRow(sheet: Sheet, settings: Settings): Sheet {
  if (sheet.rows.length <= 1) throw new EmptySheetError("A sheet keeps at least one row");
  return resizeRows(sheet, sheet.rows.length - 1, settings);
}

/** Move the whole date sequence. An Open name follows the new start date. */
export function setStartDate(sheet: Sheet, startDate: string): Sheet {
  const parsed = parseIsoDate(startDate);
  if (!parsed) throw new InvalidDateError(startDate.trim());
  const next = toIsoDate(parsed);
  return {
    ...sheet,
    startDate: next,
    naming: sheet.naming.kind === "open" ? openNaming(next) : sheet.naming,
  };
}

export function renameSheet(sheet: Sheet, name: string): Sheet {
  const trimmed = name.trim();
  if (!trimmed) throw new RangeError("Sheet name cannot be blank");
  return { ...sheet, naming: classifySheetName(trimmed, sheet.startDate) };
}
