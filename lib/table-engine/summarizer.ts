/**
 * Summarize: backfill every row's amount, total them in fixed point, and
 * finalize an Open sheet name to "{startDate}-{endDate}".
 */

import { EmptySheetError } from "@/lib/errors";
import { AMOUNT_PLACES, rowAmount } from "./amount";
import { roundHalfUp, sum, toFixed } from "./decimal";
import type { Decimal } from "./decimal";
import { projectRows } from "./sheet";
import type { Row, Sheet, SheetNaming } from "./schema";

export interface SummaryResult {
  sheet: Sheet;
  /** Two-decimal total, same value as sheet.totalAmount */
  total: string;
  /** Rows with freshly computed amounts */
  rows: Row[];
}

/** Only an Open name whose date is the sheet's start date is finalized; Finalized and Custom names are kept. */
export function finalizeNaming(naming: SheetNaming, startDate: string, endDate: string): SheetNaming {
  if (naming.kind !== "open" || naming.startDate !== startDate) return naming;
  return { kind: "finalized", startDate, endDate };
}

export function totalOf(sheet: Sheet): Decimal {
  return roundHalfUp(sum(sheet.rows.map(rowAmount)), AMOUNT_PLACES);
}

export function summarize(sheet: Sheet): SummaryResult {
  if (sheet.rows.length === 0) throw new EmptySheetError("Cannot summarize a sheet with no rows");
  const rows = projectRows(sheet);
  const total = toFixed(totalOf(sheet), AMOUNT_PLACES);
  const endDate = rows[rows.length - 1].loadDate;
  const updated: Sheet = {
    ...sheet,
    naming: finalizeNaming(sheet.naming, sheet.startDate, endDate),
    totalAmount: total,
  };
  return { sheet: updated, total, rows };
}
