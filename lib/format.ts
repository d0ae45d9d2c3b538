/**
 * Centralized formatting for ledger values: two-decimal numbers, totals, dates.
 * Export and display both go through these helpers.
 */

import { parseDecimal, toFixed, toNumber } from "@/lib/table-engine/decimal";
import type { Decimal } from "@/lib/table-engine/decimal";
import { parseIsoDate, toIsoDate } from "@/lib/table-engine/date-sequencer";

const NUMBER = (decimals: number) =>
  new Intl.NumberFormat("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });

/**
 * Numeric cell text with exactly two decimals ("2.5" → "2.50").
 * Blank stays blank; unparseable input is returned trimmed so nothing the user typed is lost.
 */
export function formatFixed2(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) return "";
  const value = parseDecimal(trimmed);
  return value == null ? trimmed : toFixed(value, 2);
}

/** Total for display, with thousand separators: "12345.6" → "12,345.60". */
export function formatAmountDisplay(value: Decimal | string | null | undefined): string {
  const parsed = typeof value === "string" ? parseDecimal(value) : value;
  if (parsed == null) return NUMBER(2).format(0);
  return NUMBER(2).format(toNumber(parsed));
}

/** Normalize to YYYY-MM-DD ("2026-2-5" → "2026-02-05"). Returns "" when not a calendar date. */
export function formatDateISO(value: string | Date | null | undefined): string {
  if (value == null) return "";
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "" : toIsoDate(value);
  const parsed = parseIsoDate(value);
  return parsed ? toIsoDate(parsed) : "";
}
