import { ZERO, multiply, parseDecimal, roundHalfUp, toFixed } from "./decimal";
import type { Decimal } from "./decimal";
import type { RowInput } from "./schema";

export const AMOUNT_PLACES = 2;

/**
 * Settlement amount = freight rate × settled tons, rounded half-up to two places.
 * A blank or unparseable input yields zero; it is not an error.
 */
export function computeAmount(freightRate: string, settledTons: string): Decimal {
  const rate = parseDecimal(freightRate);
  const tons = parseDecimal(settledTons);
  if (rate == null || tons == null) return roundHalfUp(ZERO, AMOUNT_PLACES);
  return roundHalfUp(multiply(rate, tons), AMOUNT_PLACES);
}

export function rowAmount(row: Pick<RowInput, "freightRate" | "settledTons">): Decimal {
  return computeAmount(row.freightRate, row.settledTons);
}

export function formatRowAmount(row: Pick<RowInput, "freightRate" | "settledTons">): string {
  return toFixed(rowAmount(row), AMOUNT_PLACES);
}

/** True when a non-blank numeric input cannot be parsed (the boundary flags it). */
export function isInvalidNumericInput(raw: string): boolean {
  return raw.trim() !== "" && parseDecimal(raw) == null;
}
