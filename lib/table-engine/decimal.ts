/**
 * Fixed-point decimal arithmetic for freight amounts.
 * A value is an integer coefficient with a count of fractional digits, so
 * products and sums never pass through binary floating point.
 */

export interface Decimal {
  readonly units: bigint;
  /** Number of digits after the decimal point */
  readonly scale: number;
}

export const ZERO: Decimal = { units: 0n, scale: 0 };

const NUMERIC_INPUT = /^([+-])?(\d*)(?:\.(\d*))?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/** Parse user input ("12", "2.5", ".5", "-3"). Blank or malformed input returns null. */
export function parseDecimal(raw: string | number | null | undefined): Decimal | null {
  if (raw == null) return null;
  const text = typeof raw === "number" ? (Number.isFinite(raw) ? String(raw) : "") : raw;
  const s = text.trim();
  if (!s) return null;
  const match = s.match(NUMERIC_INPUT);
  if (!match) return null;
  const intPart = match[2] ?? "";
  const fracPart = match[3] ?? "";
  if (!intPart && !fracPart) return null;
  const magnitude = BigInt(`${intPart}${fracPart}` || "0");
  return { units: match[1] === "-" ? -magnitude : magnitude, scale: fracPart.length };
}

export function multiply(a: Decimal, b: Decimal): Decimal {
  return { units: a.units * b.units, scale: a.scale + b.scale };
}

function rescale(d: Decimal, scale: number): bigint {
  return d.units * pow10(scale - d.scale);
}

export function add(a: Decimal, b: Decimal): Decimal {
  const scale = Math.max(a.scale, b.scale);
  return { units: rescale(a, scale) + rescale(b, scale), scale };
}

export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) total = add(total, value);
  return total;
}

/** Round half-up (ties away from zero) to `places` fractional digits. */
export function roundHalfUp(d: Decimal, places: number): Decimal {
  if (d.scale <= places) return { units: rescale(d, places), scale: places };
  const divisor = pow10(d.scale - places);
  const negative = d.units < 0n;
  const magnitude = negative ? -d.units : d.units;
  let quotient = magnitude / divisor;
  if ((magnitude % divisor) * 2n >= divisor) quotient += 1n;
  return { units: negative ? -quotient : quotient, scale: places };
}

/** Render with exactly `places` fractional digits, e.g. 250 → "250.00". */
export function toFixed(d: Decimal, places = 2): string {
  const rounded = roundHalfUp(d, places);
  const negative = rounded.units < 0n;
  const digits = (negative ? -rounded.units : rounded.units).toString().padStart(places + 1, "0");
  const whole = places > 0 ? `${digits.slice(0, -places)}.${digits.slice(-places)}` : digits;
  return negative ? `-${whole}` : whole;
}

export function isZero(d: Decimal): boolean {
  return d.units === 0n;
}

/** Lossy conversion for display and spreadsheet cells only. */
export function toNumber(d: Decimal): number {
  return Number(toFixed(d, d.scale));
}
