/**
 * Load-date sequencing. Row i (0-based) is always loaded on startDate + i days;
 * dates are recomputed on every read and never stored per row.
 */

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Parse YYYY-MM-DD (single-digit month/day accepted) into a UTC midnight Date; null when not a calendar date. */
export function parseIsoDate(raw: string | null | undefined): Date | null {
  const value = String(raw ?? "").trim();
  const match = value.match(ISO_DATE);
  if (!match) return null;
  const y = Number(match[1]);
  const m = Number(match[2]);
  const d = Number(match[3]);
  const parsed = new Date(Date.UTC(y, m - 1, d));
  if (parsed.getUTCFullYear() !== y || parsed.getUTCMonth() + 1 !== m || parsed.getUTCDate() !== d) {
    return null;
  }
  return parsed;
}

export function toIsoDate(date: Date): string {
  const y = String(date.getUTCFullYear()).padStart(4, "0");
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** Local calendar date of `now`, as YYYY-MM-DD. */
export function localIsoDate(now: Date): string {
  const y = String(now.getFullYear()).padStart(4, "0");
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function isIsoDate(raw: string): boolean {
  return parseIsoDate(raw) !== null;
}

function requireDate(startDate: string): Date {
  const parsed = parseIsoDate(startDate);
  if (!parsed) throw new RangeError(`Not a YYYY-MM-DD date: ${startDate}`);
  return parsed;
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(requireDate(isoDate).getTime() + days * DAY_MS));
}

/** Load date of the row at `index` (0-based). */
export function loadDateAt(startDate: string, index: number): string {
  return addDays(startDate, index);
}

/** `count` consecutive dates beginning at startDate. */
export function loadDates(startDate: string, count: number): string[] {
  const start = requireDate(startDate).getTime();
  const dates: string[] = [];
  for (let i = 0; i < count; i++) dates.push(toIsoDate(new Date(start + i * DAY_MS)));
  return dates;
}

/** Load date of the last row; null for an empty sheet. */
export function lastLoadDate(startDate: string, count: number): string | null {
  if (count <= 0) return null;
  return loadDateAt(startDate, count - 1);
}
