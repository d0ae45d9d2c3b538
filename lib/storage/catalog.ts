/**
 * Catalog: sheet metadata by id plus the recently-opened list, kept in one
 * record so both change in a single write.
 */

import type { SheetMeta } from "@/lib/table-engine/schema";
import { isRecord, readString } from "./json-file";

export const CATALOG_VERSION = 1;

export interface Catalog {
  version: typeof CATALOG_VERSION;
  sheets: Record<string, SheetMeta>;
  /** Most recently opened first, no duplicates, every id present in `sheets` */
  recent: string[];
}

export function emptyCatalog(): Catalog {
  return { version: CATALOG_VERSION, sheets: {}, recent: [] };
}

/** Promote `id` to the front, dropping the oldest entries past `limit`. */
export function touchRecent(recent: readonly string[], id: string, limit: number): string[] {
  return [id, ...recent.filter((x) => x !== id)].slice(0, Math.max(1, limit));
}

export function withSheet(catalog: Catalog, meta: SheetMeta): Catalog {
  return { ...catalog, sheets: { ...catalog.sheets, [meta.id]: meta } };
}

export function withRecent(catalog: Catalog, id: string, limit: number): Catalog {
  return { ...catalog, recent: touchRecent(catalog.recent, id, limit) };
}

export function withoutSheet(catalog: Catalog, id: string): Catalog {
  const sheets = { ...catalog.sheets };
  delete sheets[id];
  return { ...catalog, sheets, recent: catalog.recent.filter((x) => x !== id) };
}

/** Recent list restricted to known ids, deduplicated and bounded. */
export function reconcileRecent(catalog: Catalog, limit: number): Catalog {
  const seen = new Set<string>();
  const recent: string[] = [];
  for (const id of catalog.recent) {
    if (!catalog.sheets[id] || seen.has(id)) continue;
    seen.add(id);
    recent.push(id);
  }
  return { ...catalog, recent: recent.slice(0, Math.max(1, limit)) };
}

export function listRecentMeta(catalog: Catalog): SheetMeta[] {
  const out: SheetMeta[] = [];
  for (const id of catalog.recent) {
    const meta = catalog.sheets[id];
    if (meta) out.push(meta);
  }
  return out;
}

/** Newest first by creation time; id breaks ties so the order is stable. */
export function listAllMeta(catalog: Catalog): SheetMeta[] {
  return Object.values(catalog.sheets).sort(
    (a, b) => b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id)
  );
}

function decodeMeta(id: string, raw: unknown): SheetMeta | null {
  if (!isRecord(raw)) return null;
  const rowCount = raw.rowCount;
  return {
    id,
    name: readString(raw, "name"),
    startDate: readString(raw, "startDate"),
    rowCount: typeof rowCount === "number" && Number.isInteger(rowCount) && rowCount >= 0 ? rowCount : 0,
    createdAt: readString(raw, "createdAt"),
    modifiedAt: readString(raw, "modifiedAt"),
  };
}

/** Decode a stored catalog; null when the value is not a catalog at all. */
export function decodeCatalog(raw: unknown): Catalog | null {
  if (!isRecord(raw) || !isRecord(raw.sheets)) return null;
  const sheets: Record<string, SheetMeta> = {};
  for (const [id, value] of Object.entries(raw.sheets)) {
    const meta = decodeMeta(id, value);
    if (meta) sheets[id] = meta;
  }
  const recent = Array.isArray(raw.recent) ? raw.recent.filter((x): x is string => typeof x === "string") : [];
  return { version: CATALOG_VERSION, sheets, recent };
}
