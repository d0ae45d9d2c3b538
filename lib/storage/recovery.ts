/**
 * Startup recovery: brings the catalog and the sheet files back into agreement
 * after an interrupted write or delete.
 */

import { mkdir, readdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { PersistenceError } from "@/lib/errors";
import type { LedgerPaths } from "@/lib/env";
import type { Settings, SheetMeta } from "@/lib/table-engine/schema";
import { decodeCatalog, emptyCatalog, reconcileRecent, withSheet, withoutSheet } from "./catalog";
import type { Catalog } from "./catalog";
import { TEMP_SUFFIX, readJsonFile, writeJsonAtomic } from "./json-file";
import { fromSheetRecord, toSheetMeta } from "./sheet-record";

export const SHEET_SUFFIX = ".json";
export const DELETED_SUFFIX = ".deleted";

export function sheetFile(paths: LedgerPaths, id: string): string {
  return join(paths.tablesDir, `${id}${SHEET_SUFFIX}`);
}

async function listTableDir(paths: LedgerPaths): Promise<string[]> {
  try {
    await mkdir(paths.tablesDir, { recursive: true });
    return await readdir(paths.tablesDir);
  } catch (error) {
    throw new PersistenceError(`Failed to list ${paths.tablesDir}`, paths.tablesDir, error);
  }
}

async function loadCatalog(paths: LedgerPaths): Promise<Catalog | null> {
  try {
    const raw = await readJsonFile(paths.catalogFile);
    if (raw === undefined) return null;
    const catalog = decodeCatalog(raw);
    if (!catalog) console.warn("[table-store] catalog has unexpected shape, rebuilding", { path: paths.catalogFile });
    return catalog;
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    console.warn("[table-store] catalog unreadable, rebuilding", { path: paths.catalogFile, msg: error.message });
    return null;
  }
}

async function adopt(paths: LedgerPaths, id: string, settings: Settings): Promise<SheetMeta | null> {
  const path = sheetFile(paths, id);
  try {
    const sheet = fromSheetRecord(await readJsonFile(path), settings);
    if (sheet && sheet.id === id) return toSheetMeta(sheet);
    console.warn("[table-store] skipping unusable sheet file", { path });
    return null;
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    console.warn("[table-store] skipping unreadable sheet file", { path, msg: error.message });
    return null;
  }
}

export async function recoverCatalog(paths: LedgerPaths, settings: Settings): Promise<Catalog> {
  const loaded = await loadCatalog(paths);
  let catalog = loaded ?? emptyCatalog();
  let changed = loaded == null;

  try {
    await rm(`${paths.catalogFile}${TEMP_SUFFIX}`, { force: true });
  } catch (error) {
    throw new PersistenceError(`Recovery failed for ${paths.catalogFile}`, paths.catalogFile, error);
  }

  const entries = await listTableDir(paths);
  const present = new Set<string>();

  for (const name of entries) {
    const path = join(paths.tablesDir, name);
    try {
      if (name.endsWith(TEMP_SUFFIX)) {
        await rm(path, { force: true });
      } else if (name.endsWith(`${SHEET_SUFFIX}${DELETED_SUFFIX}`)) {
        const id = name.slice(0, -`${SHEET_SUFFIX}${DELETED_SUFFIX}`.length);
        // Catalog still lists the sheet: the delete never committed, so put the file back.
        if (catalog.sheets[id] && !entries.includes(`${id}${SHEET_SUFFIX}`)) {
          await rename(path, sheetFile(paths, id));
          present.add(id);
          console.warn("[table-store] restored sheet from interrupted delete", { id });
        } else {
          await rm(path, { force: true });
        }
      } else if (name.endsWith(SHEET_SUFFIX)) {
        present.add(name.slice(0, -SHEET_SUFFIX.length));
      }
    } catch (error) {
      throw new PersistenceError(`Recovery failed for ${path}`, path, error);
    }
  }

  for (const id of Object.keys(catalog.sheets)) {
    if (present.has(id)) continue;
    console.warn("[table-store] dropping catalog entry without sheet file", { id });
    catalog = withoutSheet(catalog, id);
    changed = true;
  }

  for (const id of present) {
    if (catalog.sheets[id]) continue;
    const meta = await adopt(paths, id, settings);
    if (!meta) continue;
    console.warn("[table-store] adopting sheet missing from catalog", { id });
    catalog = withSheet(catalog, meta);
    changed = true;
  }

  const reconciled = reconcileRecent(catalog, settings.recentLimit);
  if (reconciled.recent.join("\n") !== catalog.recent.join("\n")) changed = true;

  if (changed) {
    await writeJsonAtomic(paths.catalogFile, reconciled);
    console.info("[table-store] catalog synced", {
      sheets: Object.keys(reconciled.sheets).length,
      rebuilt: loaded == null,
    });
  }
  return reconciled;
}
