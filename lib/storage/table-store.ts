/**
 * TableStore: sheet persistence, catalog listing, recent list, deletion and
 * chain-creation. One JSON file per sheet under tables/, one catalog.json.
 *
 * Writes to a sheet are serialized per id; catalog updates are serialized on
 * their own key and only replace the in-memory catalog after the file write
 * succeeded, so a failed write leaves both unchanged.
 */

import { rename, rm } from "node:fs/promises";
import { v4 as uuidv4 } from "uuid";
import { EmptySheetError, InvalidChainError, NotFoundError, PersistenceError } from "@/lib/errors";
import { getLedgerPaths } from "@/lib/env";
import type { LedgerPaths } from "@/lib/env";
import { addDays } from "@/lib/table-engine/date-sequencer";
import type { Settings, Sheet, SheetMeta } from "@/lib/table-engine/schema";
import { lastRowLoadDate, newSheet } from "@/lib/table-engine/sheet";
import { listAllMeta, listRecentMeta, withRecent, withSheet, withoutSheet } from "./catalog";
import type { Catalog } from "./catalog";
import { KeyedMutex } from "./keyed-mutex";
import { isMissingFile, readJsonFile, writeJsonAtomic } from "./json-file";
import { DELETED_SUFFIX, recoverCatalog, sheetFile } from "./recovery";
import { fromSheetRecord, toSheetMeta, toSheetRecord } from "./sheet-record";

/** Lock key for the catalog file; sheet ids always start with "tbl_". */
const CATALOG_LOCK = "catalog";

export interface TableStoreOptions {
  dataDir: string;
  settings: Settings;
  /** Clock for timestamps and "today"; tests pin it */
  now?: () => Date;
}

export function newSheetId(): string {
  return `tbl_${uuidv4().replace(/-/g, "").slice(0, 12)}`;
}

export class TableStore {
  private readonly locks = new KeyedMutex();

  private constructor(
    readonly paths: LedgerPaths,
    readonly settings: Settings,
    private catalog: Catalog,
    private readonly now: () => Date
  ) {}

  /** Open (or initialize) the store under `dataDir`, repairing anything an interrupted run left behind. */
  static async open(options: TableStoreOptions): Promise<TableStore> {
    const paths = getLedgerPaths(options.dataDir);
    const catalog = await recoverCatalog(paths, options.settings);
    return new TableStore(paths, options.settings, catalog, options.now ?? (() => new Date()));
  }

  has(id: string): boolean {
    return Boolean(this.catalog.sheets[id]);
  }

  listRecent(): SheetMeta[] {
    return listRecentMeta(this.catalog);
  }

  listAll(): SheetMeta[] {
    return listAllMeta(this.catalog);
  }

  async createSheet(startDate: string, rowCount?: number): Promise<Sheet> {
    const sheet = newSheet({
      id: newSheetId(),
      startDate,
      rowCount: rowCount ?? this.settings.initialRows,
      settings: this.settings,
      now: this.now(),
    });
    await this.locks.runExclusive(sheet.id, async () => {
      // Sheet file first: the catalog never points at a sheet that was not fully written.
      const path = sheetFile(this.paths, sheet.id);
      await writeJsonAtomic(path, toSheetRecord(sheet));
      try {
        await this.commitCatalog((c) => withRecent(withSheet(c, toSheetMeta(sheet)), sheet.id, this.settings.recentLimit));
      } catch (error) {
        // Uncatalogued files are adopted on the next open; a failed create must not come back.
        await rm(path, { force: true }).catch((cleanup: unknown) => {
          console.warn("[table-store] could not remove sheet file after failed create", {
            id: sheet.id,
            msg: cleanup instanceof Error ? cleanup.message : String(cleanup),
          });
        });
        throw error;
      }
    });
    console.info("[table-store] created", { id: sheet.id, startDate: sheet.startDate, rows: sheet.rows.length });
    return sheet;
  }

  /** Next sheet starts the day after the previous sheet's last load date. */
  async createNextSheet(previous: Sheet, rowCount?: number): Promise<Sheet> {
    const last = lastRowLoadDate(previous);
    if (last == null) throw new InvalidChainError();
    return this.createSheet(addDays(last, 1), rowCount);
  }

  async openSheet(id: string): Promise<Sheet> {
    return this.locks.runExclusive(id, async () => {
      if (!this.has(id)) throw new NotFoundError(id);
      const sheet = await this.readSheet(id);
      await this.commitCatalog((c) => withRecent(c, id, this.settings.recentLimit));
      return sheet;
    });
  }

  /** Persist rows and metadata; returns the saved sheet with a fresh modifiedAt. */
  async saveSheet(sheet: Sheet): Promise<Sheet> {
    if (sheet.rows.length === 0) throw new EmptySheetError("Cannot save a sheet with no rows");
    const snapshot: Sheet = { ...structuredClone(sheet), modifiedAt: this.now().toISOString() };
    return this.locks.runExclusive(snapshot.id, async () => {
      if (!this.has(snapshot.id)) throw new NotFoundError(snapshot.id);
      await writeJsonAtomic(sheetFile(this.paths, snapshot.id), toSheetRecord(snapshot));
      await this.commitCatalog((c) => withSheet(c, toSheetMeta(snapshot)));
      return snapshot;
    });
  }

  /**
   * Remove the sheet's data and its catalog/recent entries. Unconditional:
   * confirmation belongs to the caller. A failure leaves everything as it was.
   */
  async deleteSheet(id: string): Promise<void> {
    await this.locks.runExclusive(id, async () => {
      if (!this.has(id)) throw new NotFoundError(id);
      const path = sheetFile(this.paths, id);
      const remnant = `${path}${DELETED_SUFFIX}`;

      let moved = false;
      try {
        await rename(path, remnant);
        moved = true;
      } catch (error) {
        if (!isMissingFile(error)) throw new PersistenceError(`Failed to delete ${path}`, path, error);
      }

      try {
        await this.commitCatalog((c) => withoutSheet(c, id));
      } catch (error) {
        if (moved) await this.restoreRemnant(remnant, path);
        throw error;
      }

      if (moved) {
        await rm(remnant, { force: true }).catch((error: unknown) => {
          // Not reachable through the catalog any more; recovery removes it on next open.
          console.warn("[table-store] could not remove deleted sheet file", {
            id,
            msg: error instanceof Error ? error.message : String(error),
          });
        });
      }
      console.info("[table-store] deleted", { id });
    });
  }

  private async restoreRemnant(remnant: string, path: string): Promise<void> {
    try {
      await rename(remnant, path);
    } catch (error) {
      console.error("[table-store] could not restore sheet after failed delete; recovery will retry", {
        path,
        msg: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async readSheet(id: string): Promise<Sheet> {
    const path = sheetFile(this.paths, id);
    const raw = await readJsonFile(path);
    if (raw === undefined) throw new PersistenceError(`Sheet file missing for ${id}`, path);
    const sheet = fromSheetRecord(raw, this.settings);
    if (!sheet || sheet.id !== id) throw new PersistenceError(`Corrupt sheet record for ${id}`, path);
    return sheet;
  }

  private async commitCatalog(update: (current: Catalog) => Catalog): Promise<void> {
    await this.locks.runExclusive(CATALOG_LOCK, async () => {
      const next = update(this.catalog);
      await writeJsonAtomic(this.paths.catalogFile, next);
      this.catalog = next;
    });
  }
}
