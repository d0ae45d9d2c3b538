/**
 * Editor session for one open sheet: cell edits with debounced autosave,
 * summarize, chain to the next sheet, file exports, and the two-step delete.
 * Holds no UI; a view binds to `current`, `rows()`, `status` and the returned rows.
 */

import { join } from "node:path";
import { formatAmountDisplay } from "@/lib/format";
import { writeFileAtomic } from "@/lib/storage/json-file";
import type { TableStore } from "@/lib/storage/table-store";
import { exportCsv } from "@/lib/table-engine/csv-export";
import { buildSheetWorkbook } from "@/lib/table-engine/excel-export";
import type { EditableField, Row, Sheet } from "@/lib/table-engine/schema";
import {
  addRow,
  projectRow,
  projectRows,
  removeLastRow,
  renameSheet,
  setCell,
  setStartDate,
  sheetName,
} from "@/lib/table-engine/sheet";
import { summarize } from "@/lib/table-engine/summarizer";

export type SessionStatus = "idle" | "loaded" | "dirty" | "saved" | "summarized" | "error";

export interface SummaryOutcome {
  sheet: Sheet;
  total: string;
  message: string;
}

/** Returned by requestDelete; nothing is removed until confirm() is called. */
export interface PendingDeletion {
  readonly sheetId: string;
  readonly name: string;
  confirm(): Promise<void>;
}

export function exportFileName(sheet: Sheet, extension: "csv" | "xlsx"): string {
  const base = (sheetName(sheet) || sheet.id).replace(/[\\/]/g, "_");
  return base.toLowerCase().endsWith(`.${extension}`) ? base : `${base}.${extension}`;
}

export class LedgerSession {
  private sheet: Sheet | null = null;
  private isDirty = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  status: SessionStatus = "idle";
  lastError: unknown = null;

  constructor(private readonly store: TableStore) {}

  get current(): Sheet | null {
    return this.sheet;
  }

  get dirty(): boolean {
    return this.isDirty;
  }

  rows(): Row[] {
    return this.sheet ? projectRows(this.sheet) : [];
  }

  async create(startDate: string, rowCount?: number): Promise<Sheet> {
    await this.close();
    const sheet = await this.store.createSheet(startDate, rowCount);
    this.load(sheet);
    return sheet;
  }

  async open(id: string): Promise<Sheet> {
    await this.close();
    const sheet = await this.store.openSheet(id);
    this.load(sheet);
    return sheet;
  }

  /** Flush pending edits, then forget the sheet. */
  async close(): Promise<void> {
    if (this.sheet && this.isDirty) await this.save();
    this.discard();
  }

  /** Stop the autosave timer without saving (view teardown). */
  dispose(): void {
    this.cancelAutosave();
  }

  /** Apply an edit and return the re-projected row, amount included. */
  editCell(rowIndex: number, field: EditableField, value: string): Row {
    const next = setCell(this.requireSheet(), rowIndex, field, value);
    this.replace(next);
    return projectRow(next, rowIndex);
  }

  setStartDate(startDate: string): Sheet {
    return this.replace(setStartDate(this.requireSheet(), startDate));
  }

  addRow(): Sheet {
    return this.replace(addRow(this.requireSheet(), this.store.settings));
  }

  removeLastRow(): Sheet {
    return this.replace(removeLastRow(this.requireSheet(), this.store.settings));
  }

  rename(name: string): Sheet {
    return this.replace(renameSheet(this.requireSheet(), name));
  }

  async save(): Promise<Sheet> {
    this.cancelAutosave();
    const sheet = this.requireSheet();
    const saved = await this.store.saveSheet(sheet);
    // Edits made while the write was in flight stay in memory and remain dirty.
    if (this.sheet === sheet) {
      this.sheet = saved;
      this.isDirty = false;
      this.status = "saved";
    }
    return saved;
  }

  /** Save, then open a new sheet starting the day after this one, with the same row count. */
  async saveAndNext(): Promise<Sheet> {
    const saved = await this.save();
    const next = await this.store.createNextSheet(saved, saved.rows.length);
    // Edits made while the chain was being written belong to the previous sheet.
    while (this.isDirty && this.sheet?.id === saved.id) await this.save();
    this.discard();
    this.load(next);
    return next;
  }

  async summarize(): Promise<SummaryOutcome> {
    this.cancelAutosave();
    const sheet = this.requireSheet();
    const result = summarize(sheet);
    const saved = await this.store.saveSheet(result.sheet);
    if (this.sheet === sheet) {
      this.sheet = saved;
      this.isDirty = false;
      this.status = "summarized";
    }
    return {
      sheet: saved,
      total: result.total,
      message: `总金额：${formatAmountDisplay(result.total)}\n表名：${sheetName(saved)}`,
    };
  }

  /** Write the current sheet as CSV into the exports directory; returns the file path. */
  async exportCsv(): Promise<string> {
    const sheet = this.requireSheet();
    const path = join(this.store.paths.exportsDir, exportFileName(sheet, "csv"));
    await writeFileAtomic(path, await exportCsv(sheet));
    console.info("[ledger-session] exported csv", { id: sheet.id, path });
    return path;
  }

  async exportWorkbook(): Promise<string> {
    const sheet = this.requireSheet();
    const path = join(this.store.paths.exportsDir, exportFileName(sheet, "xlsx"));
    const buffer = await buildSheetWorkbook(sheet);
    await writeFileAtomic(path, Buffer.from(buffer));
    console.info("[ledger-session] exported workbook", { id: sheet.id, path });
    return path;
  }

  /**
   * First half of a delete: names the sheet for the confirmation prompt.
   * Defaults to the current sheet. The store is only touched by confirm().
   */
  requestDelete(id?: string): PendingDeletion {
    const sheetId = id ?? this.requireSheet().id;
    const meta = this.store.listAll().find((m) => m.id === sheetId);
    const name = this.sheet?.id === sheetId ? sheetName(this.sheet) : (meta?.name ?? sheetId);
    let confirmed = false;
    return {
      sheetId,
      name,
      confirm: async () => {
        if (confirmed) throw new Error(`Deletion of ${sheetId} was already confirmed`);
        if (this.sheet?.id === sheetId) this.cancelAutosave();
        try {
          await this.store.deleteSheet(sheetId);
        } catch (error) {
          // The sheet is still there; pending edits go back on the autosave timer.
          if (this.sheet?.id === sheetId && this.isDirty) this.scheduleAutosave();
          throw error;
        }
        confirmed = true;
        if (this.sheet?.id === sheetId) this.discard();
      },
    };
  }

  private load(sheet: Sheet): void {
    this.sheet = sheet;
    this.isDirty = false;
    this.status = "loaded";
    this.lastError = null;
  }

  private discard(): void {
    this.cancelAutosave();
    this.sheet = null;
    this.isDirty = false;
    this.status = "idle";
  }

  private replace(next: Sheet): Sheet {
    this.sheet = next;
    this.isDirty = true;
    this.status = "dirty";
    this.scheduleAutosave();
    return next;
  }

  private requireSheet(): Sheet {
    if (!this.sheet) throw new Error("No sheet is open");
    return this.sheet;
  }

  private scheduleAutosave(): void {
    this.cancelAutosave();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.autosave();
    }, this.store.settings.autosaveMs);
  }

  private cancelAutosave(): void {
    if (this.timer !== null) clearTimeout(this.timer);
    this.timer = null;
  }

  private async autosave(): Promise<void> {
    if (!this.sheet || !this.isDirty) return;
    try {
      await this.save();
    } catch (error) {
      this.status = "error";
      this.lastError = error;
      console.error("[ledger-session] autosave failed", {
        id: this.sheet?.id,
        msg: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
