import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveSettings } from "@/lib/config";
import { EmptySheetError, InvalidChainError, NotFoundError, PersistenceError } from "@/lib/errors";
import { setCell, sheetName } from "@/lib/table-engine/sheet";
import { summarize } from "@/lib/table-engine/summarizer";
import { TableStore, newSheetId } from "./table-store";

const settings = resolveSettings({ initialRows: 5, recentLimit: 3 });

let dataDir: string;
let tick: number;

function clock(): Date {
  tick += 1;
  return new Date(Date.UTC(2024, 0, 1, 0, 0, tick));
}

function openStore(): Promise<TableStore> {
  return TableStore.open({ dataDir, settings, now: clock });
}

function tableFile(id: string): string {
  return join(dataDir, "tables", `${id}.json`);
}

async function exists(path: string): Promise<boolean> {
  return stat(path).then(
    () => true,
    () => false
  );
}

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), "ledger-store-"));
  tick = 0;
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dataDir, { recursive: true, force: true });
});

describe("newSheetId", () => {
  it("is a short opaque id", () => {
    expect(newSheetId()).toMatch(/^tbl_[0-9a-f]{12}$/);
    expect(newSheetId()).not.toBe(newSheetId());
  });
});

describe("TableStore.open", () => {
  it("initializes an empty data directory", async () => {
    const store = await openStore();
    expect(store.listAll()).toEqual([]);
    expect(store.listRecent()).toEqual([]);
    const catalog = JSON.parse(await readFile(join(dataDir, "catalog.json"), "utf8"));
    expect(catalog).toEqual({ version: 1, sheets: {}, recent: [] });
  });
});

describe("createSheet", () => {
  it("persists a new sheet and lists it first", async () => {
    const store = await openStore();
    const sheet = await store.createSheet("2024-01-01");
    expect(sheet.rows).toHaveLength(5);
    expect(sheetName(sheet)).toBe("2024-01-01-");
    expect(store.listAll().map((m) => m.id)).toEqual([sheet.id]);
    expect(store.listRecent().map((m) => m.id)).toEqual([sheet.id]);
    expect(await exists(tableFile(sheet.id))).toBe(true);

    const record = JSON.parse(await readFile(tableFile(sheet.id), "utf8"));
    expect(record.rows[0].loadDate).toBeUndefined();
    expect(record.rows[0].amount).toBeUndefined();
  });

  it("leaves no sheet behind when the catalog cannot be written", async () => {
    const store = await openStore();
    const catalogFile = join(dataDir, "catalog.json");
    await rm(catalogFile);
    await mkdir(catalogFile);

    await expect(store.createSheet("2024-01-01")).rejects.toBeInstanceOf(PersistenceError);
    await expect(store.createSheet("2024-01-02")).rejects.toBeInstanceOf(PersistenceError);
    expect(store.listAll()).toEqual([]);
    expect(await readdir(join(dataDir, "tables"))).toEqual([]);

    await rm(catalogFile, { recursive: true });
    const reopened = await openStore();
    expect(reopened.listAll()).toEqual([]);
    expect(reopened.listRecent()).toEqual([]);
  });

  it("takes an explicit row count", async () => {
    const store = await openStore();
    expect((await store.createSheet("2024-01-01", 2)).rows).toHaveLength(2);
  });
});

describe("openSheet / saveSheet", () => {
  it("round-trips edits through a fresh store", async () => {
    const store = await openStore();
    const created = await store.createSheet("2024-01-01");
    const edited = setCell(setCell(created, 0, "freightRate", "100"), 0, "settledTons", "2.5");
    const saved = await store.saveSheet(edited);
    expect(saved.modifiedAt).not.toBe(created.modifiedAt);

    const reopened = await openStore();
    const loaded = await reopened.openSheet(created.id);
    expect(loaded).toEqual(saved);
  });

  it("updates the catalog entry on save", async () => {
    const store = await openStore();
    const created = await store.createSheet("2024-01-01");
    await store.saveSheet(summarize(created).sheet);
    expect(store.listAll()[0]).toMatchObject({ id: created.id, name: "2024-01-01-2024-01-05", rowCount: 5 });
  });

  it("fails for an unknown id", async () => {
    const store = await openStore();
    await expect(store.openSheet("tbl_missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses to save a sheet with no rows", async () => {
    const store = await openStore();
    const created = await store.createSheet("2024-01-01");
    await expect(store.saveSheet({ ...created, rows: [] })).rejects.toBeInstanceOf(EmptySheetError);
  });

  it("reports a corrupt sheet file", async () => {
    const store = await openStore();
    const created = await store.createSheet("2024-01-01");
    await writeFile(tableFile(created.id), "{not json");
    await expect(store.openSheet(created.id)).rejects.toBeInstanceOf(PersistenceError);
  });

  it("applies concurrent saves in call order", async () => {
    const store = await openStore();
    const created = await store.createSheet("2024-01-01");
    await Promise.all([
      store.saveSheet(setCell(created, 0, "vehicle", "蒙A00002")),
      store.saveSheet(setCell(created, 0, "vehicle", "蒙A00003")),
    ]);
    const loaded = await (await openStore()).openSheet(created.id);
    expect(loaded.rows[0].vehicle).toBe("蒙A00003");
  });
});

describe("recent list", () => {
  it("keeps at most recentLimit entries, most recent first", async () => {
    const store = await openStore();
    const ids: string[] = [];
    for (let i = 0; i < 4; i += 1) ids.push((await store.createSheet(`2024-01-0${i + 1}`)).id);
    for (const id of ids) await store.openSheet(id);
    expect(store.listRecent().map((m) => m.id)).toEqual([ids[3], ids[2], ids[1]]);
    expect(store.listAll()).toHaveLength(4);
  });

  it("promotes a reopened sheet without duplicating it", async () => {
    const store = await openStore();
    const a = await store.createSheet("2024-01-01");
    const b = await store.createSheet("2024-02-01");
    await store.openSheet(a.id);
    expect(store.listRecent().map((m) => m.id)).toEqual([a.id, b.id]);
  });
});

describe("createNextSheet", () => {
  it("starts the day after the previous sheet's last load date", async () => {
    const store = await openStore();
    const previous = await store.createSheet("2024-03-01", 5);
    const next = await store.createNextSheet(previous);
    expect(next.startDate).toBe("2024-03-06");
    expect(next.rows).toHaveLength(5);
  });

  it("carries a row count when given one", async () => {
    const store = await openStore();
    const previous = await store.createSheet("2024-02-27", 3);
    const next = await store.createNextSheet(previous, 3);
    expect(next.startDate).toBe("2024-03-01");
    expect(next.rows).toHaveLength(3);
  });

  it("rejects a previous sheet with no rows", async () => {
    const store = await openStore();
    const previous = await store.createSheet("2024-03-01");
    await expect(store.createNextSheet({ ...previous, rows: [] })).rejects.toBeInstanceOf(InvalidChainError);
  });
});

describe("deleteSheet", () => {
  it("removes the sheet everywhere", async () => {
    const store = await openStore();
    const keep = await store.createSheet("2024-01-01");
    const doomed = await store.createSheet("2024-02-01");
    await store.deleteSheet(doomed.id);

    await expect(store.openSheet(doomed.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(store.listAll().map((m) => m.id)).toEqual([keep.id]);
    expect(store.listRecent().map((m) => m.id)).toEqual([keep.id]);
    expect(await readdir(join(dataDir, "tables"))).toEqual([`${keep.id}.json`]);

    const reopened = await openStore();
    expect(reopened.has(doomed.id)).toBe(false);
  });

  it("fails for an unknown id", async () => {
    const store = await openStore();
    await expect(store.deleteSheet("tbl_missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("leaves the sheet in place when the catalog cannot be written", async () => {
    const store = await openStore();
    const sheet = await store.createSheet("2024-01-01");
    const catalogFile = join(dataDir, "catalog.json");
    await rm(catalogFile);
    await mkdir(catalogFile);

    await expect(store.deleteSheet(sheet.id)).rejects.toBeInstanceOf(PersistenceError);
    expect(store.has(sheet.id)).toBe(true);
    expect(store.listRecent().map((m) => m.id)).toEqual([sheet.id]);
    expect(await exists(tableFile(sheet.id))).toBe(true);
    expect(await exists(`${tableFile(sheet.id)}.deleted`)).toBe(false);
  });
});

describe("recovery on open", () => {
  it("rebuilds a missing catalog from the sheet files", async () => {
    const store = await openStore();
    const sheet = await store.createSheet("2024-01-01");
    await rm(join(dataDir, "catalog.json"));

    const reopened = await openStore();
    expect(reopened.listAll().map((m) => m.id)).toEqual([sheet.id]);
    expect(reopened.listRecent()).toEqual([]);
  });

  it("rebuilds a corrupt catalog", async () => {
    const store = await openStore();
    const sheet = await store.createSheet("2024-01-01");
    await writeFile(join(dataDir, "catalog.json"), "{oops");

    const reopened = await openStore();
    expect(reopened.listAll().map((m) => m.id)).toEqual([sheet.id]);
  });

  it("drops entries whose sheet file is gone", async () => {
    const store = await openStore();
    const sheet = await store.createSheet("2024-01-01");
    await rm(tableFile(sheet.id));

    const reopened = await openStore();
    expect(reopened.listAll()).toEqual([]);
    expect(reopened.listRecent()).toEqual([]);
  });

  it("restores a sheet whose delete never reached the catalog", async () => {
    const store = await openStore();
    const sheet = await store.createSheet("2024-01-01");
    const data = await readFile(tableFile(sheet.id), "utf8");
    await rm(tableFile(sheet.id));
    await writeFile(`${tableFile(sheet.id)}.deleted`, data);

    const reopened = await openStore();
    expect((await reopened.openSheet(sheet.id)).id).toBe(sheet.id);
  });

  it("clears a leftover catalog temp file", async () => {
    await openStore();
    const tmp = join(dataDir, "catalog.json.tmp");
    await writeFile(tmp, "{partial");

    await openStore();
    expect(await exists(tmp)).toBe(false);
  });

  it("clears leftover temp and deleted files", async () => {
    await openStore();
    const tables = join(dataDir, "tables");
    await writeFile(join(tables, "tbl_abc.json.tmp"), "partial");
    await writeFile(join(tables, "tbl_def.json.deleted"), "{}");

    await openStore();
    expect(await readdir(tables)).toEqual([]);
  });
});
