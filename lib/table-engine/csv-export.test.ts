import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import ExcelJS from "exceljs";
import { DEFAULT_SETTINGS } from "@/lib/config";
import { CSV_BOM, exportCsv, exportRowCells } from "./csv-export";
import { newSheet, projectRows, setCell } from "./sheet";
import { summarize } from "./summarizer";
import type { EditableField, Sheet } from "./schema";

const HEADER = "装车日期,装车地,车辆,产品型号,装车净重,卸车日期,卸货地,卸车数（吨）,运费,结算吨数,金额";

function makeSheet(): Sheet {
  const edits: Array<[number, EditableField, string]> = [
    [0, "loadPlace", "装车地A"],
    [0, "loadNetWeight", "30"],
    [0, "unloadDate", "2024-01-02"],
    [0, "unloadPlace", "卸货地A"],
    [0, "unloadWeightTons", "29.5"],
    [0, "freightRate", "100"],
    [0, "settledTons", "2.5"],
    [1, "loadPlace", "装车地B"],
    [1, "vehicle", "蒙A00002,挂"],
    [1, "loadNetWeight", "31.256"],
    [1, "unloadDate", "2024-1-3"],
    [1, "unloadPlace", '卸货地"东"'],
    [1, "unloadWeightTons", "31"],
    [1, "freightRate", "33.33"],
    [1, "settledTons", "3"],
  ];
  const sheet = newSheet({
    id: "tbl_0000000000c5",
    startDate: "2024-01-01",
    rowCount: 3,
    settings: DEFAULT_SETTINGS,
    now: new Date(Date.UTC(2024, 0, 1)),
  });
  return edits.reduce((acc, [row, field, value]) => setCell(acc, row, field, value), sheet);
}

async function reparse(text: string): Promise<string[][]> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = await workbook.csv.read(Readable.from([Buffer.from(text, "utf8")]), {
    map: (value: unknown) => value,
  });
  const rows: string[][] = [];
  worksheet.eachRow((row) => {
    const cells: string[] = [];
    for (let c = 1; c <= 11; c += 1) {
      const value = row.getCell(c).value;
      cells.push(typeof value === "string" ? value : "");
    }
    rows.push(cells);
  });
  return rows;
}

describe("exportCsv", () => {
  it("starts with a UTF-8 byte-order mark", async () => {
    const buffer = await exportCsv(makeSheet());
    expect([...buffer.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(buffer.toString("utf8").startsWith(CSV_BOM)).toBe(true);
  });

  it("writes the header plus one line per row", async () => {
    const text = (await exportCsv(makeSheet())).toString("utf8").slice(1);
    const lines = text.split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(HEADER);
    expect(lines[1]).toBe("2024-01-01,装车地A,蒙A00001,PAC,30.00,2024-01-02,卸货地A,29.50,100.00,2.50,250.00");
    expect(lines[3]).toBe("2024-01-03,,蒙A00001,PAC,,,,,,,0.00");
  });

  it("quotes fields holding the delimiter or quotes", async () => {
    const text = (await exportCsv(makeSheet())).toString("utf8").slice(1);
    expect(text.split("\n")[2]).toBe(
      '2024-01-02,装车地B,"蒙A00002,挂",PAC,31.26,2024-01-03,"卸货地""东""",31.00,33.33,3.00,99.99'
    );
  });

  it("parses back to the same cells", async () => {
    const sheet = makeSheet();
    const text = (await exportCsv(sheet)).toString("utf8").slice(1);
    const parsed = await reparse(text);
    expect(parsed[0]).toEqual(HEADER.split(","));
    expect(parsed.slice(1)).toEqual(projectRows(sheet).map(exportRowCells));
  });

  it("keeps unparseable numeric text as typed", async () => {
    const sheet = setCell(makeSheet(), 2, "loadNetWeight", " 约30 ");
    const text = (await exportCsv(sheet)).toString("utf8").slice(1);
    expect(text.split("\n")[3]).toBe("2024-01-03,,蒙A00001,PAC,约30,,,,,,0.00");
  });

  it("does not change the sheet", async () => {
    const sheet = makeSheet();
    const before = structuredClone(sheet);
    await exportCsv(sheet);
    expect(sheet).toEqual(before);
    expect(sheet.totalAmount).toBeNull();
    expect(sheet.naming.kind).toBe("open");
  });

  it("exports the same rows before and after summarize", async () => {
    const sheet = makeSheet();
    const plain = (await exportCsv(sheet)).toString("utf8");
    const summarized = (await exportCsv(summarize(sheet).sheet)).toString("utf8");
    expect(summarized).toBe(plain);
  });
});
