/**
 * Transport ledger table engine: schema, date sequencing, amounts, summary, export.
 */

export * from "./schema";
export * from "./decimal";
export * from "./date-sequencer";
export * from "./amount";
export * from "./sheet";
export * from "./summarizer";
export * from "./csv-export";
export { buildSheetWorkbook, sanitizeSheetName } from "./excel-export";
