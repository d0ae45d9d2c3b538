/**
 * Transport ledger schema: the fixed 11-column row, the sheet that owns the rows,
 * and the read-only settings supplied at startup.
 */

/** Fixed column order for display and export. Locked: do not reorder or relabel. */
export const FIXED_COLUMNS = [
  { key: "loadDate", label: "装车日期", kind: "date", derived: true },
  { key: "loadPlace", label: "装车地", kind: "place", derived: false },
  { key: "vehicle", label: "车辆", kind: "text", derived: false },
  { key: "productModel", label: "产品型号", kind: "text", derived: false },
  { key: "loadNetWeight", label: "装车净重", kind: "number", derived: false },
  { key: "unloadDate", label: "卸车日期", kind: "date", derived: false },
  { key: "unloadPlace", label: "卸货地", kind: "place", derived: false },
  { key: "unloadWeightTons", label: "卸车数（吨）", kind: "number", derived: false },
  { key: "freightRate", label: "运费", kind: "number", derived: false },
  { key: "settledTons", label: "结算吨数", kind: "number", derived: false },
  { key: "amount", label: "金额", kind: "number", derived: true },
] as const;

export type ColumnSpec = (typeof FIXED_COLUMNS)[number];
export type ColumnKey = ColumnSpec["key"];

export const COLUMN_LABELS: readonly string[] = FIXED_COLUMNS.map((c) => c.label);

/** Fields the user edits. Stored as raw strings, exactly as entered. */
export interface RowInput {
  loadPlace: string;
  vehicle: string;
  productModel: string;
  loadNetWeight: string;
  /** YYYY-MM-DD */
  unloadDate: string;
  unloadPlace: string;
  unloadWeightTons: string;
  freightRate: string;
  settledTons: string;
}

export type EditableField = keyof RowInput;

export const EDITABLE_FIELDS: readonly EditableField[] = [
  "loadPlace",
  "vehicle",
  "productModel",
  "loadNetWeight",
  "unloadDate",
  "unloadPlace",
  "unloadWeightTons",
  "freightRate",
  "settledTons",
];

/** Inputs that feed the amount; editing them invalidates a stored total. */
export const AMOUNT_INPUTS: readonly EditableField[] = ["freightRate", "settledTons"];

/** Full row as displayed/exported: editable fields plus the two derived ones. */
export interface Row extends RowInput {
  /** startDate + row index, YYYY-MM-DD */
  loadDate: string;
  /** freightRate × settledTons, two decimals */
  amount: string;
}

/**
 * Naming state of a sheet. A fresh sheet is Open ("2024-01-01-"); summarizing
 * finalizes it ("2024-01-01-2024-01-05"); anything the user types is Custom.
 */
export type SheetNaming =
  | { kind: "open"; startDate: string }
  | { kind: "finalized"; startDate: string; endDate: string }
  | { kind: "custom"; name: string };

export interface Sheet {
  id: string;
  naming: SheetNaming;
  /** Load date of row 1, YYYY-MM-DD */
  startDate: string;
  rows: RowInput[];
  createdAt: string;
  modifiedAt: string;
  /** Two-decimal total, set only by summarization */
  totalAmount: string | null;
}

/** Catalog entry: everything listing needs, no row data. */
export interface SheetMeta {
  id: string;
  name: string;
  startDate: string;
  rowCount: number;
  createdAt: string;
  modifiedAt: string;
}

export interface Settings {
  loadPlaces: readonly string[];
  unloadPlaces: readonly string[];
  defaultVehicle: string;
  defaultModel: string;
  initialRows: number;
  recentLimit: number;
  /** Debounce before an edited sheet is saved automatically */
  autosaveMs: number;
}
