/**
 * Engine errors. Every failure the table engine signals carries a `code` so the
 * boundary layer can branch without string matching.
 */

export type LedgerErrorCode =
  | "NOT_FOUND"
  | "EMPTY_SHEET"
  | "INVALID_CHAIN"
  | "PERSISTENCE"
  | "INVALID_DATE";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Sheet id absent from the catalog (open, save, delete). */
export class NotFoundError extends LedgerError {
  readonly sheetId: string;

  constructor(sheetId: string) {
    super("NOT_FOUND", `Sheet not found: ${sheetId}`);
    this.sheetId = sheetId;
  }
}

export class EmptySheetError extends LedgerError {
  constructor(message = "Sheet has no rows") {
    super("EMPTY_SHEET", message);
  }
}

export class InvalidChainError extends LedgerError {
  constructor(message = "Cannot chain from a sheet with no rows") {
    super("INVALID_CHAIN", message);
  }
}

/** Storage read/write failure. `path` is the file that could not be read or written. */
export class PersistenceError extends LedgerError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super("PERSISTENCE", message, cause === undefined ? undefined : { cause });
    this.path = path;
  }
}

export class InvalidDateError extends LedgerError {
  readonly input: string;

  constructor(input: string) {
    super("INVALID_DATE", `Invalid date (expected YYYY-MM-DD): ${input}`);
    this.input = input;
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

const DISPLAY_MESSAGES: Record<LedgerErrorCode, string> = {
  NOT_FOUND: "表格不存在或已被删除。",
  EMPTY_SHEET: "表格没有任何行。",
  INVALID_CHAIN: "当前表格没有行，无法创建下一张。",
  PERSISTENCE: "保存或读取失败，请检查存储空间后重试。",
  INVALID_DATE: "日期无效，请输入 YYYY-MM-DD（例如 2026-02-25）。",
};

export const USER_FACING_ERROR_MESSAGE = "操作失败，请重试。";

/** Short user-facing message. Never exposes file paths or stack traces. */
export function getDisplayErrorMessage(error: unknown): string {
  if (isLedgerError(error)) return DISPLAY_MESSAGES[error.code];
  return USER_FACING_ERROR_MESSAGE;
}
