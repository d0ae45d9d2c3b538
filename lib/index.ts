/**
 * Public surface of the transport ledger: engine, store, session, settings.
 */

export * from "./table-engine";
export * from "./errors";
export { DEFAULT_SETTINGS, loadSettings, resolveSettings } from "./config";
export { getDataDir, getLedgerPaths } from "./env";
export type { LedgerPaths } from "./env";
export { formatAmountDisplay, formatDateISO, formatFixed2 } from "./format";
export { TableStore, newSheetId } from "./storage/table-store";
export type { TableStoreOptions } from "./storage/table-store";
export { LedgerSession, exportFileName } from "./ledger-session";
export type { PendingDeletion, SessionStatus, SummaryOutcome } from "./ledger-session";
