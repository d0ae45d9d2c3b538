/**
 * Single source of truth for on-disk locations.
 * Set LEDGER_DATA_DIR to move everything (config, catalog, sheets, exports).
 */

import { homedir } from "node:os";
import { join } from "node:path";

const DEFAULT_DIR_NAME = ".transport-ledger";

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.LEDGER_DATA_DIR?.trim();
  if (fromEnv) return fromEnv.length > 1 && /[\\/]$/.test(fromEnv) ? fromEnv.slice(0, -1) : fromEnv;
  return join(homedir(), DEFAULT_DIR_NAME);
}

export interface LedgerPaths {
  dataDir: string;
  configFile: string;
  catalogFile: string;
  tablesDir: string;
  exportsDir: string;
}

export function getLedgerPaths(dataDir: string = getDataDir()): LedgerPaths {
  return {
    dataDir,
    configFile: join(dataDir, "config.json"),
    catalogFile: join(dataDir, "catalog.json"),
    tablesDir: join(dataDir, "tables"),
    exportsDir: join(dataDir, "exports"),
  };
}
