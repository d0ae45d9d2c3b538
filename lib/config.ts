/**
 * Ledger settings: place lists, row defaults and sizing knobs.
 * Read once at startup from config.json and handed to the store and session;
 * nothing in the engine writes them back.
 */

import { PersistenceError } from "@/lib/errors";
import { isRecord, readJsonFile } from "@/lib/storage/json-file";
import type { Settings } from "@/lib/table-engine/schema";

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  loadPlaces: Object.freeze(["装车地A", "装车地B", "装车地C"]),
  unloadPlaces: Object.freeze(["卸货地A", "卸货地B", "卸货地C"]),
  defaultVehicle: "蒙A00001",
  defaultModel: "PAC",
  initialRows: 31,
  recentLimit: 12,
  autosaveMs: 600,
});

function stringList(value: unknown, fallback: readonly string[]): readonly string[] {
  if (!Array.isArray(value)) return fallback;
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") continue;
    const trimmed = item.trim();
    if (trimmed) items.push(trimmed);
  }
  return Object.freeze(items);
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

function nonNegativeInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : fallback;
}

function text(value: unknown, fallback: string): string {
  return typeof value === "string" ? value.trim() : fallback;
}

/** Merge a parsed config object over the defaults, field by field. */
export function resolveSettings(raw: unknown): Settings {
  if (!isRecord(raw)) return DEFAULT_SETTINGS;
  return Object.freeze({
    loadPlaces: stringList(raw.loadPlaces, DEFAULT_SETTINGS.loadPlaces),
    unloadPlaces: stringList(raw.unloadPlaces, DEFAULT_SETTINGS.unloadPlaces),
    defaultVehicle: text(raw.defaultVehicle, DEFAULT_SETTINGS.defaultVehicle),
    defaultModel: text(raw.defaultModel, DEFAULT_SETTINGS.defaultModel),
    initialRows: positiveInt(raw.initialRows, DEFAULT_SETTINGS.initialRows),
    recentLimit: positiveInt(raw.recentLimit, DEFAULT_SETTINGS.recentLimit),
    autosaveMs: nonNegativeInt(raw.autosaveMs, DEFAULT_SETTINGS.autosaveMs),
  });
}

/** Missing config means defaults. A corrupt one is logged and also falls back to defaults. */
export async function loadSettings(configPath: string): Promise<Settings> {
  try {
    return resolveSettings(await readJsonFile(configPath));
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    console.warn("[settings] unreadable config, using defaults", { path: configPath, msg: error.message });
    return DEFAULT_SETTINGS;
  }
}
