import { createSettingSet, type Setting, type SettingSet } from "./settings.js";

/** Value reported for template parameters that carry no explicit value. */
export const ENGINE_DEFAULT = "Engine default";

const UNIT_PREFIX = /^\(([^)]+)\)/;

/** RDS puts the unit at the start of the description: "(8kB) Sets the number of ..." */
export function parseUnit(description: string | undefined): string | undefined {
  const match = description?.trim().match(UNIT_PREFIX);
  return match ? match[1].trim() : undefined;
}

export function isFormula(value: string): boolean {
  return value.includes("{") || value.includes("}");
}

const BYTE_FACTORS: Record<string, number> = {
  b: 1,
  kb: 1024,
  "8kb": 8 * 1024,
  mb: 1024 ** 2,
  "16mb": 16 * 1024 ** 2,
  gb: 1024 ** 3,
  tb: 1024 ** 4,
};

const MS_FACTORS: Record<string, number> = {
  us: 0.001,
  ms: 1,
  s: 1000,
  min: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const BOOLEANS: Record<string, string> = {
  on: "1",
  off: "0",
  true: "1",
  false: "0",
};

function scale(amount: string, unit: string): { value: string; unit: string } | null {
  const key = unit.toLowerCase();
  const n = Number(amount);
  if (!Number.isFinite(n)) return null;
  if (key in BYTE_FACTORS) {
    return { value: String(n * BYTE_FACTORS[key]), unit: "B" };
  }
  if (key in MS_FACTORS) {
    return { value: String(n * MS_FACTORS[key]), unit: "ms" };
  }
  return null;
}

/**
 * Rewrites a setting into base units (bytes, milliseconds) and booleans into
 * 0/1, so a template and a live server can be compared when they report the
 * same quantity differently. "-1", formulas and anything unrecognised pass
 * through untouched.
 */
export function normalizeSetting(setting: Setting): Setting {
  const raw = setting.value.trim();

  if (raw === "-1" || isFormula(raw) || raw === ENGINE_DEFAULT) return setting;

  const bool = BOOLEANS[raw.toLowerCase()];
  if (bool !== undefined) {
    return { name: setting.name, value: bool };
  }

  if (/^-?\d+(\.\d+)?$/.test(raw) && setting.unit) {
    const scaled = scale(raw, setting.unit);
    return scaled ? { name: setting.name, ...scaled } : setting;
  }

  const suffixed = raw.match(/^(-?\d+(?:\.\d+)?)\s*([a-zA-Z]+)$/);
  if (suffixed) {
    const scaled = scale(suffixed[1], suffixed[2]);
    return scaled ? { name: setting.name, ...scaled } : setting;
  }

  return setting;
}

export function normalizeSettingSet(set: SettingSet): SettingSet {
  return createSettingSet(set.source, [...set.settings.values()].map(normalizeSetting));
}
