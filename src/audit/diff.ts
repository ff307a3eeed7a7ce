import { compareNames, type SettingSet } from "./settings.js";

export interface DriftRecord {
  name: string;
  valueA: string | null;
  valueB: string | null;
}

/**
 * Names present in either set, in code-unit order, for which the two sides
 * disagree. A setting missing on one side is drift; equal text is not.
 */
export function diffSettings(a: SettingSet, b: SettingSet): DriftRecord[] {
  const names = new Set<string>([...a.settings.keys(), ...b.settings.keys()]);
  const drift: DriftRecord[] = [];

  for (const name of [...names].sort(compareNames)) {
    const valueA = a.settings.get(name)?.value ?? null;
    const valueB = b.settings.get(name)?.value ?? null;
    if (valueA === valueB) continue;
    drift.push({ name, valueA, valueB });
  }

  return drift;
}

