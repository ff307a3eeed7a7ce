export interface Setting {
  readonly name: string;
  readonly value: string;
  readonly unit?: string;
}

export type InstanceIdentity = { kind: "instance"; id: string };
export type TemplateIdentity = { kind: "template"; id: string };
export type ConnectionIdentity = { kind: "connection"; url: string };

export type SourceIdentity = InstanceIdentity | TemplateIdentity | ConnectionIdentity;
export type SourceKind = SourceIdentity["kind"];

export interface SettingSet {
  readonly source: SourceIdentity;
  readonly settings: ReadonlyMap<string, Setting>;
}

export function instanceSource(id: string): InstanceIdentity {
  return { kind: "instance", id };
}

export function templateSource(id: string): TemplateIdentity {
  return { kind: "template", id };
}

export function connectionSource(url: string): ConnectionIdentity {
  return { kind: "connection", url };
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class DuplicateSettingError extends Error {
  override readonly name = "DuplicateSettingError";

  constructor(readonly settingName: string, source: SourceIdentity) {
    super(`Duplicate setting "${settingName}" reported by ${sourceLabel(source)}`);
  }
}

/**
 * Builds a SettingSet ordered by name. Throws DuplicateSettingError if the
 * source reported the same name twice.
 */
export function createSettingSet(source: SourceIdentity, settings: Iterable<Setting>): SettingSet {
  const sorted = [...settings].sort((x, y) => compareNames(x.name, y.name));
  const map = new Map<string, Setting>();
  for (const setting of sorted) {
    if (map.has(setting.name)) {
      throw new DuplicateSettingError(setting.name, source);
    }
    map.set(setting.name, Object.freeze({ ...setting }));
  }
  return Object.freeze({ source, settings: map });
}

/** Keeps only the requested names; names the set does not hold are skipped. */
export function pickSettings(set: SettingSet, names: readonly string[] | undefined): SettingSet {
  if (!names) return set;
  const picked: Setting[] = [];
  for (const name of new Set(names)) {
    const setting = set.settings.get(name);
    if (setting) picked.push(setting);
  }
  return createSettingSet(set.source, picked);
}

export function settingValue(set: SettingSet, name: string): string | null {
  return set.settings.get(name)?.value ?? null;
}

/** Order-preserving de-duplication of requested setting names. */
export function uniqueNames(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

export function sanitizeDbUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const port = parsed.port ? `:${parsed.port}` : "";
    const db = parsed.pathname.replace("/", "");
    return `${parsed.hostname}${port}/${db}`;
  } catch {
    return "unknown-db";
  }
}

/** Human-readable label; never includes connection credentials. */
export function sourceLabel(source: SourceIdentity): string {
  switch (source.kind) {
    case "instance":
      return source.id;
    case "template":
      return `parameter-group:${source.id}`;
    case "connection":
      return `live:${sanitizeDbUrl(source.url)}`;
  }
}

/** Stable identifier used in cache keys. */
export function sourceKey(source: SourceIdentity): string {
  return source.kind === "connection"
    ? `${source.kind}:${sanitizeDbUrl(source.url)}`
    : `${source.kind}:${source.id}`;
}

/** One capability, two implementations: declared values and live values. */
export interface SettingsResolver<S extends SourceIdentity> {
  resolve(source: S, names?: readonly string[]): Promise<SettingSet>;
}
