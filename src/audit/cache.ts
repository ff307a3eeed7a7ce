import crypto from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { errorMessage, type CacheCorruptionWarning } from "./errors.js";
import {
  compareNames,
  createSettingSet,
  pickSettings,
  sourceKey,
  type SettingSet,
  type SourceIdentity,
} from "./settings.js";

const ENTRY_VERSION = 1;
const FULL_SCOPE = "*";

const sourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("instance"), id: z.string() }),
  z.object({ kind: z.literal("template"), id: z.string() }),
]);

const entrySchema = z.object({
  version: z.literal(ENTRY_VERSION),
  key: z.string(),
  fetchedAt: z.number(),
  source: sourceSchema,
  settings: z.array(z.object({
    name: z.string(),
    value: z.string(),
    unit: z.string().optional(),
  })),
});

type CacheEntry = { set: SettingSet; fetchedAt: number };

export interface CacheKey {
  source: SourceIdentity;
  /** Requested names; omitted means every setting the source knows. */
  names?: readonly string[];
}

export interface SettingsCacheOptions {
  dir: string;
  ttlMs: number;
  enabled?: boolean;
  now?: () => number;
  onWarning?: (warning: CacheCorruptionWarning) => void;
}

export function cacheScope(names: readonly string[] | undefined): string {
  if (!names) return FULL_SCOPE;
  return [...new Set(names)].sort(compareNames).join(",");
}

export function cacheKeyString(key: CacheKey): string {
  return `${sourceKey(key.source)}|${cacheScope(key.names)}`;
}

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && Reflect.get(err, "code") === "ENOENT";
}

/**
 * On-disk TTL cache for resolved setting sets, one JSON file per key.
 *
 * Entries are keyed by the exact requested scope. A fresh full-scope entry for
 * the same source also answers any narrower request. Files are replaced by
 * rename so a reader never sees a half-written entry; concurrent processes get
 * last-writer-wins. Within one process concurrent gets for the same key share
 * one fetch.
 *
 * Live connection sources pass straight through to `fetch`.
 */
export class SettingsCache {
  readonly warnings: CacheCorruptionWarning[] = [];

  private readonly dir: string;
  private readonly ttlMs: number;
  private readonly enabled: boolean;
  private readonly now: () => number;
  private readonly onWarning?: (warning: CacheCorruptionWarning) => void;
  private readonly inflight = new Map<string, Promise<SettingSet>>();
  private opened = false;
  private degraded = false;

  constructor(options: SettingsCacheOptions) {
    this.dir = options.dir;
    this.ttlMs = options.ttlMs;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
    this.onWarning = options.onWarning;
  }

  get isDegraded(): boolean {
    return this.degraded;
  }

  async open(): Promise<void> {
    if (this.opened) return;
    this.opened = true;
    if (!this.enabled) return;
    try {
      await mkdir(this.dir, { recursive: true });
    } catch (err) {
      this.warn(this.dir, `cache directory unusable: ${errorMessage(err)}`, true);
    }
  }

  /** Waits for fetches still in flight. */
  async close(): Promise<void> {
    await Promise.allSettled([...this.inflight.values()]);
  }

  get(key: CacheKey, fetch: () => Promise<SettingSet>): Promise<SettingSet> {
    const id = cacheKeyString(key);
    const pending = this.inflight.get(id);
    if (pending) return pending;

    const run = this.load(key, id, fetch).finally(() => {
      this.inflight.delete(id);
    });
    this.inflight.set(id, run);
    return run;
  }

  private async load(key: CacheKey, id: string, fetch: () => Promise<SettingSet>): Promise<SettingSet> {
    if (!this.enabled || key.source.kind === "connection") return fetch();

    await this.open();
    if (this.degraded) return fetch();

    const exact = await this.read(id);
    if (exact && this.isFresh(exact)) {
      logger.debug({ key: id, ageMs: this.now() - exact.fetchedAt }, "CACHE_HIT");
      return exact.set;
    }

    if (key.names) {
      const full = await this.read(cacheKeyString({ source: key.source }));
      if (full && this.isFresh(full)) {
        logger.debug({ key: id, ageMs: this.now() - full.fetchedAt }, "CACHE_HIT: Served from full-scope entry");
        return pickSettings(full.set, key.names);
      }
    }

    logger.debug({ key: id, stale: exact !== null }, "CACHE_MISS");
    const set = await fetch();
    await this.write(id, set, this.now());
    return set;
  }

  /** An entry stamped in the future (clock set back, skewed writer) is stale. */
  private isFresh(entry: CacheEntry): boolean {
    const age = this.now() - entry.fetchedAt;
    return age >= 0 && age < this.ttlMs;
  }

  private entryPath(id: string): string {
    const hash = crypto.createHash("sha256").update(id).digest("hex").slice(0, 32);
    return join(this.dir, `${hash}.json`);
  }

  private async read(id: string): Promise<CacheEntry | null> {
    if (this.degraded) return null;
    const path = this.entryPath(id);

    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      this.warn(path, `cache entry unreadable: ${errorMessage(err)}`, true);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.warn(path, `cache entry is not valid JSON: ${errorMessage(err)}`);
      return null;
    }

    const parsed = entrySchema.safeParse(json);
    if (!parsed.success) {
      this.warn(path, `cache entry has unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return null;
    }
    if (parsed.data.key !== id) return null;

    try {
      return {
        set: createSettingSet(parsed.data.source, parsed.data.settings),
        fetchedAt: parsed.data.fetchedAt,
      };
    } catch (err) {
      this.warn(path, errorMessage(err));
      return null;
    }
  }

  private async write(id: string, set: SettingSet, fetchedAt: number): Promise<void> {
    if (this.degraded || set.source.kind === "connection") return;
    const path = this.entryPath(id);
    const tmp = `${path}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
    const body = JSON.stringify({
      version: ENTRY_VERSION,
      key: id,
      fetchedAt,
      source: set.source,
      settings: [...set.settings.values()],
    });

    try {
      await writeFile(tmp, body, "utf-8");
      await rename(tmp, path);
    } catch (err) {
      this.warn(path, `cache write failed: ${errorMessage(err)}`);
      await rm(tmp, { force: true }).catch((rmErr: unknown) => {
        logger.debug({ tmp, err: errorMessage(rmErr) }, "CACHE: Could not remove temp file");
      });
    }
  }

  private warn(path: string, reason: string, degrade = false): void {
    if (degrade && !this.degraded) {
      this.degraded = true;
      reason = `${reason}; caching disabled for this run`;
    }
    const warning: CacheCorruptionWarning = { kind: "CacheCorruptionWarning", path, reason };
    this.warnings.push(warning);
    logger.warn({ path, reason }, "CACHE_CORRUPTION: Falling back to fresh fetch");
    this.onWarning?.(warning);
  }
}
