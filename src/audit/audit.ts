import pLimit from "p-limit";
import { logger } from "../utils/logger.js";
import { retryWithBackoff } from "../utils/sleep.js";
import type { SettingsCache } from "./cache.js";
import { diffSettings, type DriftRecord } from "./diff.js";
import {
  errorMessage,
  isResolverError,
  isRetryable,
  type ResolverErrorKind,
} from "./errors.js";
import { filterInstances, listInstances } from "./fleet.js";
import { normalizeSettingSet } from "./parameter.js";
import type { FleetInstance, FleetMetadataProvider } from "./rds.js";
import {
  compareNames,
  settingValue,
  sourceLabel,
  type ConnectionIdentity,
  type InstanceIdentity,
  type SettingSet,
  type SettingsResolver,
  type SourceIdentity,
  type TemplateIdentity,
} from "./settings.js";

export interface AuditDeps {
  provider: FleetMetadataProvider;
  cache: SettingsCache;
  templates: SettingsResolver<InstanceIdentity | TemplateIdentity>;
  live: SettingsResolver<ConnectionIdentity>;
  concurrency: number;
  retries: number;
  retryBaseMs: number;
}

export type InstanceAudit =
  | { status: "ok"; instance: FleetInstance; settings: SettingSet }
  | { status: "skipped"; instance: FleetInstance; kind: ResolverErrorKind; reason: string };

export interface FleetAuditResult {
  names: string[];
  results: InstanceAudit[];
}

export interface CompareResult {
  a: SettingSet;
  b: SettingSet;
  drift: DriftRecord[];
}

/** Kinds that drop one instance from a fleet audit instead of aborting it. */
const SKIPPABLE: ReadonlySet<ResolverErrorKind> = new Set<ResolverErrorKind>([
  "TransientError",
  "ConnectionError",
  "NotFoundError",
]);

function withRetry<T>(deps: AuditDeps, source: SourceIdentity, fn: () => Promise<T>): Promise<T> {
  return retryWithBackoff(fn, {
    retries: deps.retries,
    baseDelayMs: deps.retryBaseMs,
    shouldRetry: isRetryable,
    onRetry: (err, attempt, delayMs) => {
      logger.warn({ source: sourceLabel(source), attempt, delayMs, err: errorMessage(err) }, "RESOLVE_RETRY: Retrying after transient failure");
    },
  });
}

/**
 * Picks the resolver by source kind. Parameter groups and instances go through
 * the cache; live connections are read directly.
 */
export function resolveSource(
  deps: AuditDeps,
  source: SourceIdentity,
  names?: readonly string[]
): Promise<SettingSet> {
  if (source.kind === "connection") {
    const connection: ConnectionIdentity = source;
    return withRetry(deps, connection, () => deps.live.resolve(connection, names));
  }
  const declared: InstanceIdentity | TemplateIdentity = source;
  return deps.cache.get({ source: declared, names }, () =>
    withRetry(deps, declared, () => deps.templates.resolve(declared, names))
  );
}

export async function auditFleet(
  deps: AuditDeps,
  request: { names: readonly string[]; filter: string }
): Promise<FleetAuditResult> {
  const names = [...request.names];
  const fleet = filterInstances(await listInstances(deps.provider), request.filter);
  const limit = pLimit(deps.concurrency);

  logger.info({ instances: fleet.length, filter: request.filter, settings: names, concurrency: deps.concurrency }, "AUDIT_START");

  const results = await Promise.all(
    fleet.map(instance =>
      limit(async (): Promise<InstanceAudit> => {
        try {
          const settings = await resolveSource(deps, instance.identity, names);
          return { status: "ok", instance, settings };
        } catch (err) {
          if (isResolverError(err) && SKIPPABLE.has(err.kind)) {
            logger.warn({ instance: instance.name, kind: err.kind, err: err.message }, "AUDIT_SKIP: Instance skipped");
            return { status: "skipped", instance, kind: err.kind, reason: err.message };
          }
          // Aborting: queued instances must not reach the service.
          limit.clearQueue();
          throw err;
        }
      })
    )
  );

  results.sort((x, y) => compareNames(x.instance.name, y.instance.name));

  const skipped = results.filter(r => r.status === "skipped").length;
  logger.info({ resolved: results.length - skipped, skipped }, "AUDIT_DONE");

  return { names, results };
}

/**
 * Groups instances by the value each reports for `name`; null collects the
 * instances where the setting is absent.
 */
export function valueDistribution(result: FleetAuditResult, name: string): Map<string | null, string[]> {
  const distribution = new Map<string | null, string[]>();
  for (const r of result.results) {
    if (r.status !== "ok") continue;
    const value = settingValue(r.settings, name);
    const bucket = distribution.get(value);
    if (bucket) {
      bucket.push(r.instance.name);
    } else {
      distribution.set(value, [r.instance.name]);
    }
  }
  return distribution;
}

export async function compareSources(
  deps: AuditDeps,
  request: { target: SourceIdentity; other: SourceIdentity; names?: readonly string[]; normalize?: boolean }
): Promise<CompareResult> {
  const [rawA, rawB] = await Promise.all([
    resolveSource(deps, request.target, request.names),
    resolveSource(deps, request.other, request.names),
  ]);

  const a = request.normalize ? normalizeSettingSet(rawA) : rawA;
  const b = request.normalize ? normalizeSettingSet(rawB) : rawB;
  const drift = diffSettings(a, b);

  logger.info({
    target: sourceLabel(request.target),
    other: sourceLabel(request.other),
    compared: new Set([...a.settings.keys(), ...b.settings.keys()]).size,
    drift: drift.length,
  }, "COMPARE_DONE");

  return { a, b, drift };
}
