import {
  DuplicateSettingError,
  createSettingSet,
  sourceLabel,
  type Setting,
  type SettingSet,
  type SourceIdentity,
} from "./settings.js";

export type ResolverErrorKind =
  | "NotFoundError"
  | "PermissionError"
  | "TransientError"
  | "ConnectionError"
  | "QueryError";

export abstract class ResolverError extends Error {
  abstract readonly kind: ResolverErrorKind;
  readonly source: SourceIdentity;

  constructor(source: SourceIdentity, message: string, options?: { cause?: unknown }) {
    super(`${sourceLabel(source)}: ${message}`, options);
    this.source = source;
  }
}

export class NotFoundError extends ResolverError {
  readonly kind = "NotFoundError";
  override readonly name = "NotFoundError";
}

export class PermissionError extends ResolverError {
  readonly kind = "PermissionError";
  override readonly name = "PermissionError";
}

export class TransientError extends ResolverError {
  readonly kind = "TransientError";
  override readonly name = "TransientError";
}

export class ConnectionError extends ResolverError {
  readonly kind = "ConnectionError";
  override readonly name = "ConnectionError";
}

export class QueryError extends ResolverError {
  readonly kind = "QueryError";
  override readonly name = "QueryError";
}

export function isResolverError(err: unknown): err is ResolverError {
  return err instanceof ResolverError;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TransientError || err instanceof ConnectionError;
}

/** createSettingSet for resolvers: a name reported twice is a QueryError on that source. */
export function resolvedSettingSet(source: SourceIdentity, settings: Iterable<Setting>): SettingSet {
  try {
    return createSettingSet(source, settings);
  } catch (err) {
    if (err instanceof DuplicateSettingError) {
      throw new QueryError(source, `duplicate setting "${err.settingName}"`, { cause: err });
    }
    throw err;
  }
}

/** Non-fatal signal from the cache layer. Reported, never thrown. */
export interface CacheCorruptionWarning {
  kind: "CacheCorruptionWarning";
  path: string;
  reason: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
