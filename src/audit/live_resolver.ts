import { z } from "zod";
import { logger } from "../utils/logger.js";
import { connectPg, type Connect, type SettingsConnection } from "./db.js";
import { ConnectionError, QueryError, errorMessage, resolvedSettingSet } from "./errors.js";
import {
  sanitizeDbUrl,
  type ConnectionIdentity,
  type Setting,
  type SettingSet,
  type SettingsResolver,
} from "./settings.js";

const ALL_SETTINGS_SQL = "SELECT name, setting, unit FROM pg_settings ORDER BY name";
const NAMED_SETTINGS_SQL = "SELECT name, setting, unit FROM pg_settings WHERE name = ANY($1::text[]) ORDER BY name";

const settingRow = z.object({
  name: z.string(),
  setting: z.string().nullable(),
  unit: z.string().nullable().optional(),
});

const SOCKET_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "ENOTFOUND"]);
const CONNECTION_LOST = ["Connection terminated", "connection ended", "Client has encountered a connection error"];

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : undefined;
}

/** SQLSTATE classes 08 (connection) and 28 (authentication), or a dropped socket. */
function isConnectionFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code && (code.startsWith("08") || code.startsWith("28") || SOCKET_CODES.has(code))) return true;
  const message = errorMessage(err);
  return CONNECTION_LOST.some(m => message.includes(m));
}

/**
 * Reads materialized values from pg_settings over a short-lived connection.
 * Formulas in the parameter group are already evaluated by the server here.
 */
export class LiveResolver implements SettingsResolver<ConnectionIdentity> {
  constructor(private readonly connect: Connect = connectPg) {}

  async resolve(source: ConnectionIdentity, names?: readonly string[]): Promise<SettingSet> {
    const endpoint = sanitizeDbUrl(source.url);
    const conn = await this.open(source);

    try {
      const rows = await this.query(conn, source, names);
      const settings: Setting[] = [];
      for (const row of rows) {
        if (row.setting === null) continue;
        settings.push({
          name: row.name,
          value: row.setting,
          ...(row.unit ? { unit: row.unit } : {}),
        });
      }
      logger.debug({ endpoint, requested: names?.length ?? "all", resolved: settings.length }, "LIVE_RESOLVE: Runtime settings read");
      return resolvedSettingSet(source, settings);
    } finally {
      await conn.end().catch((err: unknown) => {
        logger.warn({ endpoint, err: errorMessage(err) }, "LIVE_RESOLVE: Failed to close connection");
      });
    }
  }

  private async open(source: ConnectionIdentity): Promise<SettingsConnection> {
    try {
      return await this.connect(source.url);
    } catch (err) {
      throw new ConnectionError(source, `cannot connect: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async query(
    conn: SettingsConnection,
    source: ConnectionIdentity,
    names: readonly string[] | undefined
  ): Promise<z.infer<typeof settingRow>[]> {
    let rows: unknown[];
    try {
      const result = names
        ? await conn.query(NAMED_SETTINGS_SQL, [[...names]])
        : await conn.query(ALL_SETTINGS_SQL);
      rows = result.rows;
    } catch (err) {
      if (isConnectionFailure(err)) {
        throw new ConnectionError(source, `connection lost: ${errorMessage(err)}`, { cause: err });
      }
      throw new QueryError(source, `pg_settings query failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = z.array(settingRow).safeParse(rows);
    if (!parsed.success) {
      throw new QueryError(source, `unexpected pg_settings row shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
