import pg from "pg";
import { env } from "./config.js";

/** The slice of a pg client the live resolver uses. */
export interface SettingsConnection {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export type Connect = (url: string) => Promise<SettingsConnection>;

/**
 * Opens one dedicated client. No pool: each live endpoint is read once per
 * run, and the caller ends the client when it is done.
 */
export const connectPg: Connect = async (url) => {
  const client = new pg.Client({
    connectionString: url,
    connectionTimeoutMillis: env.PG_CONNECT_TIMEOUT_MS,
    application_name: "param-audit",
  });
  await client.connect();
  return {
    async query(sql, params = []) {
      const result = await client.query(sql, params);
      return { rows: result.rows };
    },
    end: () => client.end(),
  };
};
