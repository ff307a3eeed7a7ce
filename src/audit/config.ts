import "dotenv/config";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const schema = z.object({
  AWS_REGION: z.string().default("us-east-1"),

  PARAM_AUDIT_CACHE_DIR: z.string().default(join(homedir(), ".param-audit", "cache")),
  PARAM_AUDIT_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).max(7 * 24 * 3600).default(3600),

  PARAM_AUDIT_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  PARAM_AUDIT_TRANSIENT_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  PARAM_AUDIT_RETRY_BASE_MS: z.coerce.number().int().min(0).max(60_000).default(500),

  PG_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
});

export type AuditEnv = z.infer<typeof schema>;

export const env: AuditEnv = schema.parse(process.env);

export const CACHE_TTL_MS = env.PARAM_AUDIT_CACHE_TTL_SECONDS * 1000;
