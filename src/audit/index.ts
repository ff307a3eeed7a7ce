#!/usr/bin/env node

import { logger, setLoggerContext } from "../utils/logger.js";
import type { AuditDeps } from "./audit.js";
import { SettingsCache } from "./cache.js";
import { EXIT_FAILURE, EXIT_OK, runCommand } from "./cli.js";
import { USAGE, UsageError, parseCommand } from "./cli_args.js";
import { CACHE_TTL_MS, env } from "./config.js";
import { isResolverError } from "./errors.js";
import { LiveResolver } from "./live_resolver.js";
import { RdsMetadataProvider, createRdsApi } from "./rds.js";
import { sourceLabel } from "./settings.js";
import { TemplateResolver } from "./template_resolver.js";

async function main(argv: string[]): Promise<number> {
  const command = parseCommand(argv);
  if (command.command === "help") {
    console.log(USAGE);
    return EXIT_OK;
  }

  setLoggerContext({ command: command.command, region: env.AWS_REGION });

  const cache = new SettingsCache({
    dir: env.PARAM_AUDIT_CACHE_DIR,
    ttlMs: CACHE_TTL_MS,
    enabled: !command.noCache,
  });
  const provider = new RdsMetadataProvider(createRdsApi(env.AWS_REGION));
  const deps: AuditDeps = {
    provider,
    cache,
    templates: new TemplateResolver(provider),
    live: new LiveResolver(),
    concurrency: env.PARAM_AUDIT_CONCURRENCY,
    retries: env.PARAM_AUDIT_TRANSIENT_RETRIES,
    retryBaseMs: env.PARAM_AUDIT_RETRY_BASE_MS,
  };

  await cache.open();
  try {
    return await runCommand(command, deps, text => console.log(text));
  } finally {
    await cache.close();
    if (cache.warnings.length > 0) {
      logger.warn({ warnings: cache.warnings.length, degraded: cache.isDegraded }, "CACHE: Run finished with cache warnings");
    }
  }
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
    } else if (isResolverError(err)) {
      logger.error({ kind: err.kind, source: sourceLabel(err.source), err: err.message }, "Command failed");
    } else {
      logger.error({ err }, "Command failed");
    }
    process.exitCode = EXIT_FAILURE;
  });
