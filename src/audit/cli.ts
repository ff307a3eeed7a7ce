import { auditFleet, compareSources, type AuditDeps } from "./audit.js";
import type { AuditCommand, CompareCommand } from "./cli_args.js";
import {
  auditToJson,
  compareToJson,
  formatAudit,
  formatCompare,
  hasFleetDrift,
} from "./report.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_DRIFT = 2;

/** Runs one command and returns the process exit code. */
export async function runCommand(
  command: AuditCommand | CompareCommand,
  deps: AuditDeps,
  write: (text: string) => void
): Promise<number> {
  if (command.command === "audit") {
    const result = await auditFleet(deps, { names: command.names, filter: command.filter });
    write(command.json ? JSON.stringify(auditToJson(result), null, 2) : formatAudit(result));
    const skipped = result.results.some(r => r.status === "skipped");
    return hasFleetDrift(result) || skipped ? EXIT_DRIFT : EXIT_OK;
  }

  const result = await compareSources(deps, {
    target: command.target,
    other: command.other,
    names: command.names,
    normalize: command.normalize,
  });
  write(command.json ? JSON.stringify(compareToJson(result), null, 2) : formatCompare(result));
  return result.drift.length > 0 ? EXIT_DRIFT : EXIT_OK;
}
