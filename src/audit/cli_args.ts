import {
  connectionSource,
  instanceSource,
  templateSource,
  uniqueNames,
  type ConnectionIdentity,
  type InstanceIdentity,
  type SourceIdentity,
} from "./settings.js";

export type AuditCommand = {
  command: "audit";
  names: string[];
  filter: string;
  noCache: boolean;
  json: boolean;
};

export type CompareCommand = {
  command: "compare";
  target: SourceIdentity;
  other: SourceIdentity;
  names?: string[];
  normalize: boolean;
  noCache: boolean;
  json: boolean;
};

export type ParsedCommand = AuditCommand | CompareCommand | { command: "help" };

export class UsageError extends Error {
  override readonly name = "UsageError";
}

export const USAGE = `Usage:
  param-audit audit <setting...> [--filter <substring>] [--no-cache] [--json]
  param-audit compare --target <ref> (--other <ref> | --template <group>)
                      [--setting <name>]... [--normalize] [--no-cache] [--json]

<ref> is an RDS instance identifier or a postgres:// connection URL.`;

const VALUE_FLAGS = new Set(["--filter", "--target", "--other", "--template", "--setting"]);
const BOOLEAN_FLAGS = new Set(["--no-cache", "--json", "--normalize"]);

export function parseSourceRef(ref: string): InstanceIdentity | ConnectionIdentity {
  return /^postgres(ql)?:\/\//.test(ref) ? connectionSource(ref) : instanceSource(ref);
}

export function parseCommand(argv: readonly string[]): ParsedCommand {
  const [command, ...rest] = argv;
  if (!command || command === "help" || argv.includes("--help") || argv.includes("-h")) {
    return { command: "help" };
  }

  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const flags = new Set<string>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (VALUE_FLAGS.has(arg)) {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`${arg} needs a value`);
      }
      values.set(arg, [...(values.get(arg) ?? []), next]);
      i++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags.add(arg);
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const single = (flag: string): string | undefined => {
    const given = values.get(flag);
    if (given && given.length > 1) throw new UsageError(`${flag} given more than once`);
    return given?.[0];
  };
  const noCache = flags.has("--no-cache");
  const json = flags.has("--json");

  if (command === "audit") {
    const names = uniqueNames(positionals);
    if (names.length === 0) throw new UsageError("audit needs at least one setting name");
    return { command, names, filter: single("--filter") ?? "", noCache, json };
  }

  if (command === "compare") {
    if (positionals.length > 0) throw new UsageError(`Unexpected argument ${positionals[0]}`);
    const target = single("--target");
    const other = single("--other");
    const template = single("--template");
    if (!target) throw new UsageError("compare needs --target");
    if (other && template) throw new UsageError("Give either --other or --template, not both");

    let otherSource: SourceIdentity;
    if (template) {
      otherSource = templateSource(template);
    } else if (other) {
      otherSource = parseSourceRef(other);
    } else {
      throw new UsageError("compare needs --other or --template");
    }

    const settings = values.get("--setting");
    return {
      command,
      target: parseSourceRef(target),
      other: otherSource,
      ...(settings ? { names: uniqueNames(settings) } : {}),
      normalize: flags.has("--normalize"),
      noCache,
      json,
    };
  }

  throw new UsageError(`Unknown command ${command}`);
}
