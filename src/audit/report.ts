import {
  valueDistribution,
  type CompareResult,
  type FleetAuditResult,
  type InstanceAudit,
} from "./audit.js";
import { isFormula } from "./parameter.js";
import { settingValue, sourceLabel } from "./settings.js";

export const ABSENT = "(absent)";

type Resolved = Extract<InstanceAudit, { status: "ok" }>;
type Skipped = Extract<InstanceAudit, { status: "skipped" }>;

function display(value: string | null): string {
  return value ?? ABSENT;
}

/** Left-aligned columns two spaces apart, with a rule under the header. */
export function formatTable(header: string[], rows: string[][]): string {
  const widths = header.map((h, col) =>
    Math.max(h.length, ...rows.map(row => (row[col] ?? "").length))
  );
  const line = (cells: string[]) =>
    cells.map((cell, col) => cell.padEnd(widths[col])).join("  ").trimEnd();

  return [
    line(header),
    widths.map(w => "-".repeat(w)).join("  "),
    ...rows.map(line),
  ].join("\n");
}

export function formatCompare(result: CompareResult): string {
  if (result.drift.length === 0) return "No differences.";

  const rows = result.drift.map(d => [
    d.name,
    display(d.valueA),
    display(d.valueB),
    result.b.settings.get(d.name)?.unit ?? result.a.settings.get(d.name)?.unit ?? "",
  ]);
  const table = formatTable(["Name", sourceLabel(result.a.source), sourceLabel(result.b.source), "Unit"], rows);
  return `${table}\n\n${result.drift.length} difference${result.drift.length === 1 ? "" : "s"}.`;
}

export function formatAudit(result: FleetAuditResult): string {
  const ok = result.results.filter((r): r is Resolved => r.status === "ok");
  const skipped = result.results.filter((r): r is Skipped => r.status === "skipped");
  const sections: string[] = [];

  if (ok.length === 0) {
    sections.push("No instances resolved.");
  } else {
    const rows = ok.map(r => [
      r.instance.name,
      ...result.names.map(name => {
        const value = settingValue(r.settings, name);
        return value !== null && isFormula(value) ? `${value} (formula)` : display(value);
      }),
    ]);
    sections.push(formatTable(["Instance", ...result.names], rows));

    const summary = result.names.map(name => {
      const counts = [...valueDistribution(result, name)]
        .map(([value, instances]) => `${display(value)} x${instances.length}`)
        .join(", ");
      return `${name}: ${counts}`;
    });
    sections.push(summary.join("\n"));
  }

  if (skipped.length > 0) {
    const lines = skipped.map(r => `  ${r.instance.name}: ${r.kind}: ${r.reason}`);
    sections.push(`Skipped ${skipped.length} instance${skipped.length === 1 ? "" : "s"}:\n${lines.join("\n")}`);
  }

  return sections.join("\n\n");
}

export function compareToJson(result: CompareResult) {
  return {
    target: sourceLabel(result.a.source),
    other: sourceLabel(result.b.source),
    drift: result.drift,
  };
}

export function auditToJson(result: FleetAuditResult) {
  return {
    settings: result.names,
    instances: result.results.map(r => {
      const instance = {
        name: r.instance.name,
        engine: r.instance.engine,
        engineVersion: r.instance.engineVersion,
        instanceStatus: r.instance.status,
        parameterGroup: r.instance.parameterGroup,
      };
      return r.status === "ok"
        ? {
            ...instance,
            status: r.status,
            values: Object.fromEntries(result.names.map(name => [name, settingValue(r.settings, name)])),
          }
        : { ...instance, status: r.status, kind: r.kind, reason: r.reason };
    }),
  };
}

/** True when an audited setting is not uniform across the resolved instances. */
export function hasFleetDrift(result: FleetAuditResult): boolean {
  return result.names.some(name => valueDistribution(result, name).size > 1);
}
