import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { TemplateResolver } from "../template_resolver.js";
import { NotFoundError, QueryError, TransientError } from "../errors.js";
import type { FleetInstance, FleetMetadataProvider } from "../rds.js";
import {
  instanceSource,
  templateSource,
  type InstanceIdentity,
  type Setting,
  type TemplateIdentity,
} from "../settings.js";

const GROUP_VALUES: Setting[] = [
  { name: "max_wal_size", value: "2048", unit: "MB" },
  { name: "shared_buffers", value: "{DBInstanceClassMemory/32768}", unit: "8kB" },
];

function instance(name: string, parameterGroup: string | null): FleetInstance {
  return {
    identity: instanceSource(name),
    name,
    engine: "postgres",
    engineVersion: "15.4",
    parameterGroup,
    status: "available",
  };
}

describe("TemplateResolver", () => {
  const getTemplateValues = vi.fn(async (_template: TemplateIdentity, names?: readonly string[]) =>
    names ? GROUP_VALUES.filter(s => names.includes(s.name)) : GROUP_VALUES
  );
  const provider: FleetMetadataProvider = {
    listInstances: vi.fn(),
    getInstance: vi.fn(async (identity: InstanceIdentity) => instance(identity.id, "orders-pg15")),
    getTemplateValues,
  };
  const resolver = new TemplateResolver(provider);

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("resolves an instance through its parameter group", async () => {
    const set = await resolver.resolve(instanceSource("orders-prod"), ["max_wal_size"]);

    expect(provider.getInstance).toHaveBeenCalledWith(instanceSource("orders-prod"));
    expect(getTemplateValues).toHaveBeenCalledWith(templateSource("orders-pg15"), ["max_wal_size"]);
    expect(set.source).toEqual(instanceSource("orders-prod"));
    expect([...set.settings.values()]).toEqual([{ name: "max_wal_size", value: "2048", unit: "MB" }]);
  });

  it("reads a parameter group directly without an instance lookup", async () => {
    const set = await resolver.resolve(templateSource("orders-pg15"));

    expect(provider.getInstance).not.toHaveBeenCalled();
    expect(set.source).toEqual(templateSource("orders-pg15"));
    expect([...set.settings.keys()]).toEqual(["max_wal_size", "shared_buffers"]);
  });

  it("returns declared formulas verbatim", async () => {
    const set = await resolver.resolve(templateSource("orders-pg15"), ["shared_buffers"]);

    expect(set.settings.get("shared_buffers")?.value).toBe("{DBInstanceClassMemory/32768}");
  });

  it("treats requested names the source lacks as absent, not as errors", async () => {
    const set = await resolver.resolve(instanceSource("orders-prod"), ["max_wal_size", "min_wal_size"]);

    expect([...set.settings.keys()]).toEqual(["max_wal_size"]);
  });

  it("fails with NotFoundError when the instance has no parameter group", async () => {
    vi.mocked(provider.getInstance).mockResolvedValueOnce(instance("orphan-db", null));

    await expect(resolver.resolve(instanceSource("orphan-db"))).rejects.toBeInstanceOf(NotFoundError);
    expect(getTemplateValues).not.toHaveBeenCalled();
  });

  it("passes provider failures through unchanged", async () => {
    const failure = new TransientError(templateSource("orders-pg15"), "Rate exceeded");
    getTemplateValues.mockRejectedValueOnce(failure);

    await expect(resolver.resolve(templateSource("orders-pg15"))).rejects.toBe(failure);
  });

  it("reports a parameter listed twice as a QueryError on the source", async () => {
    getTemplateValues.mockResolvedValueOnce([
      { name: "max_wal_size", value: "2048" },
      { name: "max_wal_size", value: "4096" },
    ]);

    const err = await resolver.resolve(templateSource("orders-pg15")).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(QueryError);
    expect(err).toMatchObject({
      source: templateSource("orders-pg15"),
      message: 'parameter-group:orders-pg15: duplicate setting "max_wal_size"',
    });
  });
});
