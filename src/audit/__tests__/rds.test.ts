import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  RdsMetadataProvider,
  classifyAwsError,
  parameterToSetting,
  type RdsApi,
} from "../rds.js";
import { NotFoundError, PermissionError, QueryError, TransientError } from "../errors.js";
import { instanceSource, templateSource } from "../settings.js";

function awsError(name: string, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(`${name} raised`), { name, ...extra });
}

describe("RdsMetadataProvider", () => {
  const api = {
    describeDBInstances: vi.fn<RdsApi["describeDBInstances"]>(),
    describeDBParameters: vi.fn<RdsApi["describeDBParameters"]>(),
  };
  let provider: RdsMetadataProvider;

  beforeEach(() => {
    vi.resetAllMocks();
    provider = new RdsMetadataProvider(api);
  });

  describe("listInstances", () => {
    it("walks every page", async () => {
      api.describeDBInstances
        .mockResolvedValueOnce({
          $metadata: {},
          Marker: "page-2",
          DBInstances: [{
            DBInstanceIdentifier: "orders-prod",
            Engine: "postgres",
            EngineVersion: "15.4",
            DBInstanceStatus: "available",
            DBParameterGroups: [{ DBParameterGroupName: "orders-pg15", ParameterApplyStatus: "in-sync" }],
            Endpoint: { Address: "orders-prod.example.internal", Port: 5432 },
          }],
        })
        .mockResolvedValueOnce({
          $metadata: {},
          DBInstances: [{ DBInstanceIdentifier: "billing-prod" }, {}],
        });

      const instances = await provider.listInstances();

      expect(api.describeDBInstances).toHaveBeenNthCalledWith(1, { Marker: undefined });
      expect(api.describeDBInstances).toHaveBeenNthCalledWith(2, { Marker: "page-2" });
      expect(instances).toEqual([
        {
          identity: instanceSource("orders-prod"),
          name: "orders-prod",
          engine: "postgres",
          engineVersion: "15.4",
          parameterGroup: "orders-pg15",
          status: "available",
        },
        {
          identity: instanceSource("billing-prod"),
          name: "billing-prod",
          engine: "unknown",
          engineVersion: "unknown",
          parameterGroup: null,
          status: "unknown",
        },
      ]);
    });

    it("maps throttling to a transient error", async () => {
      api.describeDBInstances.mockRejectedValueOnce(awsError("ThrottlingException"));

      await expect(provider.listInstances()).rejects.toBeInstanceOf(TransientError);
    });
  });

  describe("getInstance", () => {
    it("maps a missing instance to NotFoundError for that instance", async () => {
      api.describeDBInstances.mockRejectedValueOnce(awsError("DBInstanceNotFoundFault", { $fault: "client" }));

      const err = await provider.getInstance(instanceSource("ghost")).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NotFoundError);
      expect(err).toMatchObject({ kind: "NotFoundError", source: instanceSource("ghost") });
    });

    it("treats an empty response as not found", async () => {
      api.describeDBInstances.mockResolvedValueOnce({ $metadata: {}, DBInstances: [] });

      await expect(provider.getInstance(instanceSource("ghost"))).rejects.toBeInstanceOf(NotFoundError);
    });

    it("answers listed instances without another describe call", async () => {
      api.describeDBInstances.mockResolvedValueOnce({
        $metadata: {},
        DBInstances: [{
          DBInstanceIdentifier: "orders-prod",
          DBParameterGroups: [{ DBParameterGroupName: "orders-pg15" }],
        }],
      });

      await provider.listInstances();
      const instance = await provider.getInstance(instanceSource("orders-prod"));

      expect(api.describeDBInstances).toHaveBeenCalledTimes(1);
      expect(instance.parameterGroup).toBe("orders-pg15");
    });

    it("describes instances it has not listed", async () => {
      api.describeDBInstances.mockResolvedValueOnce({
        $metadata: {},
        DBInstances: [{ DBInstanceIdentifier: "orders-replica", DBParameterGroups: [{ DBParameterGroupName: "orders-pg15" }] }],
      });

      const instance = await provider.getInstance(instanceSource("orders-replica"));

      expect(api.describeDBInstances).toHaveBeenCalledWith({ DBInstanceIdentifier: "orders-replica" });
      expect(instance.name).toBe("orders-replica");
    });
  });

  describe("getTemplateValues", () => {
    it("filters to requested names across pages", async () => {
      api.describeDBParameters
        .mockResolvedValueOnce({
          $metadata: {},
          Marker: "next",
          Parameters: [
            { ParameterName: "wal_buffers", ParameterValue: "-1", Description: "(8kB) Sets the number of disk-page buffers in shared memory for WAL." },
            { ParameterName: "work_mem", ParameterValue: "4096", Description: "(kB) Sets the maximum memory to be used for query workspaces." },
          ],
        })
        .mockResolvedValueOnce({
          $metadata: {},
          Parameters: [
            { ParameterName: "wal_compression", Description: "Compresses full-page writes written in WAL file." },
          ],
        });

      const settings = await provider.getTemplateValues(templateSource("orders-pg15"), ["wal_buffers", "wal_compression"]);

      expect(api.describeDBParameters).toHaveBeenNthCalledWith(1, { DBParameterGroupName: "orders-pg15", Marker: undefined });
      expect(api.describeDBParameters).toHaveBeenNthCalledWith(2, { DBParameterGroupName: "orders-pg15", Marker: "next" });
      expect(settings).toEqual([
        { name: "wal_buffers", value: "-1", unit: "8kB" },
        { name: "wal_compression", value: "Engine default" },
      ]);
    });

    it("maps a missing parameter group to NotFoundError", async () => {
      api.describeDBParameters.mockRejectedValueOnce(awsError("DBParameterGroupNotFoundFault"));

      await expect(provider.getTemplateValues(templateSource("nope"))).rejects.toMatchObject({
        kind: "NotFoundError",
        source: templateSource("nope"),
      });
    });
  });
});

describe("parameterToSetting", () => {
  it("skips parameters without a name", () => {
    expect(parameterToSetting({ ParameterValue: "1" })).toBeNull();
  });

  it("keeps the reported text verbatim", () => {
    expect(parameterToSetting({
      ParameterName: "shared_buffers",
      ParameterValue: "{DBInstanceClassMemory/32768}",
      Description: "(8kB) Sets the number of shared memory buffers used by the server.",
    })).toEqual({ name: "shared_buffers", value: "{DBInstanceClassMemory/32768}", unit: "8kB" });
  });
});

describe("classifyAwsError", () => {
  const source = instanceSource("orders-prod");

  it("maps credential problems to PermissionError", () => {
    expect(classifyAwsError(awsError("AccessDenied"), source)).toBeInstanceOf(PermissionError);
    expect(classifyAwsError(awsError("ExpiredToken"), source)).toBeInstanceOf(PermissionError);
  });

  it("maps server faults and socket errors to TransientError", () => {
    expect(classifyAwsError(awsError("InternalError", { $fault: "server" }), source)).toBeInstanceOf(TransientError);
    expect(classifyAwsError(awsError("Error", { code: "ECONNRESET" }), source)).toBeInstanceOf(TransientError);
  });

  it("maps other client faults to QueryError", () => {
    const err = classifyAwsError(awsError("InvalidParameterValue", { $fault: "client" }), source);
    expect(err).toBeInstanceOf(QueryError);
    expect(err.message).toBe("orders-prod: InvalidParameterValue raised");
  });

  it("keeps the original error as the cause", () => {
    const original = awsError("Throttling");
    expect(classifyAwsError(original, source).cause).toBe(original);
  });
});
