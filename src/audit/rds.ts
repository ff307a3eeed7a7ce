import {
  RDSClient,
  DescribeDBInstancesCommand,
  DescribeDBParametersCommand,
  type DBInstance,
  type DescribeDBInstancesCommandInput,
  type DescribeDBInstancesCommandOutput,
  type DescribeDBParametersCommandInput,
  type DescribeDBParametersCommandOutput,
  type Parameter,
} from "@aws-sdk/client-rds";
import { logger } from "../utils/logger.js";
import {
  NotFoundError,
  PermissionError,
  QueryError,
  TransientError,
  type ResolverError,
} from "./errors.js";
import { ENGINE_DEFAULT, parseUnit } from "./parameter.js";
import {
  instanceSource,
  type InstanceIdentity,
  type Setting,
  type SourceIdentity,
  type TemplateIdentity,
} from "./settings.js";

export interface FleetInstance {
  identity: InstanceIdentity;
  name: string;
  engine: string;
  engineVersion: string;
  parameterGroup: string | null;
  status: string;
}

/** Read-only view of the service that knows the fleet and its parameter groups. */
export interface FleetMetadataProvider {
  listInstances(): Promise<FleetInstance[]>;
  getInstance(identity: InstanceIdentity): Promise<FleetInstance>;
  getTemplateValues(identity: TemplateIdentity, names?: readonly string[]): Promise<Setting[]>;
}

/** The two RDS calls this tool makes; a seam for tests. */
export interface RdsApi {
  describeDBInstances(input: DescribeDBInstancesCommandInput): Promise<DescribeDBInstancesCommandOutput>;
  describeDBParameters(input: DescribeDBParametersCommandInput): Promise<DescribeDBParametersCommandOutput>;
}

export function createRdsApi(region: string): RdsApi {
  const client = new RDSClient({ region });
  return {
    describeDBInstances: input => client.send(new DescribeDBInstancesCommand(input)),
    describeDBParameters: input => client.send(new DescribeDBParametersCommand(input)),
  };
}

const NOT_FOUND = new Set([
  "DBInstanceNotFound",
  "DBInstanceNotFoundFault",
  "DBParameterGroupNotFound",
  "DBParameterGroupNotFoundFault",
]);

const PERMISSION = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
  "InvalidClientTokenId",
  "UnrecognizedClientException",
  "ExpiredToken",
  "ExpiredTokenException",
  "CredentialsProviderError",
]);

const TRANSIENT = new Set([
  "Throttling",
  "ThrottlingException",
  "RequestLimitExceeded",
  "TooManyRequestsException",
  "ServiceUnavailable",
  "InternalFailure",
  "TimeoutError",
  "RequestTimeout",
  "NetworkingError",
]);

const NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "EPIPE"]);

function readString(err: object, key: string): string | undefined {
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" ? value : undefined;
}

/** Maps an AWS SDK failure onto one of the resolver error kinds. */
export function classifyAwsError(err: unknown, source: SourceIdentity): ResolverError {
  if (typeof err !== "object" || err === null) {
    return new TransientError(source, `RDS request failed: ${String(err)}`, { cause: err });
  }

  const name = readString(err, "name") ?? "";
  const code = readString(err, "code") ?? readString(err, "Code") ?? "";
  const fault = readString(err, "$fault");
  const message = readString(err, "message") ?? name;

  if (NOT_FOUND.has(name) || NOT_FOUND.has(code)) {
    return new NotFoundError(source, message, { cause: err });
  }
  if (PERMISSION.has(name) || PERMISSION.has(code)) {
    return new PermissionError(source, message, { cause: err });
  }
  if (TRANSIENT.has(name) || TRANSIENT.has(code) || NETWORK_CODES.has(code) || fault === "server") {
    return new TransientError(source, message, { cause: err });
  }
  if (fault === "client") {
    return new QueryError(source, message, { cause: err });
  }
  return new TransientError(source, message, { cause: err });
}

function toFleetInstance(db: DBInstance): FleetInstance | null {
  if (!db.DBInstanceIdentifier) return null;
  return {
    identity: instanceSource(db.DBInstanceIdentifier),
    name: db.DBInstanceIdentifier,
    engine: db.Engine ?? "unknown",
    engineVersion: db.EngineVersion ?? "unknown",
    parameterGroup: db.DBParameterGroups?.[0]?.DBParameterGroupName ?? null,
    status: db.DBInstanceStatus ?? "unknown",
  };
}

export function parameterToSetting(p: Parameter): Setting | null {
  if (!p.ParameterName) return null;
  const unit = parseUnit(p.Description);
  return {
    name: p.ParameterName,
    value: p.ParameterValue ?? ENGINE_DEFAULT,
    ...(unit ? { unit } : {}),
  };
}

/**
 * Instances seen by `listInstances` are remembered for the life of the
 * provider, so resolving a listed instance costs no second DescribeDBInstances.
 */
export class RdsMetadataProvider implements FleetMetadataProvider {
  private readonly listed = new Map<string, FleetInstance>();

  constructor(private readonly api: RdsApi) {}

  async listInstances(): Promise<FleetInstance[]> {
    const instances: FleetInstance[] = [];
    let marker: string | undefined;
    let pages = 0;

    do {
      let page: DescribeDBInstancesCommandOutput;
      try {
        page = await this.api.describeDBInstances({ Marker: marker });
      } catch (err) {
        throw classifyAwsError(err, instanceSource("*"));
      }
      pages++;
      for (const db of page.DBInstances ?? []) {
        const instance = toFleetInstance(db);
        if (!instance) continue;
        instances.push(instance);
        this.listed.set(instance.name, instance);
      }
      marker = page.Marker;
    } while (marker);

    logger.debug({ instanceCount: instances.length, pages }, "FLEET: Listed instances");
    return instances;
  }

  async getInstance(identity: InstanceIdentity): Promise<FleetInstance> {
    const known = this.listed.get(identity.id);
    if (known) return known;

    let page: DescribeDBInstancesCommandOutput;
    try {
      page = await this.api.describeDBInstances({ DBInstanceIdentifier: identity.id });
    } catch (err) {
      throw classifyAwsError(err, identity);
    }
    const db = page.DBInstances?.[0];
    const instance = db ? toFleetInstance(db) : null;
    if (!instance) {
      throw new NotFoundError(identity, "instance does not exist");
    }
    return instance;
  }

  async getTemplateValues(identity: TemplateIdentity, names?: readonly string[]): Promise<Setting[]> {
    const wanted = names ? new Set(names) : null;
    const settings: Setting[] = [];
    let marker: string | undefined;

    do {
      let page: DescribeDBParametersCommandOutput;
      try {
        page = await this.api.describeDBParameters({ DBParameterGroupName: identity.id, Marker: marker });
      } catch (err) {
        throw classifyAwsError(err, identity);
      }
      for (const p of page.Parameters ?? []) {
        const setting = parameterToSetting(p);
        if (!setting) continue;
        if (wanted && !wanted.has(setting.name)) continue;
        settings.push(setting);
      }
      marker = page.Marker;
    } while (marker);

    return settings;
  }
}
