import { logger } from "../utils/logger.js";
import type { FleetInstance, FleetMetadataProvider } from "./rds.js";

/** Every instance the metadata service reports, all pages materialized. */
export async function listInstances(provider: FleetMetadataProvider): Promise<FleetInstance[]> {
  const instances = await provider.listInstances();
  logger.info({ instanceCount: instances.length }, "FLEET: Instances in scope before filtering");
  return instances;
}

/** Case-sensitive substring match on the instance name. "" keeps everything. */
export function filterInstances<T extends { name: string }>(instances: readonly T[], substring: string): T[] {
  if (substring === "") return [...instances];
  return instances.filter(instance => instance.name.includes(substring));
}
