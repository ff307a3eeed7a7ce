import { logger } from "../utils/logger.js";
import { NotFoundError, resolvedSettingSet } from "./errors.js";
import type { FleetMetadataProvider } from "./rds.js";
import {
  templateSource,
  type InstanceIdentity,
  type SettingSet,
  type SettingsResolver,
  type TemplateIdentity,
} from "./settings.js";

/**
 * Resolves declared values from parameter groups. For an instance this is the
 * first parameter group attached to it. Formula values such as
 * "{DBInstanceClassMemory/32768}" come back verbatim; only a live connection
 * can evaluate them.
 */
export class TemplateResolver implements SettingsResolver<InstanceIdentity | TemplateIdentity> {
  constructor(private readonly provider: FleetMetadataProvider) {}

  async resolve(source: InstanceIdentity | TemplateIdentity, names?: readonly string[]): Promise<SettingSet> {
    const template = source.kind === "template" ? source : await this.templateFor(source);
    const settings = await this.provider.getTemplateValues(template, names);

    logger.debug({
      source: source.kind === "instance" ? source.id : undefined,
      parameterGroup: template.id,
      requested: names?.length ?? "all",
      resolved: settings.length,
    }, "TEMPLATE_RESOLVE: Parameter group values fetched");

    return resolvedSettingSet(source, settings);
  }

  private async templateFor(instance: InstanceIdentity): Promise<TemplateIdentity> {
    const meta = await this.provider.getInstance(instance);
    if (!meta.parameterGroup) {
      throw new NotFoundError(instance, "instance has no parameter group attached");
    }
    return templateSource(meta.parameterGroup);
  }
}
