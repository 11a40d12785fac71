import { ConfigValidationError } from "../errors";
import { SchemaValidationCache, formatSchemaErrors } from "../schemas";
import configSchema from "../schemas/vulnrank_config.schema.json";
import type { VulnrankConfig } from "./config_manager.types";

/**
 * Checks a decoded configuration document against the vulnrank.yaml schema.
 *
 * An empty document (`null`, as js-yaml returns for an empty file) is an
 * empty configuration.
 *
 * @throws ConfigValidationError listing every schema violation
 */
export function validateConfig(document: unknown, source: string): VulnrankConfig {
  if (document === null || document === undefined) return {};

  const validate = SchemaValidationCache.getValidator<VulnrankConfig>("vulnrank_config", configSchema);
  if (!validate(document)) {
    throw new ConfigValidationError(source, formatSchemaErrors(validate.errors));
  }
  return document;
}
