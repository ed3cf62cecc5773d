import { InvalidConfigError } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ReportConfig } from "../types/config.js";

/** Validate a loaded config against schemas/config.schema.json. */
export function validateConfig(config: unknown, registry: SchemaRegistry, filePath: string): ReportConfig {
  const res = registry.checker<ReportConfig>("config")(config);
  if (!res.ok) {
    throw new InvalidConfigError(filePath, res.errors);
  }
  return res.value;
}
