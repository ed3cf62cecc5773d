import fs from "node:fs";
import YAML from "yaml";
import { InvalidConfigError, errorMessage, ioError } from "../errors.js";

export const ENV_PREFIX = "RUNREPORT_";

/** Read a YAML (or JSON) document; anything but a mapping is invalid. */
function readDocument(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw ioError(filePath, e);
  }

  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new InvalidConfigError(filePath, errorMessage(e));
  }
  if (doc === null || doc === undefined) return {};
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new InvalidConfigError(filePath, "expected a mapping at the top level");
  }
  return Object.fromEntries(Object.entries(doc));
}

/** Apply RUNREPORT_ prefixed environment variable overrides. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // RUNREPORT_GITHASH → githash
    config[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return config;
}

/**
 * Load the run configuration: the file (YAML or JSON) ← environment variables.
 * The result still has to pass validateConfig before it is trusted.
 */
export function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return applyEnvOverrides(readDocument(filePath), env);
}
