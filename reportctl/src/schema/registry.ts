import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type CheckResult<T> = { ok: true; value: T } | { ok: false; errors: string };

/** Validates `data` against one schema and narrows it to `T` on success. */
export type SchemaCheck<T> = (data: unknown) => CheckResult<T>;

/**
 * Schema registry: discovers all JSON Schemas in a directory and hands out
 * compiled checkers. One registry per invocation; nothing is cached globally.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "result-event.schema.json" → "result-event"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Compile and cache a validator for the given schema name. */
  getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /**
   * Checker for `name`. The caller states the type the schema describes; the
   * checker narrows validated data to it.
   */
  checker<T>(name: string): SchemaCheck<T> {
    const validate = this.getValidator(name);
    const conforms = (data: unknown): data is T => validate(data);

    return (data) =>
      conforms(data)
        ? { ok: true, value: data }
        : { ok: false, errors: this.ajv.errorsText(validate.errors, { dataVar: name }) };
  }
}

/** Schemas shipped with the package, beside src/ and dist/. */
export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/** Create and load a registry, from the bundled schemas unless told otherwise. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  registry.load();
  return registry;
}
