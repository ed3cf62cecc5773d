import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

/** Formats referenced by the bundled schemas; iso-date-time leaves the offset optional. */
const FORMATS = ["iso-date-time"] as const;

export function createAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance, formats: readonly string[]) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv, FORMATS);

  return ajv;
}
