import { describe, expect, it, beforeAll } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_SCHEMA_DIR, SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import type { ResultEvent } from "../src/types/events.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(() => {
    registry = createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["config", "end-event", "result-event", "start-event"]);
    expect(registry.get("config")?.filePath).toBe(path.join(SCHEMA_DIR, "config.schema.json"));
  });

  it("defaults to the schemas shipped with the package", () => {
    expect(DEFAULT_SCHEMA_DIR).toBe(SCHEMA_DIR);
    expect(createRegistry().names()).toEqual(registry.names());
  });

  it("caches compiled validators", () => {
    expect(registry.getValidator("end-event")).toBe(registry.getValidator("end-event"));
  });

  it("throws for an unknown schema", () => {
    expect(() => registry.getValidator("manifest")).toThrow("Schema not found: manifest");
  });

  it("throws for a missing schema directory", () => {
    const missing = path.join(SCHEMA_DIR, "nope");
    expect(fs.existsSync(missing)).toBe(false);
    expect(() => createRegistry(missing)).toThrow(`Schema directory not found: ${missing}`);
  });

  describe("result-event schema", () => {
    const check = () => registry.checker<ResultEvent>("result-event");

    it("accepts a result and narrows it", () => {
      const res = check()({ type: "result", suite: "s", name: "a", outcome: "passed", duration: 0.5 });
      expect(res.ok).toBe(true);
      if (res.ok) expect(res.value.suite).toBe("s");
    });

    it("reports every problem with the schema name as prefix", () => {
      const res = check()({ type: "result", name: "", outcome: "passed", duration: -2 });
      expect(res.ok).toBe(false);
      if (res.ok) return;
      expect(res.errors.split(", ").sort()).toEqual([
        "result-event must have required property 'suite'",
        "result-event/duration must be >= 0",
        "result-event/name must NOT have fewer than 1 characters",
      ]);
    });
  });

  describe("start and end schemas", () => {
    it("require ISO 8601 timestamps", () => {
      expect(registry.checker("start-event")({ type: "start", started: "2023-07-31T13:00:00Z" }).ok).toBe(true);
      expect(registry.checker("start-event")({ type: "start", started: "2023-07-31T13:00:00" }).ok).toBe(true);
      expect(registry.checker("end-event")({ type: "end", finished: "2023-07-31T13:00:02.250" }).ok).toBe(true);
      expect(registry.checker("start-event")({ type: "start", started: "2023-07-31" }).ok).toBe(false);
      expect(registry.checker("start-event")({ type: "start", started: "2023-13-31T13:00:00" }).ok).toBe(false);
      expect(registry.checker("start-event")({ type: "start", started: "31/07/2023" }).ok).toBe(false);
      expect(registry.checker("end-event")({ type: "end", finished: "2023-07-31T13:00:02+02:00" }).ok).toBe(true);
      expect(registry.checker("end-event")({ type: "end" }).ok).toBe(false);
    });

    it("only accept their own type", () => {
      expect(registry.checker("end-event")({ type: "start", finished: "2023-07-31T13:00:02Z" }).ok).toBe(false);
    });
  });
});
