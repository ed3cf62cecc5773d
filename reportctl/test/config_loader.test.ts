import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { createRegistry } from "../src/schema/registry.js";
import { InvalidConfigError, ReportIOError } from "../src/errors.js";

const HERE = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.resolve(HERE, "../fixtures");
const registry = createRegistry(path.resolve(HERE, "../schemas"));

describe("config loader", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "runreport-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it("loads a YAML config", () => {
    expect(loadConfig(path.join(FIXTURES, "config.yaml"), {})).toEqual({
      githash: "fedcba9876543210",
      repositories: { specs: "./specs-repo" },
      suites: { sequence: { repository: "specs", baseurl: "https://specs.example.test/tree/main" } },
    });
  });

  it("loads a JSON config", () => {
    expect(loadConfig(path.join(FIXTURES, "config.json"), {})).toEqual({ githash: "0123456789abcdef" });
  });

  it("applies environment variable overrides", () => {
    const env = { RUNREPORT_GITHASH: "feedface", OTHER_GITHASH: "ignored" };
    expect(loadConfig(path.join(FIXTURES, "config.yaml"), env)).toMatchObject({
      githash: "feedface",
      repositories: { specs: "./specs-repo" },
    });
  });

  it("treats an empty file as an empty config", () => {
    expect(loadConfig(write("empty.yaml", ""), {})).toEqual({});
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => loadConfig(write("list.yaml", "- a\n- b\n"), {})).toThrow(InvalidConfigError);
    expect(() => loadConfig(write("scalar.yaml", "42\n"), {})).toThrow(/expected a mapping at the top level/);
  });

  it("rejects a document that does not parse", () => {
    expect(() => loadConfig(write("broken.yaml", "githash: [unterminated\n"), {})).toThrow(InvalidConfigError);
  });

  it("raises an IO error for a missing file", () => {
    expect(() => loadConfig(path.join(dir, "none.yaml"), {})).toThrow(ReportIOError);
  });
});

describe("config validator", () => {
  it("accepts the fixtures", () => {
    for (const name of ["config.yaml", "config.json"]) {
      const file = path.join(FIXTURES, name);
      expect(validateConfig(loadConfig(file, {}), registry, file)).toEqual(loadConfig(file, {}));
    }
  });

  it("accepts an empty config", () => {
    expect(validateConfig({}, registry, "c.yaml")).toEqual({});
  });

  it("rejects fields of the wrong type", () => {
    expect(() => validateConfig({ githash: 5 }, registry, "c.yaml")).toThrow(
      "Invalid config (c.yaml): config/githash must be string",
    );
  });

  it("rejects a suite without a base URL", () => {
    const bad = { repositories: { specs: "./specs" }, suites: { sequence: { repository: "specs" } } };
    expect(() => validateConfig(bad, registry, "c.yaml")).toThrow(
      "config/suites/sequence must have required property 'baseurl'",
    );
  });
});
