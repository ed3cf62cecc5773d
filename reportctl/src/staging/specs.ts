import fs from "node:fs";
import path from "node:path";
import { ioError } from "../errors.js";
import type { ReportConfig } from "../types/config.js";
import type { TestCase } from "../types/record.js";

export const SPEC_FILE = "testspec.adoc";

/**
 * Locates test specifications for cases.
 *
 * A case's test identifier is expected to start with its suite's `baseurl`;
 * the rest of the identifier is a path inside the suite's repository checkout
 * holding a testspec.adoc. Relative repository paths resolve against
 * `baseDir`, normally the directory of the config file.
 */
export class SpecCatalog {
  private readonly titles = new Map<string, string | null>();

  constructor(
    private readonly config: ReportConfig,
    private readonly baseDir: string = process.cwd(),
  ) {}

  /** True when the config maps at least one suite to a repository. */
  get enabled(): boolean {
    return Object.keys(this.config.suites ?? {}).length > 0;
  }

  /** Directory for the case's files, whether or not it exists. */
  caseDir(c: TestCase): string | null {
    const source = this.config.suites?.[c.suite];
    if (!source || c.testId === undefined || !c.testId.startsWith(source.baseurl)) return null;
    const repo = this.config.repositories?.[source.repository];
    if (repo === undefined) return null;
    const rest = c.testId.slice(source.baseurl.length).replace(/^\/+/, "");
    return path.resolve(this.baseDir, repo, rest);
  }

  /** Path of the case's testspec.adoc when it is a regular file. */
  specPath(c: TestCase): string | null {
    const dir = this.caseDir(c);
    if (dir === null) return null;
    const file = path.join(dir, SPEC_FILE);
    return fs.existsSync(file) && fs.statSync(file).isFile() ? file : null;
  }

  /** The first title of the case's specification, else the case name. */
  title(c: TestCase): string {
    const file = this.specPath(c);
    if (file === null) return c.name;

    let cached = this.titles.get(file);
    if (cached === undefined) {
      cached = readFirstTitle(file);
      this.titles.set(file, cached);
    }
    return cached ?? c.name;
  }
}

function readFirstTitle(file: string): string | null {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf8");
  } catch (e) {
    throw ioError(file, e);
  }
  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith("=")) {
      const title = line.replace(/^[= ]+/, "").trimEnd();
      return title === "" ? null : title;
    }
  }
  return null;
}
