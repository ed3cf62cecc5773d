import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { diag, fromReportError, type Diagnostic } from "../diagnostics.js";
import { ReportError } from "../errors.js";
import { readJunitFile } from "../ingest/junit-xml.js";
import { createRecordChecks, ingestRecords, readRecordSource } from "../ingest/records.js";
import { createRegistry } from "../schema/registry.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type ValidateResult =
  | { ok: true; diagnostics: Diagnostic[] }
  | { ok: false; errors: Diagnostic[]; exitCode: ExitCode };

/** Run `check`, turning a ReportError into an error diagnostic. */
function attempt(errors: ReportError[], check: () => void): void {
  try {
    check();
  } catch (e) {
    if (!(e instanceof ReportError)) throw e;
    errors.push(e);
  }
}

/**
 * Check the config, and optionally a record stream and JUnit files, without
 * rendering. Every input is checked even after an earlier one fails.
 */
export function validateCommand(opts: {
  configPath: string;
  input?: string;
  junit?: string[];
  schemaDir?: string;
  env?: NodeJS.ProcessEnv;
}): ValidateResult {
  const registry = createRegistry(opts.schemaDir);
  const failures: ReportError[] = [];
  const diagnostics: Diagnostic[] = [];

  attempt(failures, () => {
    validateConfig(loadConfig(opts.configPath, opts.env), registry, opts.configPath);
    diagnostics.push(diag("info", "CONFIG_OK", `Config valid: ${opts.configPath}`, { path: opts.configPath }));
  });

  if (opts.input !== undefined) {
    const input = opts.input;
    attempt(failures, () => {
      const run = ingestRecords(readRecordSource(input), createRecordChecks(registry));
      let cases = 0;
      for (const suite of run.suites.values()) cases += suite.cases.size;
      diagnostics.push(diag("info", "STREAM_OK", `Stream valid: ${run.suites.size} suite(s), ${cases} case(s)`));
    });
  }

  for (const file of opts.junit ?? []) {
    attempt(failures, () => {
      const doc = readJunitFile(file);
      diagnostics.push(
        diag("info", "JUNIT_OK", `JUnit valid: ${doc.suites.length} suite(s), ${doc.cases.length} case(s)`, { path: file }),
      );
    });
  }

  if (failures.length > 0) {
    return { ok: false, errors: failures.map(fromReportError), exitCode: exitCodeFor(failures[0].code) };
  }
  return { ok: true, diagnostics };
}
