import fs from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";
import { aggregate } from "../aggregate/aggregator.js";
import { createRun } from "../aggregate/run.js";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { diag, fromReportError, type Diagnostic, type DiagnosticSink } from "../diagnostics.js";
import { ReportError, ReportIOError } from "../errors.js";
import { readJunitFile } from "../ingest/junit-xml.js";
import { createRecordChecks, ingestRecords, readRecordSource } from "../ingest/records.js";
import { renderReport } from "../render/report.js";
import { sinkFor, writeReport } from "../report-writer/writer.js";
import { createRegistry } from "../schema/registry.js";
import { DirectoryStager } from "../staging/assets.js";
import { SpecCatalog } from "../staging/specs.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";
import type { OutcomeCounts } from "../types/record.js";

export type RenderCommandOptions = {
  /** Report title. */
  label: string;
  /** Staging directory for images and included specifications. */
  objdir: string;
  configPath: string;
  /** JUnit XML files merged over the stream, in this order. */
  junit: string[];
  /** Record stream path; "-" (the default) reads stdin. */
  input?: string;
  /** Output path; stdout when omitted. */
  output?: string;
  schemaDir?: string;
  stdout?: Writable;
  env?: NodeJS.ProcessEnv;
  log?: DiagnosticSink;
};

export type RenderCommandResult =
  | { ok: true; suites: number; counts: OutcomeCounts }
  | { ok: false; error: Diagnostic; exitCode: ExitCode };

function requireDirectory(dir: string): void {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ReportIOError(dir, "staging directory does not exist");
  }
}

async function renderPipeline(opts: RenderCommandOptions, log: DiagnosticSink): Promise<Extract<RenderCommandResult, { ok: true }>> {
  requireDirectory(opts.objdir);

  const registry = createRegistry(opts.schemaDir);
  const config = validateConfig(loadConfig(opts.configPath, opts.env), registry, opts.configPath);

  const input = opts.input ?? "-";
  const run = ingestRecords(readRecordSource(input), createRecordChecks(registry), createRun({ githash: config.githash }));
  log(diag("info", "STREAM_INGESTED", `Ingested ${run.suites.size} suite(s) from ${input === "-" ? "stdin" : input}`));

  const docs = opts.junit.map((file) => {
    if (!fs.existsSync(file)) {
      log(diag("info", "JUNIT_ABSENT", `JUnit file not found, skipping: ${file}`, { path: file }));
    }
    return readJunitFile(file);
  });

  const aggregated = aggregate(run, docs);
  const text = renderReport(aggregated, {
    label: opts.label,
    stager: new DirectoryStager(opts.objdir),
    specs: new SpecCatalog(config, path.dirname(path.resolve(opts.configPath))),
  });

  await writeReport(text, sinkFor(opts.output, opts.stdout));
  log(
    diag("info", "REPORT_WRITTEN", `Rendered ${aggregated.counts.total} case(s) in ${aggregated.suites.length} suite(s)`,
      opts.output ? { path: opts.output } : undefined,
    ),
  );

  return { ok: true, suites: aggregated.suites.length, counts: aggregated.counts };
}

/**
 * Ingest, merge, aggregate, render and write one report.
 *
 * The document is rendered in full before anything is written, so a failure
 * at any stage leaves the output untouched.
 */
export async function renderCommand(opts: RenderCommandOptions): Promise<RenderCommandResult> {
  const log = opts.log ?? (() => undefined);
  try {
    return await renderPipeline(opts, log);
  } catch (e) {
    if (e instanceof ReportError) {
      return { ok: false, error: fromReportError(e), exitCode: exitCodeFor(e.code) };
    }
    throw e;
  }
}
