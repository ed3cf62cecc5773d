import path from "node:path";
import { parseCaseDetail, type CaseDetail } from "../ingest/detail.js";
import {
  NOT_KNOWN,
  escapeCell,
  escapeHeading,
  formatSeconds,
  heading,
  keyValueTable,
  literalBlock,
  outcomeMarker,
  table,
  xref,
} from "./asciidoc.js";
import type { AssetStager } from "../staging/assets.js";
import type { SpecCatalog } from "../staging/specs.js";
import type { AggregatedRun, AggregatedSuite, OutcomeCounts, TestCase } from "../types/record.js";

export type RenderOptions = {
  /** Report title, supplied by the invoker. */
  label: string;
  /** Copies images and specifications; without one they are referenced where they are. */
  stager?: AssetStager;
  /** Test specifications; enables the specification appendix. */
  specs?: SpecCatalog;
};

/** A case with its position in the document. */
type Entry = {
  testCase: TestCase;
  /** "case-<suite#>-<case#>", 1-based. */
  id: string;
  detailed: boolean;
};

const SUITE_COLS = "4,1,1,4";

function orNotKnown(value: string | null): string {
  return value === null || value === "" ? NOT_KNOWN : escapeCell(value);
}

function countsLine(c: OutcomeCounts): string {
  return `passed ${c.passed}, failed ${c.failed}, errored ${c.errored}, skipped ${c.skipped}, ${formatSeconds(c.duration)} s`;
}

function summary(run: AggregatedRun): string[] {
  const rows: Array<[string, string]> = [
    ["hostname", orNotKnown(run.hostname)],
    ["started", orNotKnown(run.started)],
    ["finished", orNotKnown(run.finished)],
    ["git hash", orNotKnown(run.githash === null ? null : run.githash.slice(0, 8))],
    ["test cases", String(run.counts.total)],
    ["duration (s)", formatSeconds(run.counts.duration)],
    ["passed", String(run.counts.passed)],
    ["failed", String(run.counts.failed)],
    ["errored", String(run.counts.errored)],
    ["skipped", String(run.counts.skipped)],
  ];
  return keyValueTable(rows, { cols: "1,3", title: "Summary" });
}

function suiteSection(suite: AggregatedSuite, entries: Entry[]): string[] {
  const rows = entries.map(({ testCase: c, id, detailed }) => [
    detailed ? xref(id, c.name) : escapeCell(c.name),
    outcomeMarker(c.outcome),
    formatSeconds(c.duration),
    c.message === undefined ? "" : escapeCell(c.message),
  ]);
  return [
    heading(2, `Test Suite: ${suite.name}`),
    "",
    ...table(rows, {
      cols: SUITE_COLS,
      header: ["case", "result", "duration (s)", "message"],
      title: countsLine(suite.counts),
    }),
  ];
}

function detailBody(detail: CaseDetail, stager: AssetStager | undefined): string[] {
  const lines: string[] = [];
  for (const image of detail.images) {
    const target = stager ? stager.stageImage(image.path) : image.path;
    lines.push("", `.${escapeHeading(image.title ?? path.basename(image.path))}`, `image::${target}[]`);
  }
  for (const t of detail.tables) {
    lines.push(
      "",
      ...keyValueTable(
        t.rows.map(([k, v]) => [k, escapeCell(v)] as const),
        { cols: "1,4", title: t.title },
      ),
    );
  }
  return lines;
}

function caseDetail(entry: Entry, opts: RenderOptions): string[] {
  const c = entry.testCase;
  const title = opts.specs ? opts.specs.title(c) : c.name;
  const rows: Array<[string, string]> = [];
  if (opts.specs?.enabled) rows.push(["test specification", `<<${entry.id}-spec>>`]);
  rows.push(
    ["test identifier", orNotKnown(c.testId ?? null)],
    ["timestamp", orNotKnown(c.timestamp ?? null)],
    ["duration (s)", formatSeconds(c.duration)],
    ["result", outcomeMarker(c.outcome)],
    ["reason", c.message === undefined ? "" : escapeCell(c.message)],
  );

  const lines = ["", `[#${entry.id}]`, heading(3, title), "", ...keyValueTable(rows, { cols: "1,4" })];

  const detail = parseCaseDetail(c.output);
  if (detail) {
    lines.push(...detailBody(detail, opts.stager));
  } else if (c.output !== undefined && c.output !== "") {
    lines.push("", ...literalBlock(c.output));
  }
  return lines;
}

function specAppendix(suites: AggregatedSuite[], entries: Entry[][], opts: RenderOptions & { specs: SpecCatalog }): string[] {
  const lines = ["", "[appendix]", heading(1, "Test Specifications")];
  suites.forEach((suite, si) => {
    lines.push("", heading(2, `Test Suite: ${suite.name}`));
    for (const entry of entries[si]) {
      const c = entry.testCase;
      const file = opts.specs.specPath(c);
      lines.push("", `[#${entry.id}-spec]`);
      if (file !== null) {
        const target = opts.stager ? opts.stager.stageInclude(file, entry.id, 3) : file;
        lines.push(`include::${target}[]`);
      } else {
        lines.push(`_(No test specification for ${escapeHeading(opts.specs.title(c))})_`);
      }
    }
  });
  return lines;
}

/**
 * Render an aggregated run as AsciiDoc.
 *
 * Fixed order: title, summary table, one section per suite with its case
 * table. Detail sections follow when any case carries output, a test
 * identifier or a specification; the specification appendix follows when
 * `specs` is configured. Suites and cases keep the run's order.
 */
export function renderReport(run: AggregatedRun, opts: RenderOptions): string {
  const { specs } = opts;
  const entries: Entry[][] = run.suites.map((suite, si) =>
    suite.cases.map((c, ci) => ({
      testCase: c,
      id: `case-${si + 1}-${ci + 1}`,
      detailed:
        (c.output !== undefined && c.output !== "") ||
        c.testId !== undefined ||
        (specs !== undefined && specs.specPath(c) !== null),
    })),
  );

  const lines: string[] = [heading(1, opts.label), "", ...summary(run)];

  run.suites.forEach((suite, si) => {
    lines.push("", ...suiteSection(suite, entries[si]));
  });

  const detailed = entries.flat().filter((e) => e.detailed);
  if (detailed.length > 0) {
    lines.push("", heading(2, "Test Details"));
    for (const entry of detailed) {
      lines.push(...caseDetail(entry, opts));
    }
  }

  if (specs?.enabled) {
    lines.push(...specAppendix(run.suites, entries, { ...opts, specs }));
  }

  return lines.join("\n") + "\n";
}
