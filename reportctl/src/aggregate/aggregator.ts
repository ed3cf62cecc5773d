import { UnknownOutcomeError } from "../errors.js";
import { addCase, ensureSuite } from "./run.js";
import type { JunitDocument } from "../ingest/junit-xml.js";
import type { AggregatedRun, AggregatedSuite, OutcomeCounts, TestCase, TestRun } from "../types/record.js";

export function emptyCounts(): OutcomeCounts {
  return { total: 0, passed: 0, failed: 0, errored: 0, skipped: 0, duration: 0 };
}

/** Count outcomes and sum durations over `cases`. */
export function countOutcomes(cases: Iterable<TestCase>): OutcomeCounts {
  const counts = emptyCounts();
  for (const c of cases) {
    const outcome = c.outcome;
    switch (outcome) {
      case "passed":
        counts.passed++;
        break;
      case "failed":
        counts.failed++;
        break;
      case "errored":
        counts.errored++;
        break;
      case "skipped":
        counts.skipped++;
        break;
      default: {
        const unknown: never = outcome;
        throw new UnknownOutcomeError(String(unknown), `case "${c.name}" in suite "${c.suite}"`);
      }
    }
    counts.total++;
    counts.duration += c.duration;
  }
  return counts;
}

export function sumCounts(all: Iterable<OutcomeCounts>): OutcomeCounts {
  const sum = emptyCounts();
  for (const c of all) {
    sum.total += c.total;
    sum.passed += c.passed;
    sum.failed += c.failed;
    sum.errored += c.errored;
    sum.skipped += c.skipped;
    sum.duration += c.duration;
  }
  return sum;
}

/**
 * Merge one JUnit document into the run. Its cases replace stream cases with
 * the same (suite, name); its suite metadata only fills run fields the stream
 * left unset.
 */
export function mergeJunit(run: TestRun, doc: JunitDocument): void {
  for (const meta of doc.suites) {
    ensureSuite(run, meta.name);
    if (run.hostname === null && meta.hostname !== undefined) run.hostname = meta.hostname;
    if (run.started === null && meta.timestamp !== undefined) run.started = meta.timestamp;
  }
  for (const c of doc.cases) {
    addCase(run, c);
  }
}

/**
 * Merge the JUnit documents, in order, then derive every counter from the
 * final case set. Counters are recomputed on each call.
 */
export function aggregate(run: TestRun, docs: readonly JunitDocument[] = []): AggregatedRun {
  for (const doc of docs) {
    mergeJunit(run, doc);
  }

  const suites: AggregatedSuite[] = [...run.suites.values()].map((suite) => {
    const cases = [...suite.cases.values()];
    return { name: suite.name, cases, counts: countOutcomes(cases) };
  });

  return {
    hostname: run.hostname,
    started: run.started,
    finished: run.finished,
    githash: run.githash,
    suites,
    counts: sumCounts(suites.map((s) => s.counts)),
  };
}
