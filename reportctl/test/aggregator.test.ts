import { describe, expect, it } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { aggregate, countOutcomes, mergeJunit, sumCounts } from "../src/aggregate/aggregator.js";
import { addCase, createRun } from "../src/aggregate/run.js";
import { parseJunitXml, readJunitFile } from "../src/ingest/junit-xml.js";
import { UnknownOutcomeError } from "../src/errors.js";
import type { TestCase, TestRun } from "../src/types/record.js";

const FIXTURES = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../fixtures");

function streamCase(suite: string, name: string, outcome: TestCase["outcome"], duration = 0, message?: string): TestCase {
  return message === undefined
    ? { suite, name, outcome, duration, source: "stream" }
    : { suite, name, outcome, duration, message, source: "stream" };
}

/** The run the sample stream ingests to. */
function sampleRun(): TestRun {
  const run = createRun();
  run.hostname = "h1";
  run.started = "2023-07-31T13:00:00Z";
  run.finished = "2023-07-31T13:00:02Z";
  addCase(run, streamCase("sequence", "ping", "passed", 0.5));
  addCase(run, streamCase("sequence", "ping6", "failed", 1.2, "timeout"));
  return run;
}

describe("countOutcomes", () => {
  it("counts each outcome and sums durations", () => {
    const counts = countOutcomes([
      streamCase("s", "a", "passed", 1),
      streamCase("s", "b", "failed", 2),
      streamCase("s", "c", "errored", 0.25),
      streamCase("s", "d", "skipped"),
      streamCase("s", "e", "passed", 0.75),
    ]);
    expect(counts).toEqual({ total: 5, passed: 2, failed: 1, errored: 1, skipped: 1, duration: 4 });
  });

  it("rejects a case whose outcome is not in the closed set", () => {
    const bogus: TestCase = JSON.parse('{"suite":"s","name":"a","outcome":"maybe","duration":0,"source":"stream"}');
    expect(() => countOutcomes([bogus])).toThrow(UnknownOutcomeError);
  });
});

describe("aggregate", () => {
  it("aggregates the sample run", () => {
    const agg = aggregate(sampleRun());
    expect(agg.suites.map((s) => s.name)).toEqual(["sequence"]);
    expect(agg.suites[0].cases.map((c) => c.name)).toEqual(["ping", "ping6"]);
    expect(agg.counts).toMatchObject({ total: 2, passed: 1, failed: 1, errored: 0, skipped: 0 });
    expect(agg.counts.duration).toBeCloseTo(1.7);
  });

  it("lets JUnit cases replace stream cases with the same key", () => {
    const agg = aggregate(sampleRun(), [readJunitFile(path.join(FIXTURES, "sample-junit.xml"))]);

    const sequence = agg.suites[0];
    expect(sequence.cases.map((c) => [c.name, c.outcome, c.source])).toEqual([
      ["ping", "passed", "stream"],
      ["ping6", "passed", "junit"],
      ["traceroute", "errored", "junit"],
    ]);
    expect(sequence.cases[1].message).toBeUndefined();
    expect(sequence.counts).toMatchObject({ total: 3, passed: 2, failed: 0, errored: 1, skipped: 0 });
    expect(agg.suites.map((s) => s.name)).toEqual(["sequence", "throughput"]);
  });

  it("applies JUnit files in the order given", () => {
    const first = parseJunitXml(`<testsuite name="s"><testcase name="a"><failure message="one"/></testcase></testsuite>`, "1.xml");
    const second = parseJunitXml(`<testsuite name="s"><testcase name="a"/></testsuite>`, "2.xml");
    expect(aggregate(createRun(), [first, second]).suites[0].cases[0].outcome).toBe("passed");
    expect(aggregate(createRun(), [second, first]).suites[0].cases[0].outcome).toBe("failed");
  });

  it("is idempotent", () => {
    const run = sampleRun();
    const doc = readJunitFile(path.join(FIXTURES, "sample-junit.xml"));
    const once = aggregate(run, [doc]);
    const twice = aggregate(run, [doc]);
    const again = aggregate(run);
    expect(twice).toEqual(once);
    expect(again).toEqual(once);
  });

  it("derives run counters from suite counters and suite counters from cases", () => {
    const agg = aggregate(sampleRun(), [readJunitFile(path.join(FIXTURES, "sample-junit.xml"))]);
    for (const suite of agg.suites) {
      expect(suite.counts).toEqual(countOutcomes(suite.cases));
    }
    expect(agg.counts).toEqual(sumCounts(agg.suites.map((s) => s.counts)));
    expect(agg.counts).toMatchObject({ total: 5, passed: 2, failed: 1, errored: 1, skipped: 1 });
    expect(agg.counts.duration).toBeCloseTo(0.5 + 1.5 + 2 + 10.25);
  });

  it("fills missing run metadata from JUnit suites only", () => {
    const doc = readJunitFile(path.join(FIXTURES, "sample-junit.xml"));

    const bare = createRun();
    mergeJunit(bare, doc);
    expect(bare.hostname).toBe("junit-host");
    expect(bare.started).toBe("2023-07-31T12:59:00Z");

    const agg = aggregate(sampleRun(), [doc]);
    expect(agg.hostname).toBe("h1");
    expect(agg.started).toBe("2023-07-31T13:00:00Z");
  });

  it("keeps a JUnit suite without cases", () => {
    const doc = parseJunitXml(`<testsuites><testsuite name="empty" tests="0"/></testsuites>`, "e.xml");
    const agg = aggregate(createRun(), [doc]);
    expect(agg.suites).toEqual([
      { name: "empty", cases: [], counts: { total: 0, passed: 0, failed: 0, errored: 0, skipped: 0, duration: 0 } },
    ]);
  });

  it("passes build metadata through", () => {
    expect(aggregate(createRun({ githash: "0123456789abcdef" })).githash).toBe("0123456789abcdef");
  });
});
