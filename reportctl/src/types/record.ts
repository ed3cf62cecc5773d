/** Record model: runs, suites and case outcomes. */

export const OUTCOMES = ["passed", "failed", "errored", "skipped"] as const;

export type Outcome = (typeof OUTCOMES)[number];

/** Which input produced a case. Only used to order merges, never rendered. */
export type CaseSource = "stream" | "junit";

export type TestCase = {
  suite: string;
  name: string;
  outcome: Outcome;
  message?: string;
  /** Seconds, never negative. */
  duration: number;
  source: CaseSource;
  testId?: string;
  timestamp?: string;
  /** Captured stdout of the case. */
  output?: string;
};

export type Suite = {
  name: string;
  /** Keyed by case name, in first-seen order. */
  cases: Map<string, TestCase>;
};

export type TestRun = {
  hostname: string | null;
  started: string | null;
  finished: string | null;
  githash: string | null;
  /** Keyed by suite name, in first-seen order. */
  suites: Map<string, Suite>;
};

export type OutcomeCounts = {
  total: number;
  passed: number;
  failed: number;
  errored: number;
  skipped: number;
  /** Seconds. */
  duration: number;
};

export type AggregatedSuite = {
  name: string;
  cases: TestCase[];
  counts: OutcomeCounts;
};

export type AggregatedRun = {
  hostname: string | null;
  started: string | null;
  finished: string | null;
  githash: string | null;
  suites: AggregatedSuite[];
  counts: OutcomeCounts;
};
