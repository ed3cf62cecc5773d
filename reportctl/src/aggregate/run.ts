import type { Suite, TestCase, TestRun } from "../types/record.js";

/** A fresh, empty run. */
export function createRun(meta: { githash?: string | null } = {}): TestRun {
  return {
    hostname: null,
    started: null,
    finished: null,
    githash: meta.githash ?? null,
    suites: new Map(),
  };
}

/** Get the named suite, creating it at the end of the suite order if new. */
export function ensureSuite(run: TestRun, name: string): Suite {
  let suite = run.suites.get(name);
  if (!suite) {
    suite = { name, cases: new Map() };
    run.suites.set(name, suite);
  }
  return suite;
}

/**
 * Add a case to its suite. A case already present under the same name is
 * replaced; the replacement keeps the position of the first appearance.
 */
export function addCase(run: TestRun, testCase: TestCase): void {
  ensureSuite(run, testCase.suite).cases.set(testCase.name, testCase);
}
