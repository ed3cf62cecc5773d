export type SuiteSpecSource = {
  /** Key into `repositories`. */
  repository: string;
  /** Prefix of the suite's test identifiers; the remainder is a path in the repository. */
  baseurl: string;
};

/** Run configuration: build metadata and where test specifications live. */
export type ReportConfig = {
  githash?: string;
  /** Repository name → local checkout path. */
  repositories?: Record<string, string>;
  suites?: Record<string, SuiteSpecSource>;
};
