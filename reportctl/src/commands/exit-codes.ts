import type { ReportErrorCode } from "../errors.js";

/**
 * CLI exit codes. 1 is left to failures that are not report errors.
 */
export const EXIT = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  MALFORMED_RECORD: 2,
  MALFORMED_SECONDARY_FILE: 3,
  UNKNOWN_OUTCOME: 4,
  IO_ERROR: 5,
  INVALID_CONFIG: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: ReportErrorCode): ExitCode {
  switch (code) {
    case "MALFORMED_RECORD":
      return EXIT.MALFORMED_RECORD;
    case "MALFORMED_SECONDARY_FILE":
      return EXIT.MALFORMED_SECONDARY_FILE;
    case "UNKNOWN_OUTCOME":
      return EXIT.UNKNOWN_OUTCOME;
    case "IO_ERROR":
      return EXIT.IO_ERROR;
    case "INVALID_CONFIG":
      return EXIT.INVALID_CONFIG;
  }
}
