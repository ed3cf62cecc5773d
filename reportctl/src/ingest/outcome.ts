import { UnknownOutcomeError } from "../errors.js";
import type { Outcome } from "../types/record.js";

/**
 * Narrow a raw outcome string to the closed outcome set.
 * There is no fallback: anything else is an UnknownOutcomeError.
 */
export function parseOutcome(value: string, where: string): Outcome {
  switch (value) {
    case "passed":
    case "failed":
    case "errored":
    case "skipped":
      return value;
    default:
      throw new UnknownOutcomeError(value, where);
  }
}
