export type ReportErrorCode =
  | "MALFORMED_RECORD"
  | "MALFORMED_SECONDARY_FILE"
  | "UNKNOWN_OUTCOME"
  | "IO_ERROR"
  | "INVALID_CONFIG";

/**
 * Base class for every failure the report pipeline raises on purpose.
 * All of them are fatal for the invocation.
 */
export class ReportError extends Error {
  constructor(
    readonly code: ReportErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A primary stream line that is not a valid record. */
export class MalformedRecordError extends ReportError {
  constructor(
    readonly line: number,
    reason: string,
  ) {
    super("MALFORMED_RECORD", `Malformed record at line ${line}: ${reason}`, { line });
  }
}

export class MalformedSecondaryFileError extends ReportError {
  constructor(
    readonly file: string,
    reason: string,
  ) {
    super("MALFORMED_SECONDARY_FILE", `Malformed JUnit file ${file}: ${reason}`, { file });
  }
}

export class UnknownOutcomeError extends ReportError {
  constructor(
    readonly value: string,
    where: string,
  ) {
    super("UNKNOWN_OUTCOME", `Unknown outcome "${value}" (${where})`, { value, where });
  }
}

export class ReportIOError extends ReportError {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super("IO_ERROR", `I/O error on ${path}: ${reason}`, { path });
  }
}

export class InvalidConfigError extends ReportError {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super("INVALID_CONFIG", `Invalid config (${path}): ${reason}`, { path });
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Wrap a filesystem failure on `filePath` as a ReportIOError. */
export function ioError(filePath: string, e: unknown): ReportIOError {
  return new ReportIOError(filePath, errorMessage(e));
}
