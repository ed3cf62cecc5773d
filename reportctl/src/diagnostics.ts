import type { Writable } from "node:stream";
import type { ReportError } from "./errors.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type DiagnosticFormat = "human" | "jsonl";

export type DiagnosticSink = (d: Diagnostic) => void;

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Error diagnostic for a pipeline failure. */
export function fromReportError(err: ReportError): Diagnostic {
  const p = err.details.path ?? err.details.file;
  return diag("error", err.code, err.message, {
    ...(typeof p === "string" ? { path: p } : {}),
    details: err.details,
  });
}

/** Render one diagnostic as a line of output, without the trailing newline. */
export function formatDiagnostic(d: Diagnostic, format: DiagnosticFormat): string {
  if (format === "jsonl") return JSON.stringify(d);
  return d.level === "error" ? d.message : `[${d.level}] ${d.message}`;
}

/** A sink printing to `stream` (stderr by default: stdout carries the document). */
export function createDiagnosticSink(
  format: DiagnosticFormat,
  stream: Pick<Writable, "write"> = process.stderr,
): DiagnosticSink {
  return (d) => {
    stream.write(formatDiagnostic(d, format) + "\n");
  };
}
