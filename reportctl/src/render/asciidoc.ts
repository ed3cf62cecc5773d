import { UnknownOutcomeError } from "../errors.js";
import type { Outcome } from "../types/record.js";

/** Placeholder for metadata the inputs did not provide. */
export const NOT_KNOWN = "not known";

/**
 * Characters with a meaning in AsciiDoc text or tables: cell separators,
 * inline formatting marks, macro brackets, attribute references, passthrough
 * (`+`, `$$`) and escape characters.
 */
const SPECIAL_CHARS = /[&<>|*_#`^~+$[\]{}\\']/g;

/**
 * Escape free text for embedding in AsciiDoc.
 *
 * Special characters become numeric character references. Index terms
 * (`((...))`, `(((...)))`) and the typographic replacement sequences (`--`,
 * `...`, `(C)`, `(R)`, `(TM)`) are broken up, so the converted text reads
 * exactly as the input did.
 */
export function escapeText(value: string): string {
  return value
    .replace(SPECIAL_CHARS, (ch) => `&#${ch.charCodeAt(0)};`)
    .replace(/\((?=\()/g, "&#40;")
    .replace(/\)(?=\))/g, "&#41;")
    .replace(/-(?=-)/g, "&#45;")
    .replace(/\.(?=\.\.)/g, "&#46;")
    .replace(/\((C|R|TM)\)/g, "&#40;$1)");
}

/**
 * Escape text for a table cell; line breaks are kept as hard breaks. A line
 * starting with `/` would open a comment, so that slash is escaped too.
 */
export function escapeCell(value: string): string {
  return escapeText(value)
    .split(/\r?\n/)
    .map((line) => line.replace(/^\//, "&#47;"))
    .join(" +\n");
}

/** Escape text for a single-line heading or block title. */
export function escapeHeading(value: string): string {
  return escapeText(value.replace(/\s*\r?\n\s*/g, " ").trim());
}

export function outcomeRole(outcome: Outcome): string {
  switch (outcome) {
    case "passed":
      return "test-success";
    case "failed":
      return "test-failure";
    case "errored":
      return "test-error";
    case "skipped":
      return "deemphasize";
    default: {
      const unknown: never = outcome;
      throw new UnknownOutcomeError(String(unknown), "outcome marker");
    }
  }
}

/** Inline marker for an outcome, e.g. `[.test-failure]#failed#`. */
export function outcomeMarker(outcome: Outcome): string {
  return `[.${outcomeRole(outcome)}]#${outcome}#`;
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

export function heading(level: number, title: string): string {
  return `${"=".repeat(level + 1)} ${escapeHeading(title)}`;
}

export type TableOptions = {
  /** Column spec, e.g. "1,3". */
  cols: string;
  /** Header labels; plain text. */
  header?: string[];
  /** Block title; plain text. */
  title?: string;
};

/**
 * An AsciiDoc table. Cells are already-rendered markup; every cell starts
 * its own line so no cell text can be read as a cell spec.
 */
export function table(rows: readonly string[][], opts: TableOptions): string[] {
  const lines: string[] = [];
  if (opts.title !== undefined) lines.push(`.${escapeHeading(opts.title)}`);
  lines.push(opts.header ? `[%header,cols="${opts.cols}"]` : `[cols="${opts.cols}"]`);
  lines.push("|===");
  if (opts.header) {
    lines.push(opts.header.map((h) => `|${escapeText(h)}`).join(" "));
  }
  for (const row of rows) {
    lines.push("");
    for (const cell of row) {
      lines.push(`|${cell}`);
    }
  }
  lines.push("|===");
  return lines;
}

/** Two-column key/value table with bold keys. */
export function keyValueTable(rows: ReadonlyArray<readonly [string, string]>, opts: TableOptions): string[] {
  return table(
    rows.map(([key, value]) => [`*${escapeText(key)}*`, value]),
    opts,
  );
}

/** A literal block; the delimiter is lengthened past any delimiter-like line in `text`. */
export function literalBlock(text: string): string[] {
  let width = 4;
  for (const line of text.split(/\r?\n/)) {
    if (/^\.{4,}$/.test(line)) width = Math.max(width, line.length + 1);
  }
  const delimiter = ".".repeat(width);
  return [delimiter, text, delimiter];
}

/** Cross reference to `id` with escaped link text. */
export function xref(id: string, text: string): string {
  return `<<${id},${escapeHeading(text)}>>`;
}
