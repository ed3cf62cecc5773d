import fs from "node:fs";
import { MalformedRecordError, errorMessage, ioError } from "../errors.js";
import { addCase, createRun } from "../aggregate/run.js";
import { parseOutcome } from "./outcome.js";
import type { SchemaCheck, SchemaRegistry } from "../schema/registry.js";
import type { EndEvent, EventKind, ResultEvent, StartEvent } from "../types/events.js";
import type { TestCase, TestRun } from "../types/record.js";

export type RecordChecks = {
  start: SchemaCheck<StartEvent>;
  result: SchemaCheck<ResultEvent>;
  end: SchemaCheck<EndEvent>;
};

export function createRecordChecks(registry: SchemaRegistry): RecordChecks {
  return {
    start: registry.checker<StartEvent>("start-event"),
    result: registry.checker<ResultEvent>("result-event"),
    end: registry.checker<EndEvent>("end-event"),
  };
}

function isEventKind(type: string): type is EventKind {
  return type === "start" || type === "result" || type === "end";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCase(event: ResultEvent, line: number): TestCase {
  const testCase: TestCase = {
    suite: event.suite,
    name: event.name,
    outcome: parseOutcome(event.outcome, `line ${line}`),
    duration: event.duration ?? 0,
    source: "stream",
  };
  if (event.message !== undefined) testCase.message = event.message;
  if (event.test_id !== undefined) testCase.testId = event.test_id;
  if (event.timestamp !== undefined) testCase.timestamp = event.timestamp;
  if (event.output !== undefined) testCase.output = event.output;
  return testCase;
}

/**
 * Ingest a JSON-lines record stream into `run`.
 *
 * Blank lines are skipped and events of unknown type are ignored. Anything
 * else that does not validate aborts ingestion with a MalformedRecordError
 * naming the 1-based line.
 */
export function ingestRecords(text: string, checks: RecordChecks, run: TestRun = createRun()): TestRun {
  const lines = text.split(/\r?\n/);

  for (const [index, raw] of lines.entries()) {
    const line = index + 1;
    if (raw.trim() === "") continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new MalformedRecordError(line, `invalid JSON (${errorMessage(e)})`);
    }

    if (!isPlainObject(parsed)) {
      throw new MalformedRecordError(line, "expected a JSON object");
    }
    const type = parsed.type;
    if (typeof type !== "string") {
      throw new MalformedRecordError(line, 'missing string property "type"');
    }
    if (!isEventKind(type)) continue;

    switch (type) {
      case "start": {
        const res = checks.start(parsed);
        if (!res.ok) throw new MalformedRecordError(line, res.errors);
        run.hostname = res.value.hostname ?? run.hostname;
        run.started = res.value.started;
        break;
      }
      case "result": {
        const res = checks.result(parsed);
        if (!res.ok) throw new MalformedRecordError(line, res.errors);
        addCase(run, toCase(res.value, line));
        break;
      }
      case "end": {
        const res = checks.end(parsed);
        if (!res.ok) throw new MalformedRecordError(line, res.errors);
        run.finished = res.value.finished;
        break;
      }
    }
  }

  return run;
}

/** Read the whole record stream from a file, or from stdin when `source` is "-". */
export function readRecordSource(source: string): string {
  try {
    return fs.readFileSync(source === "-" ? 0 : source, "utf8");
  } catch (e) {
    throw ioError(source === "-" ? "<stdin>" : source, e);
  }
}
