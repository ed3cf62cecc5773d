import { XMLParser, XMLValidator } from "fast-xml-parser";
import fs from "node:fs";
import { MalformedSecondaryFileError, ioError } from "../errors.js";
import type { Outcome, TestCase } from "../types/record.js";

export type JunitSuiteMeta = {
  name: string;
  hostname?: string;
  timestamp?: string;
};

/** Suites and cases read from one JUnit XML file, in document order. */
export type JunitDocument = {
  file: string;
  suites: JunitSuiteMeta[];
  cases: TestCase[];
};

type XmlNode = Record<string, unknown>;

const ARRAY_TAGS = new Set(["testsuite", "testcase", "failure", "error", "skipped", "property"]);

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

/** Text of an element, untrimmed: either the bare string or its "#text" child. */
function text(value: unknown): string | undefined {
  const raw = typeof value === "string" ? value : isNode(value) ? value["#text"] : undefined;
  return typeof raw === "string" && raw.trim() !== "" ? raw : undefined;
}

function messageOf(element: unknown): string | undefined {
  return (isNode(element) ? attr(element, "message") : undefined) ?? text(element)?.trim();
}

function firstOf(value: unknown): unknown {
  return asArray(value)[0];
}

function parseDuration(raw: string, file: string, where: string): number {
  const seconds = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new MalformedSecondaryFileError(file, `invalid time "${raw}" on ${where}`);
  }
  return seconds;
}

function outcomeOf(tc: XmlNode): { outcome: Outcome; message?: string } {
  const failure = firstOf(tc.failure);
  if (failure !== undefined) {
    return { outcome: "failed", message: messageOf(failure) };
  }
  const error = firstOf(tc.error);
  if (error !== undefined) {
    return { outcome: "errored", message: messageOf(error) };
  }
  if (tc.skipped !== undefined) {
    return { outcome: "skipped" };
  }
  return { outcome: "passed" };
}

function properties(tc: XmlNode): Map<string, string> {
  const props = new Map<string, string>();
  const container = firstOf(tc.properties);
  if (!isNode(container)) return props;
  for (const p of asArray(container.property)) {
    if (!isNode(p)) continue;
    const name = attr(p, "name");
    const value = attr(p, "value");
    if (name !== undefined && value !== undefined) props.set(name, value);
  }
  return props;
}

/**
 * Timing recorded by the test itself: a JSON object on stdout carrying
 * `timestamp` and `duration`.
 */
function timingFromOutput(output: string | undefined): { timestamp: string; duration?: number } | null {
  if (output === undefined) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return null;
  }
  if (!isNode(parsed) || typeof parsed.timestamp !== "string" || parsed.timestamp === "") return null;
  const duration = parsed.duration;
  return typeof duration === "number" && Number.isFinite(duration) && duration >= 0
    ? { timestamp: parsed.timestamp, duration }
    : { timestamp: parsed.timestamp };
}

function parseCase(tc: XmlNode, suiteName: string | undefined, file: string): TestCase {
  const name = attr(tc, "name");
  if (name === undefined || name === "") {
    throw new MalformedSecondaryFileError(file, "testcase without a name");
  }
  const suite = suiteName ?? attr(tc, "classname");
  if (suite === undefined || suite === "") {
    throw new MalformedSecondaryFileError(file, `testcase "${name}" has no suite name or classname`);
  }

  const time = attr(tc, "time");
  const { outcome, message } = outcomeOf(tc);
  const output = text(firstOf(tc["system-out"]));

  const testCase: TestCase = {
    suite,
    name,
    outcome,
    duration: time === undefined ? 0 : parseDuration(time, file, `testcase "${name}"`),
    source: "junit",
  };

  let timestamp = attr(tc, "timestamp");
  if (timestamp === undefined || time === undefined) {
    const timing = timingFromOutput(output);
    if (timing) {
      timestamp = timing.timestamp;
      if (timing.duration !== undefined) testCase.duration = timing.duration;
    }
  }

  if (message !== undefined) testCase.message = message;
  if (timestamp !== undefined) testCase.timestamp = timestamp;
  if (output !== undefined) testCase.output = output;
  const testId = properties(tc).get("test_id");
  if (testId !== undefined) testCase.testId = testId;

  return testCase;
}

/**
 * Parse JUnit XML into suites and cases.
 *
 * Accepts a <testsuites> wrapper or a single <testsuite> root. Empty content
 * yields an empty document; anything else that is not a JUnit document is a
 * MalformedSecondaryFileError.
 */
export function parseJunitXml(xmlContent: string, file: string): JunitDocument {
  const doc: JunitDocument = { file, suites: [], cases: [] };
  if (xmlContent.trim() === "") return doc;

  const valid = XMLValidator.validate(xmlContent);
  if (valid !== true) {
    throw new MalformedSecondaryFileError(file, `${valid.err.msg} (line ${valid.err.line})`);
  }

  // Output keeps its whitespace; character references decode in text and attributes.
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true,
    isArray: (name) => ARRAY_TAGS.has(name),
  });
  const parsed: unknown = parser.parse(xmlContent);
  if (!isNode(parsed)) {
    throw new MalformedSecondaryFileError(file, "no root element");
  }

  let suites: unknown[];
  if (parsed.testsuites !== undefined) {
    suites = isNode(parsed.testsuites) ? asArray(parsed.testsuites.testsuite) : [];
  } else if (parsed.testsuite !== undefined) {
    suites = asArray(parsed.testsuite);
  } else {
    const root = Object.keys(parsed).find((key) => key !== "#text") ?? "(none)";
    throw new MalformedSecondaryFileError(file, `expected <testsuites> or <testsuite> root, found <${root}>`);
  }

  for (const suite of suites) {
    if (!isNode(suite)) {
      throw new MalformedSecondaryFileError(file, "testsuite without attributes or test cases");
    }
    const suiteName = attr(suite, "name") || undefined;
    const cases = asArray(suite.testcase).map((tc) => {
      if (!isNode(tc)) throw new MalformedSecondaryFileError(file, "testcase without a name");
      return parseCase(tc, suiteName, file);
    });

    const name = suiteName ?? cases[0]?.suite;
    if (name === undefined) {
      throw new MalformedSecondaryFileError(file, "testsuite without a name");
    }

    const meta: JunitSuiteMeta = { name };
    const hostname = attr(suite, "hostname");
    const timestamp = attr(suite, "timestamp");
    if (hostname) meta.hostname = hostname;
    if (timestamp) meta.timestamp = timestamp;

    doc.suites.push(meta);
    doc.cases.push(...cases);
  }

  return doc;
}

/** Read a JUnit XML file. A file that does not exist contributes nothing. */
export function readJunitFile(filePath: string): JunitDocument {
  if (!fs.existsSync(filePath)) {
    return { file: filePath, suites: [], cases: [] };
  }
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw ioError(filePath, e);
  }
  return parseJunitXml(content, filePath);
}
