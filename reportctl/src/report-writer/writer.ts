import fs from "node:fs";
import type { Writable } from "node:stream";
import { ReportIOError, ioError } from "../errors.js";

export type ReportSink =
  | { kind: "file"; path: string }
  | { kind: "stream"; stream: Writable; name: string };

/** Sink for `--output`: a file, or stdout when no path is given. */
export function sinkFor(outputPath: string | undefined, stdout: Writable = process.stdout): ReportSink {
  return outputPath === undefined || outputPath === "-"
    ? { kind: "stream", stream: stdout, name: "<stdout>" }
    : { kind: "file", path: outputPath };
}

function writeToStream(text: string, stream: Writable, name: string): Promise<void> {
  return new Promise((resolve, reject) => {
    // A failed write also emits "error", after the callback: the listener
    // stays attached on failure and comes off on success.
    const onError = (err: Error) => reject(new ReportIOError(name, err.message));
    stream.once("error", onError);
    stream.write(text, "utf8", (err) => {
      if (err) {
        reject(new ReportIOError(name, err.message));
        return;
      }
      stream.off("error", onError);
      resolve();
    });
  });
}

/**
 * Write the rendered document verbatim. Called once, with the whole text;
 * any failure is a ReportIOError.
 */
export async function writeReport(text: string, sink: ReportSink): Promise<void> {
  if (sink.kind === "stream") {
    await writeToStream(text, sink.stream, sink.name);
    return;
  }
  try {
    fs.writeFileSync(sink.path, text, "utf8");
  } catch (e) {
    throw ioError(sink.path, e);
  }
}
