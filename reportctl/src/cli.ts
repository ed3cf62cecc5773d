#!/usr/bin/env node

import { Command, Option } from "commander";
import { renderCommand } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { createDiagnosticSink, type DiagnosticFormat } from "./diagnostics.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Diagnostic format on stderr: human|jsonl").choices(["human", "jsonl"]).default("human");

program
  .name("runreport")
  .description("Render test results as an AsciiDoc report")
  .version("0.1.0");

program
  .command("render")
  .description("Render a JSON-lines record stream, merged with JUnit XML files, to AsciiDoc")
  .argument("<label>", "Report title")
  .argument("<objdir>", "Staging directory for images and included specifications")
  .argument("<config>", "Run configuration file (JSON or YAML)")
  .argument("[junit...]", "JUnit XML files merged over the stream, in order")
  .option("--input <path>", "Record stream file, or - for stdin", "-")
  .option("--output <path>", "Write the document here instead of stdout")
  .addOption(formatOption())
  .option("--verbose", "Also print info diagnostics")
  .action(
    async (
      label: string,
      objdir: string,
      config: string,
      junit: string[],
      opts: { input: string; output?: string; format: DiagnosticFormat; verbose?: boolean },
    ) => {
      const emit = createDiagnosticSink(opts.format);
      const res = await renderCommand({
        label,
        objdir,
        configPath: config,
        junit,
        input: opts.input,
        output: opts.output,
        log: opts.verbose ? emit : undefined,
      });

      if (!res.ok) {
        emit(res.error);
        process.exit(res.exitCode);
      }
    },
  );

program
  .command("validate")
  .description("Validate the configuration and, optionally, a record stream and JUnit files")
  .argument("<config>", "Run configuration file (JSON or YAML)")
  .argument("[junit...]", "JUnit XML files")
  .option("--input <path>", "Record stream file, or - for stdin")
  .addOption(formatOption())
  .action((config: string, junit: string[], opts: { input?: string; format: DiagnosticFormat }) => {
    const emit = createDiagnosticSink(opts.format);
    const res = validateCommand({ configPath: config, input: opts.input, junit });

    if (!res.ok) {
      for (const err of res.errors) emit(err);
      process.exit(res.exitCode);
    }
    for (const d of res.diagnostics) emit(d);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.UNEXPECTED);
});
