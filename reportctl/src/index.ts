export * from "./types/record.js";
export type * from "./types/events.js";
export type * from "./types/config.js";
export * from "./errors.js";
export { createRun, addCase, ensureSuite } from "./aggregate/run.js";
export { aggregate, countOutcomes, mergeJunit, sumCounts } from "./aggregate/aggregator.js";
export { ingestRecords, createRecordChecks, readRecordSource, type RecordChecks } from "./ingest/records.js";
export { parseJunitXml, readJunitFile, type JunitDocument, type JunitSuiteMeta } from "./ingest/junit-xml.js";
export { parseOutcome } from "./ingest/outcome.js";
export { renderReport, type RenderOptions } from "./render/report.js";
export { escapeText, outcomeMarker } from "./render/asciidoc.js";
export { writeReport, sinkFor, type ReportSink } from "./report-writer/writer.js";
export { DirectoryStager, type AssetStager } from "./staging/assets.js";
export { SpecCatalog } from "./staging/specs.js";
export { createRegistry, SchemaRegistry } from "./schema/registry.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { renderCommand, type RenderCommandOptions, type RenderCommandResult } from "./commands/render.js";
export { validateCommand, type ValidateResult } from "./commands/validate.js";
