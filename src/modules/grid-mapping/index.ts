/**
 * Grid Mapping Module Public API
 *
 * Cleans IBGE municipality tables, reclassifies them into MagPIE categories,
 * redistributes them onto grid cells and writes the result.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export { FACT_FIELDS } from './core/types.js';
export type {
  FactField,
  RawFactRow,
  FactRecord,
  ClassifiedFact,
  RedistributedRow,
  OutputRecord,
  DomainName,
  DomainDefinition,
  ClassificationPolicy,
  EnumeratedCategory,
  Rollup,
  OutputSchema,
  UnmappedCategoryPolicy,
  AdjustmentName,
  PipelineOptions,
  PipelineReport,
  CategoryTotal,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { GridMappingError, PipelineError } from './core/errors.js';
export { describePipelineError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { FactTableSource, OutputSink, WriteSummary } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Domains and pipeline steps
// ─────────────────────────────────────────────────────────────────────────────

export {
  DOMAINS,
  DOMAIN_NAMES,
  CROP_DOMAIN,
  LIVESTOCK_DOMAIN,
  FORESTRY_DOMAIN,
  FORESTRY_CATEGORIES,
  isDomainName,
} from './core/domains.js';
export { cleanFactRows, cleanFactRow, parseFactValue, ZERO_FILL_SENTINELS } from './core/cleaning.js';
export { applyAdjustments, FRUIT_UNIT_CHANGE_2001 } from './core/adjustments.js';
export { classifyFacts } from './core/classification.js';
export { redistributeFacts } from './core/redistribution.js';
export { aggregateRows, computeRollups, summarizeTotals } from './core/aggregation.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  runPipeline,
  type RunPipelineDeps,
  type RunPipelineInput,
} from './core/usecases/run-pipeline.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { createCsvFactTable, type CsvFactTableOptions } from './shell/fact-table/csv-fact-table.js';
export {
  createDelimitedFileWriter,
  formatDelimited,
  type DelimitedFileWriterOptions,
} from './shell/writer/delimited-writer.js';
export {
  loadRunManifest,
  resolveRunManifest,
  type RunManifest,
  type ResolvedPipeline,
} from './shell/manifest/yaml-manifest.js';
