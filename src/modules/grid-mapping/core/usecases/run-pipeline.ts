/**
 * Run Pipeline Use Case
 *
 * One pass over one domain's fact table:
 * 1. Clean raw rows (sentinels zero-filled, codes and years as integers)
 * 2. Apply opt-in unit adjustments
 * 3. Reclassify into target categories (with conversion factors)
 * 4. Redistribute onto grid cells by municipality share
 * 5. Aggregate per (cell, year[, category]) and append roll-ups
 * 6. Write the table
 *
 * The first error ends the run; nothing is written in that case.
 */

import { err, ok, type Result } from 'neverthrow';

import { applyAdjustments } from '../adjustments.js';
import { aggregateRows, computeRollups, summarizeTotals } from '../aggregation.js';
import { classifyFacts } from '../classification.js';
import { cleanFactRows } from '../cleaning.js';
import { redistributeFacts } from '../redistribution.js';

import type { PipelineError } from '../errors.js';
import type { FactTableSource, OutputSink } from '../ports.js';
import type { DomainDefinition, PipelineOptions, PipelineReport } from '../types.js';
import type { CropTaxonomy, ReferenceDataRepo } from '../../../reference-data/index.js';
import type { Logger } from 'pino';

/**
 * Dependencies for the run-pipeline use case.
 */
export interface RunPipelineDeps {
  facts: FactTableSource;
  references: ReferenceDataRepo;
  sink: OutputSink;
  logger: Logger;
}

export interface RunPipelineInput {
  domain: DomainDefinition;
  options: PipelineOptions;
}

/** Municipality codes listed in a single log line before truncating */
const MAX_LOGGED_CODES = 50;

export async function runPipeline(
  deps: RunPipelineDeps,
  input: RunPipelineInput
): Promise<Result<PipelineReport, PipelineError>> {
  const { facts, references, sink, logger } = deps;
  const { domain, options } = input;

  const sharesResult = await references.loadGridShares();
  if (sharesResult.isErr()) {
    return err(sharesResult.error);
  }
  const shares = sharesResult.value;

  let taxonomy: CropTaxonomy | undefined;
  if (domain.classification.kind === 'taxonomy-join') {
    const taxonomyResult = await references.loadCropTaxonomy();
    if (taxonomyResult.isErr()) {
      return err(taxonomyResult.error);
    }
    taxonomy = taxonomyResult.value;
  }

  // Step 1: Clean
  const rowsResult = await facts.readRows();
  if (rowsResult.isErr()) {
    return err(rowsResult.error);
  }
  const cleanedResult = cleanFactRows(rowsResult.value);
  if (cleanedResult.isErr()) {
    return err(cleanedResult.error);
  }
  const cleaned = cleanedResult.value;
  logger.info({ source: facts.location, rows: cleaned.length }, 'Fact table cleaned');

  // Step 2: Adjust
  const adjusted = applyAdjustments(cleaned, options.adjustments);
  if (options.adjustments.length > 0) {
    logger.info(
      { adjustments: options.adjustments, adjustedRows: adjusted.adjustedRows },
      'Unit adjustments applied'
    );
  }

  // Step 3: Reclassify
  const classifiedResult = classifyFacts(adjusted.facts, domain.classification, {
    taxonomy,
    onUnmapped: options.onUnmapped,
  });
  if (classifiedResult.isErr()) {
    return err(classifiedResult.error);
  }
  const classified = classifiedResult.value;
  if (classified.unmappedCategories.length > 0) {
    logger.warn(
      { categories: classified.unmappedCategories },
      'Categories without a target were dropped'
    );
  }
  logger.info(
    { classifiedRows: classified.facts.length, droppedRows: classified.droppedRows },
    'Facts reclassified'
  );

  // Step 4: Redistribute
  const redistributed = redistributeFacts(classified.facts, shares);
  if (redistributed.unsharedFacts > 0) {
    logger.warn(
      {
        facts: redistributed.unsharedFacts,
        municipalities: redistributed.unsharedMunicipalities.length,
        sample: redistributed.unsharedMunicipalities.slice(0, MAX_LOGGED_CODES),
      },
      'Municipalities without grid shares were excluded'
    );
  }
  if (redistributed.nullShareRows > 0) {
    logger.warn(
      { rows: redistributed.nullShareRows },
      'Grid cells with a missing share received nothing'
    );
  }

  // Step 5: Aggregate
  const base = aggregateRows(redistributed.rows, domain.output.includeCategory);
  const records = [...base, ...computeRollups(base, domain.rollups)];
  const totals = summarizeTotals(records);
  logger.info(
    { redistributedRows: redistributed.rows.length, outputRows: records.length },
    'Rows aggregated'
  );
  for (const total of totals) {
    logger.debug(
      { year: total.year, category: total.category, totalMillions: total.totalMillions.toNumber() },
      'Total'
    );
  }

  // Step 6: Write
  const writeResult = await sink.write(records, domain.output);
  if (writeResult.isErr()) {
    return err(writeResult.error);
  }
  logger.info(
    { output: writeResult.value.location, rows: writeResult.value.rows },
    'Output written'
  );

  return ok({
    domain: domain.name,
    factRows: cleaned.length,
    adjustedRows: adjusted.adjustedRows,
    classifiedRows: classified.facts.length,
    droppedRows: classified.droppedRows,
    unmappedCategories: classified.unmappedCategories,
    unsharedFacts: redistributed.unsharedFacts,
    unsharedMunicipalities: redistributed.unsharedMunicipalities,
    nullShareRows: redistributed.nullShareRows,
    redistributedRows: redistributed.rows.length,
    outputRows: records.length,
    totals,
  });
}
