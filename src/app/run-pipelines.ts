/**
 * Pipeline runner
 * Wires the file-based adapters of a run manifest into the pipeline use case
 */

import { err, ok, type Result } from 'neverthrow';

import { createChildLogger, type Logger } from '../infra/logger/index.js';
import {
  createCsvFactTable,
  createDelimitedFileWriter,
  runPipeline,
  type DomainName,
  type PipelineError,
  type PipelineReport,
  type RunManifest,
} from '../modules/grid-mapping/index.js';
import {
  countNullShares,
  createReferenceDataRepo,
  findShareSumDeviations,
} from '../modules/reference-data/index.js';

export interface RunPipelinesDeps {
  logger: Logger;
}

export interface RunPipelinesInput {
  manifest: RunManifest;
  /** Domains to run; every manifest entry when empty */
  domains: readonly DomainName[];
}

/** Municipality codes listed in a single log line before truncating */
const MAX_LOGGED_CODES = 50;

/**
 * Runs the selected manifest entries one after another. Reference tables are
 * loaded once, checked once and shared read-only; the first failing pipeline
 * stops the run.
 */
export async function runPipelines(
  deps: RunPipelinesDeps,
  input: RunPipelinesInput
): Promise<Result<PipelineReport[], PipelineError>> {
  const { logger } = deps;
  const { manifest, domains } = input;

  for (const domain of domains) {
    if (!manifest.pipelines.some((entry) => entry.domain.name === domain)) {
      return err({
        type: 'DomainNotConfigured',
        message: `No pipeline for domain '${domain}' in the run manifest`,
        domain,
      });
    }
  }

  const selected =
    domains.length === 0
      ? manifest.pipelines
      : manifest.pipelines.filter((entry) => domains.includes(entry.domain.name));

  const references = createReferenceDataRepo({
    cropMappingPath: manifest.reference.cropMappingPath,
    gridSharePath: manifest.reference.gridSharePath,
    delimiter: manifest.reference.delimiter,
  });

  const sharesResult = await references.loadGridShares();
  if (sharesResult.isErr()) {
    return err(sharesResult.error);
  }

  const deviations = findShareSumDeviations(
    sharesResult.value,
    manifest.reference.shareSumTolerance
  );
  if (deviations.length > 0) {
    logger.warn(
      {
        municipalities: deviations.length,
        sample: deviations
          .slice(0, MAX_LOGGED_CODES)
          .map((d) => ({ municipalityCode: d.municipalityCode, total: d.total.toString() })),
      },
      'Grid shares do not sum to 1 for some municipalities'
    );
  }

  const nullShares = countNullShares(sharesResult.value);
  if (nullShares > 0) {
    logger.warn({ cells: nullShares }, 'Grid share table has cells without a share');
  }

  const reports: PipelineReport[] = [];

  for (const entry of selected) {
    const pipelineLogger = createChildLogger(logger, { domain: entry.domain.name });
    pipelineLogger.info({ input: entry.inputPath }, `Running ${entry.domain.description}`);

    const result = await runPipeline(
      {
        facts: createCsvFactTable({ filePath: entry.inputPath, delimiter: entry.factDelimiter }),
        references,
        sink: createDelimitedFileWriter({
          outputPath: entry.outputPath,
          quoteStrings: entry.quoteStrings,
        }),
        logger: pipelineLogger,
      },
      { domain: entry.domain, options: entry.options }
    );

    if (result.isErr()) {
      return err(result.error);
    }
    reports.push(result.value);
  }

  return ok(reports);
}
