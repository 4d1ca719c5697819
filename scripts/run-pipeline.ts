/**
 * Grid Mapping Script
 *
 * Runs the pipelines listed in the run manifest (PIPELINE_MANIFEST, default
 * pipelines.yaml) and writes one semicolon-delimited file per pipeline.
 *
 * Usage:
 *   tsx scripts/run-pipeline.ts                      # every pipeline in the manifest
 *   tsx scripts/run-pipeline.ts crop forestry        # selected domains only
 *
 * Environment:
 *   PIPELINE_MANIFEST: path of the YAML manifest
 *   LOG_LEVEL: pino log level (default info)
 */

import path from 'node:path';

import { runPipelines } from '../src/app/run-pipelines.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  DOMAIN_NAMES,
  describePipelineError,
  isDomainName,
  loadRunManifest,
  type DomainName,
} from '../src/modules/grid-mapping/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const domains: DomainName[] = [];
  for (const arg of process.argv.slice(2)) {
    if (!isDomainName(arg)) {
      logger.fatal(`Unknown domain '${arg}'. Expected one of: ${DOMAIN_NAMES.join(', ')}`);
      process.exitCode = 1;
      return;
    }
    domains.push(arg);
  }

  const manifestPath = path.resolve(process.cwd(), config.pipelines.manifestPath);
  const manifestResult = await loadRunManifest(manifestPath);
  if (manifestResult.isErr()) {
    logger.fatal({ error: manifestResult.error }, describePipelineError(manifestResult.error));
    process.exitCode = 1;
    return;
  }

  const result = await runPipelines({ logger }, { manifest: manifestResult.value, domains });
  if (result.isErr()) {
    logger.fatal({ error: result.error }, describePipelineError(result.error));
    process.exitCode = 1;
    return;
  }

  for (const report of result.value) {
    logger.info(
      {
        domain: report.domain,
        factRows: report.factRows,
        outputRows: report.outputRows,
        droppedRows: report.droppedRows,
        unsharedFacts: report.unsharedFacts,
        nullShareRows: report.nullShareRows,
      },
      'Pipeline finished'
    );
  }
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
