import fs from 'node:fs/promises';
import path from 'node:path';

import { type Static, Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors } from '../../../../common/schema-errors.js';
import { DEFAULT_SHARE_SUM_TOLERANCE } from '../../../reference-data/index.js';
import { DOMAINS } from '../../core/domains.js';

import type { GridMappingError } from '../../core/errors.js';
import type { DomainDefinition, PipelineOptions } from '../../core/types.js';

const PipelineEntrySchema = Type.Object({
  domain: Type.Union([Type.Literal('crop'), Type.Literal('livestock'), Type.Literal('forestry')]),
  input: Type.String({ minLength: 1 }),
  output: Type.Optional(Type.String({ minLength: 1 })),
  factDelimiter: Type.Optional(Type.String({ minLength: 1, maxLength: 1 })),
  onUnmapped: Type.Optional(Type.Union([Type.Literal('drop'), Type.Literal('fail')])),
  adjustments: Type.Optional(Type.Array(Type.Literal('fruit-unit-change-2001'))),
  quoteStrings: Type.Optional(Type.Boolean()),
});

export const RunManifestFileSchema = Type.Object({
  reference: Type.Object({
    cropMapping: Type.Optional(Type.String({ minLength: 1 })),
    gridShares: Type.String({ minLength: 1 }),
    delimiter: Type.Optional(Type.String({ minLength: 1, maxLength: 1 })),
    shareSumTolerance: Type.Optional(Type.Number({ minimum: 0 })),
  }),
  outputDir: Type.Optional(Type.String({ minLength: 1 })),
  pipelines: Type.Array(PipelineEntrySchema, { minItems: 1 }),
});

export type RunManifestFileDTO = Static<typeof RunManifestFileSchema>;

const validator = TypeCompiler.Compile(RunManifestFileSchema);

export interface ResolvedPipeline {
  domain: DomainDefinition;
  inputPath: string;
  outputPath: string;
  factDelimiter: string;
  quoteStrings: boolean;
  options: PipelineOptions;
}

export interface RunManifest {
  reference: {
    cropMappingPath?: string | undefined;
    gridSharePath: string;
    delimiter: string;
    /** Allowed distance from 1 of a municipality's share sum before it is reported */
    shareSumTolerance: Decimal;
  };
  pipelines: ResolvedPipeline[];
}

const DEFAULT_OUTPUT_DIR = 'output';

/**
 * Resolves defaults and makes every path absolute against `baseDir`.
 */
export const resolveRunManifest = (dto: RunManifestFileDTO, baseDir: string): RunManifest => {
  const resolvePath = (target: string): string => path.resolve(baseDir, target);
  const outputDir = dto.outputDir ?? DEFAULT_OUTPUT_DIR;

  return {
    reference: {
      cropMappingPath:
        dto.reference.cropMapping === undefined ? undefined : resolvePath(dto.reference.cropMapping),
      gridSharePath: resolvePath(dto.reference.gridShares),
      delimiter: dto.reference.delimiter ?? ',',
      shareSumTolerance:
        dto.reference.shareSumTolerance === undefined
          ? DEFAULT_SHARE_SUM_TOLERANCE
          : new Decimal(dto.reference.shareSumTolerance),
    },
    pipelines: dto.pipelines.map((entry) => {
      const domain = DOMAINS[entry.domain];
      return {
        domain,
        inputPath: resolvePath(entry.input),
        outputPath: resolvePath(entry.output ?? path.join(outputDir, domain.defaultOutputFile)),
        factDelimiter: entry.factDelimiter ?? ',',
        quoteStrings: entry.quoteStrings ?? false,
        options: {
          onUnmapped: entry.onUnmapped ?? 'drop',
          adjustments: entry.adjustments ?? [],
        },
      };
    }),
  };
};

/**
 * Loads and validates the YAML run manifest. Relative paths inside it are
 * resolved against the manifest's own directory.
 */
export const loadRunManifest = async (
  manifestPath: string
): Promise<Result<RunManifest, GridMappingError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(manifestPath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Run manifest not found at ${manifestPath}`,
        path: manifestPath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read run manifest at ${manifestPath}: ${(error as Error).message}`,
      path: manifestPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${manifestPath}: ${(error as Error).message}`,
      path: manifestPath,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${manifestPath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  return ok(resolveRunManifest(parsed, path.dirname(path.resolve(manifestPath))));
};
