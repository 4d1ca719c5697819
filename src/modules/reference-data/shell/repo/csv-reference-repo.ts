import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, type Result } from 'neverthrow';

import { readDelimitedFile } from '../../../../infra/csv/index.js';
import { formatSchemaErrors, type ReferenceDataError } from '../../core/errors.js';
import { buildCropTaxonomy, buildGridShareIndex } from '../../core/logic.js';
import {
  CropMappingFileSchema,
  GridShareFileSchema,
  type CropTaxonomy,
  type GridShareIndex,
} from '../../core/types.js';

import type { ReferenceDataRepo } from '../../core/ports.js';

const cropMappingValidator = TypeCompiler.Compile(CropMappingFileSchema);
const gridShareValidator = TypeCompiler.Compile(GridShareFileSchema);

export interface ReferenceDataRepoOptions {
  /** Crop taxonomy file; only the planted-area pipeline needs it */
  cropMappingPath?: string | undefined;
  gridSharePath: string;
  /** Field delimiter of both files (default ',') */
  delimiter?: string | undefined;
}

export const createReferenceDataRepo = (options: ReferenceDataRepoOptions): ReferenceDataRepo => {
  const delimiter = options.delimiter ?? ',';

  let cropTaxonomyPromise: Promise<Result<CropTaxonomy, ReferenceDataError>> | null = null;
  let gridSharesPromise: Promise<Result<GridShareIndex, ReferenceDataError>> | null = null;

  const readCropTaxonomy = async (
    filePath: string
  ): Promise<Result<CropTaxonomy, ReferenceDataError>> => {
    const readResult = await readDelimitedFile(filePath, { delimiter, layout: 'header' });
    if (readResult.isErr()) {
      return err(readResult.error);
    }

    const rows = readResult.value;
    if (!cropMappingValidator.Check(rows)) {
      return err({
        type: 'SchemaValidationError',
        message: `Schema validation failed for crop mapping ${filePath}`,
        details: formatSchemaErrors(cropMappingValidator.Errors(rows)),
      });
    }

    return buildCropTaxonomy(rows);
  };

  const readGridShares = async (
    filePath: string
  ): Promise<Result<GridShareIndex, ReferenceDataError>> => {
    const readResult = await readDelimitedFile(filePath, { delimiter, layout: 'header' });
    if (readResult.isErr()) {
      return err(readResult.error);
    }

    const rows = readResult.value;
    if (!gridShareValidator.Check(rows)) {
      return err({
        type: 'SchemaValidationError',
        message: `Schema validation failed for grid shares ${filePath}`,
        details: formatSchemaErrors(gridShareValidator.Errors(rows)),
      });
    }

    return buildGridShareIndex(rows);
  };

  return {
    async loadCropTaxonomy(): Promise<Result<CropTaxonomy, ReferenceDataError>> {
      const filePath = options.cropMappingPath;
      if (filePath === undefined) {
        return err({
          type: 'NotConfigured',
          message: 'No crop mapping file configured',
          reference: 'cropMapping',
        });
      }

      cropTaxonomyPromise ??= readCropTaxonomy(filePath);
      const result = await cropTaxonomyPromise;
      if (result.isErr()) {
        cropTaxonomyPromise = null;
      }
      return result;
    },

    async loadGridShares(): Promise<Result<GridShareIndex, ReferenceDataError>> {
      gridSharesPromise ??= readGridShares(options.gridSharePath);
      const result = await gridSharesPromise;
      if (result.isErr()) {
        gridSharesPromise = null;
      }
      return result;
    },
  };
};

