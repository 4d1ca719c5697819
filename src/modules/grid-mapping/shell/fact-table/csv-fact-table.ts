import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from '../../../../common/schema-errors.js';
import { readDelimitedFile } from '../../../../infra/csv/index.js';

import type { GridMappingError } from '../../core/errors.js';
import type { FactTableSource } from '../../core/ports.js';

const rowsValidator = TypeCompiler.Compile(Type.Array(Type.Array(Type.String())));

export interface CsvFactTableOptions {
  filePath: string;
  /** Field delimiter (default ',') */
  delimiter?: string | undefined;
}

/**
 * Reads an exported IBGE table. The first line is a header and is skipped;
 * fields are named by position later, during cleaning.
 */
export const createCsvFactTable = (options: CsvFactTableOptions): FactTableSource => ({
  location: options.filePath,

  async readRows(): Promise<Result<string[][], GridMappingError>> {
    const readResult = await readDelimitedFile(options.filePath, {
      delimiter: options.delimiter ?? ',',
      layout: 'positional',
    });
    if (readResult.isErr()) {
      return err(readResult.error);
    }

    const rows = readResult.value;
    if (!rowsValidator.Check(rows)) {
      return err({
        type: 'SchemaValidationError',
        message: `Unexpected fact table layout in ${options.filePath}`,
        details: formatSchemaErrors(rowsValidator.Errors(rows)),
      });
    }

    return ok(rows);
  },
});
