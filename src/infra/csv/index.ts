/**
 * Delimited text reader built on csv-parse.
 * Returns parsed records as `unknown` so callers validate their own shape.
 */

import fs from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

export type DelimitedFileError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string };

export interface ReadDelimitedOptions {
  delimiter: string;
  /**
   * `header` yields one object per row keyed by the header names;
   * `positional` skips the header row and yields arrays of fields.
   */
  layout: 'header' | 'positional';
}

export const readDelimitedFile = async (
  filePath: string,
  options: ReadDelimitedOptions
): Promise<Result<unknown, DelimitedFileError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `File not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read ${filePath}: ${(error as Error).message}`,
      path: filePath,
    });
  }

  try {
    const records: unknown = parseCsv(contents, {
      bom: true,
      delimiter: options.delimiter,
      skip_empty_lines: true,
      trim: true,
      ...(options.layout === 'header'
        ? { columns: true }
        : { columns: false, from_line: 2, relax_column_count: true }),
    });
    return ok(records);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse ${filePath}: ${(error as Error).message}`,
      path: filePath,
    });
  }
};
