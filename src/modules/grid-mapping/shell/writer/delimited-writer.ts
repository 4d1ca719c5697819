import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import type { GridMappingError } from '../../core/errors.js';
import type { OutputSink, WriteSummary } from '../../core/ports.js';
import type { OutputRecord, OutputSchema } from '../../core/types.js';
import type { Decimal } from 'decimal.js';

export interface DelimitedFormatOptions {
  /** Field separator (default ';') */
  delimiter?: string | undefined;
  /** Quote the header and the string columns (default false) */
  quoteStrings?: boolean | undefined;
}

const SIGNIFICANT_DIGITS = 15;

/**
 * Prints a value with at most 15 significant digits.
 */
export const formatValue = (value: Decimal): string =>
  value.toSignificantDigits(SIGNIFICANT_DIGITS).toString();

const quote = (text: string): string => `"${text.replace(/"/g, '""')}"`;

/**
 * Renders the complete output file: header line, one line per record,
 * trailing newline.
 */
export const formatDelimited = (
  records: readonly OutputRecord[],
  schema: OutputSchema,
  options: DelimitedFormatOptions = {}
): string => {
  const delimiter = options.delimiter ?? ';';
  const text = options.quoteStrings === true ? quote : (value: string): string => value;

  const lines: string[] = [schema.columns.map(text).join(delimiter)];

  for (const record of records) {
    const fields = [text(record.cellId), String(record.year)];
    if (schema.includeCategory) {
      fields.push(record.category === null ? 'NA' : text(record.category));
    }
    fields.push(formatValue(record.value));
    lines.push(fields.join(delimiter));
  }

  return `${lines.join('\n')}\n`;
};

export interface DelimitedFileWriterOptions extends DelimitedFormatOptions {
  outputPath: string;
}

/**
 * Writes the formatted table in a single call, creating the parent directory
 * if needed. A failed write leaves whatever the file system kept.
 */
export const createDelimitedFileWriter = (options: DelimitedFileWriterOptions): OutputSink => ({
  async write(
    records: readonly OutputRecord[],
    schema: OutputSchema
  ): Promise<Result<WriteSummary, GridMappingError>> {
    const contents = formatDelimited(records, schema, options);

    try {
      await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
      await fs.writeFile(options.outputPath, contents, 'utf8');
    } catch (error) {
      return err({
        type: 'WriteError',
        message: `Failed to write ${options.outputPath}: ${(error as Error).message}`,
        path: options.outputPath,
      });
    }

    return ok({ location: options.outputPath, rows: records.length });
  },
});
