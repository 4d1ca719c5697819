/**
 * Grid Mapping Module - Ports (Interfaces)
 *
 * Defines the interfaces for external dependencies.
 * Shell layer provides implementations.
 */

import type { GridMappingError } from './errors.js';
import type { OutputRecord, OutputSchema } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Source of raw fact rows: fourteen positional string fields per row,
 * header already removed.
 */
export interface FactTableSource {
  /** Human-readable origin for logs (usually a file path) */
  readonly location: string;
  readRows(): Promise<Result<string[][], GridMappingError>>;
}

export interface WriteSummary {
  location: string;
  rows: number;
}

/**
 * Destination of the final table. Receives the complete result in one call.
 */
export interface OutputSink {
  write(
    records: readonly OutputRecord[],
    schema: OutputSchema
  ): Promise<Result<WriteSummary, GridMappingError>>;
}
