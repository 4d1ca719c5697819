/**
 * Test fakes for the pipeline ports
 */

import { ok, type Result } from 'neverthrow';
import pinoLib, { type Logger } from 'pino';

import type {
  FactTableSource,
  GridMappingError,
  OutputRecord,
  OutputSchema,
  OutputSink,
  WriteSummary,
} from '@/modules/grid-mapping/index.js';
import type {
  CropTaxonomy,
  GridShareIndex,
  ReferenceDataError,
  ReferenceDataRepo,
} from '@/modules/reference-data/index.js';

export const silentLogger = (): Logger => pinoLib({ level: 'silent' });

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger that keeps every JSON line it writes, parsed, in `entries`.
 */
export const makeCapturingLogger = (): { logger: Logger; entries: CapturedLog[] } => {
  const entries: CapturedLog[] = [];
  const logger = pinoLib(
    { level: 'info' },
    {
      write(line: string): void {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && 'msg' in parsed && 'level' in parsed) {
          const { msg, level } = parsed;
          if (typeof msg === 'string' && typeof level === 'number') {
            entries.push({ ...parsed, msg, level });
          }
        }
      },
    }
  );
  return { logger, entries };
};

export const makeFakeFactTable = (rows: string[][]): FactTableSource => ({
  location: 'memory://facts',
  readRows: async () => ok(rows.map((row) => [...row])),
});

export interface FakeReferenceDataOptions {
  taxonomy?: Record<string, string>;
  shares: GridShareIndex;
}

export const makeFakeReferenceData = (options: FakeReferenceDataOptions): ReferenceDataRepo => ({
  async loadCropTaxonomy(): Promise<Result<CropTaxonomy, ReferenceDataError>> {
    return ok(new Map(Object.entries(options.taxonomy ?? {})));
  },
  async loadGridShares(): Promise<Result<GridShareIndex, ReferenceDataError>> {
    return ok(options.shares);
  },
});

export interface CapturingSink extends OutputSink {
  readonly writes: { records: OutputRecord[]; schema: OutputSchema }[];
}

export const makeCapturingSink = (): CapturingSink => {
  const writes: { records: OutputRecord[]; schema: OutputSchema }[] = [];
  return {
    writes,
    async write(records, schema): Promise<Result<WriteSummary, GridMappingError>> {
      writes.push({ records: [...records], schema });
      return ok({ location: 'memory://output', rows: records.length });
    },
  };
};
