/**
 * Test data builders
 */

import { Decimal } from 'decimal.js';

import type { ClassifiedFact, FactRecord, OutputRecord } from '@/modules/grid-mapping/index.js';
import type { GridShare, GridShareIndex } from '@/modules/reference-data/index.js';

export interface FactRowInput {
  municipalityCode?: string;
  category?: string;
  value?: string;
  year?: string;
  unit?: string;
}

/**
 * Builds the fourteen positional fields of an IBGE export row.
 */
export const factRow = (input: FactRowInput = {}): string[] => {
  const year = input.year ?? '2020';
  return [
    '6',
    'Município',
    '1006',
    input.unit ?? 'Hectares',
    input.value ?? '100',
    input.municipalityCode ?? '5100201',
    'Água Boa - MT',
    '109',
    'Área plantada',
    year,
    year,
    '2713',
    input.category ?? 'Soja (em grão)',
    year,
  ];
};

/**
 * Same row as `factRow`, rendered as a CSV line.
 */
export const factLine = (input: FactRowInput = {}): string => factRow(input).join(',');

export const FACT_HEADER =
  'cd_nivel_terri,nm_nivel_terri,cd_unidmedida,nm_unidmedida,value,cd_mun,nm_mun,cd_var,nm_var,cd_year,nm_year,cd_prod,nm_prod,year';

export const fact = (overrides: Partial<FactRecord> = {}): FactRecord => ({
  municipalityCode: 5100201,
  categoryName: 'Soja (em grão)',
  year: 2020,
  value: new Decimal(100),
  ...overrides,
});

export const classifiedFact = (overrides: Partial<ClassifiedFact> = {}): ClassifiedFact => ({
  municipalityCode: 5100201,
  year: 2020,
  category: 'soybean',
  value: new Decimal(100),
  ...overrides,
});

export const outputRecord = (overrides: Partial<OutputRecord> = {}): OutputRecord => ({
  cellId: 'A',
  year: 2020,
  category: 'soybean',
  value: new Decimal(1),
  ...overrides,
});

/**
 * Builds a share index from `{ municipality: { cell: share } }`; a null share stays null.
 */
export const shareIndex = (
  shares: Record<number, Record<string, string | null>>
): GridShareIndex => {
  const index = new Map<number, GridShare[]>();
  for (const [code, cells] of Object.entries(shares)) {
    index.set(
      Number(code),
      Object.entries(cells).map(([cellId, share]) => ({
        cellId,
        share: share === null ? null : new Decimal(share),
      }))
    );
  }
  return index;
};

/**
 * Output records as plain strings, for exact comparisons.
 */
export const plain = (
  records: readonly OutputRecord[]
): { cellId: string; year: number; category: string | null; value: string }[] =>
  records.map((record) => ({
    cellId: record.cellId,
    year: record.year,
    category: record.category,
    value: record.value.toString(),
  }));
