import { Decimal } from 'decimal.js';

import type { CategoryTotal, OutputRecord, RedistributedRow, Rollup } from './types.js';

const MILLION = new Decimal(1_000_000);

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const compareCategories = (a: string | null, b: string | null): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return compareStrings(a, b);
};

/**
 * Orders output by cell id, then year, then category.
 */
export const compareOutputRecords = (a: OutputRecord, b: OutputRecord): number =>
  compareStrings(a.cellId, b.cellId) || a.year - b.year || compareCategories(a.category, b.category);

const groupKey = (cellId: string, year: number, category: string | null): string =>
  `${cellId}\u0000${String(year)}\u0000${category ?? ''}`;

/**
 * Sums redistributed rows per (cell, year) or (cell, year, category).
 * Rows excluded upstream simply never appear here; nothing is zero-filled.
 */
export const aggregateRows = (
  rows: readonly RedistributedRow[],
  includeCategory: boolean
): OutputRecord[] => {
  const groups = new Map<string, OutputRecord>();

  for (const row of rows) {
    const category = includeCategory ? row.category : null;
    const key = groupKey(row.cellId, row.year, category);

    const existing = groups.get(key);
    if (existing !== undefined) {
      existing.value = existing.value.plus(row.value);
    } else {
      groups.set(key, { cellId: row.cellId, year: row.year, category, value: row.value });
    }
  }

  return [...groups.values()].sort(compareOutputRecords);
};

/**
 * Derives roll-up categories per (cell, year) from already aggregated records.
 * A component missing for a cell and year counts as zero; a roll-up row exists
 * when at least one component does.
 */
export const computeRollups = (
  records: readonly OutputRecord[],
  rollups: readonly Rollup[]
): OutputRecord[] => {
  const derived: OutputRecord[] = [];

  for (const rollup of rollups) {
    const components = new Set(rollup.components);
    const groups = new Map<string, OutputRecord>();

    for (const record of records) {
      if (record.category === null || !components.has(record.category)) continue;

      const key = groupKey(record.cellId, record.year, rollup.category);
      const existing = groups.get(key);
      if (existing !== undefined) {
        existing.value = existing.value.plus(record.value);
      } else {
        groups.set(key, {
          cellId: record.cellId,
          year: record.year,
          category: rollup.category,
          value: record.value,
        });
      }
    }

    derived.push(...[...groups.values()].sort(compareOutputRecords));
  }

  return derived;
};

/**
 * Totals per year and category, in millions of the output unit.
 */
export const summarizeTotals = (records: readonly OutputRecord[]): CategoryTotal[] => {
  const groups = new Map<string, { year: number; category: string | null; total: Decimal }>();

  for (const record of records) {
    const key = `${String(record.year)}\u0000${record.category ?? ''}`;
    const existing = groups.get(key);
    if (existing !== undefined) {
      existing.total = existing.total.plus(record.value);
    } else {
      groups.set(key, { year: record.year, category: record.category, total: record.value });
    }
  }

  return [...groups.values()]
    .sort((a, b) => a.year - b.year || compareCategories(a.category, b.category))
    .map(({ year, category, total }) => ({
      year,
      category,
      totalMillions: total.div(MILLION),
    }));
};
