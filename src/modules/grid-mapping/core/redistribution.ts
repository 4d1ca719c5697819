import type { ClassifiedFact, RedistributedRow } from './types.js';
import type { GridShareIndex } from '../../reference-data/index.js';

export interface RedistributionResult {
  rows: RedistributedRow[];
  /** Facts whose municipality has no grid shares */
  unsharedFacts: number;
  /** Those municipalities, sorted */
  unsharedMunicipalities: number[];
  /** Fact-cell pairs skipped because the cell's share is missing */
  nullShareRows: number;
}

/**
 * Spreads each fact over the grid cells of its municipality: one row per
 * share, valued `fact.value × share`.
 *
 * A municipality missing from the share table contributes no rows, and neither
 * does a cell whose share is null. Both are gaps in the reference data, so
 * they are reported rather than written as zero.
 */
export const redistributeFacts = (
  facts: readonly ClassifiedFact[],
  shares: GridShareIndex
): RedistributionResult => {
  const rows: RedistributedRow[] = [];
  const unshared = new Set<number>();
  let unsharedFacts = 0;
  let nullShareRows = 0;

  for (const fact of facts) {
    const cells = shares.get(fact.municipalityCode);
    if (cells === undefined || cells.length === 0) {
      unshared.add(fact.municipalityCode);
      unsharedFacts++;
      continue;
    }

    for (const cell of cells) {
      if (cell.share === null) {
        nullShareRows++;
        continue;
      }
      rows.push({
        cellId: cell.cellId,
        year: fact.year,
        category: fact.category,
        value: fact.value.mul(cell.share),
      });
    }
  }

  return {
    rows,
    unsharedFacts,
    unsharedMunicipalities: [...unshared].sort((a, b) => a - b),
    nullShareRows,
  };
};
