import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseDecimal, parseInteger } from '../../../common/numbers.js';
import { createInvalidReferenceValueError, type ReferenceDataError } from './errors.js';

import type {
  CropMappingRow,
  CropTaxonomy,
  GridShare,
  GridShareIndex,
  GridShareRow,
  ShareSumDeviation,
} from './types.js';

export const DEFAULT_SHARE_SUM_TOLERANCE = new Decimal('1e-6');

/** Share values read as missing rather than malformed */
export const NULL_SHARE_VALUES: ReadonlySet<string> = new Set(['', 'NA']);

/**
 * Cell ids in the share table may carry literal double quotes; they are
 * removed here so grouping and output use the same identifier.
 */
export const normalizeCellId = (raw: string): string => raw.replace(/"/g, '').trim();

/**
 * Builds the crop taxonomy. Exact duplicate rows are tolerated; a source crop
 * mapped to two different targets is rejected.
 */
export const buildCropTaxonomy = (
  rows: readonly CropMappingRow[]
): Result<CropTaxonomy, ReferenceDataError> => {
  const taxonomy = new Map<string, string>();

  for (const row of rows) {
    const source = row.IBGE_Crops;
    const target = row.MagPie_Crops;
    const existing = taxonomy.get(source);

    if (existing !== undefined && existing !== target) {
      return err({
        type: 'ConflictingMapping',
        message: `Crop '${source}' is mapped to both '${existing}' and '${target}'`,
        source,
        targets: [existing, target],
      });
    }

    taxonomy.set(source, target);
  }

  return ok(taxonomy);
};

/**
 * Groups grid shares by municipality code, preserving file order within each group.
 * A blank or `NA` share is kept as null; any other non-numeric share is rejected.
 */
export const buildGridShareIndex = (
  rows: readonly GridShareRow[]
): Result<GridShareIndex, ReferenceDataError> => {
  const index = new Map<number, GridShare[]>();

  for (const [i, row] of rows.entries()) {
    const rowNumber = i + 1;

    const municipalityCode = parseInteger(row.cd_mun);
    if (municipalityCode === null) {
      return err(createInvalidReferenceValueError(rowNumber, 'cd_mun', row.cd_mun));
    }

    const rawShare = row.adjusted_share_mun_tocr.trim();
    let share: Decimal | null = null;
    if (!NULL_SHARE_VALUES.has(rawShare)) {
      share = parseDecimal(rawShare);
      if (share === null) {
        return err(
          createInvalidReferenceValueError(
            rowNumber,
            'adjusted_share_mun_tocr',
            row.adjusted_share_mun_tocr
          )
        );
      }
    }

    const entry: GridShare = { cellId: normalizeCellId(row.idsbrazil), share };
    const group = index.get(municipalityCode);
    if (group === undefined) {
      index.set(municipalityCode, [entry]);
    } else {
      group.push(entry);
    }
  }

  return ok(index);
};

/**
 * Lists municipalities whose shares do not sum to 1 within the tolerance.
 * Null shares count as absent. Informational only: redistribution uses the
 * shares as given.
 */
export const findShareSumDeviations = (
  index: GridShareIndex,
  tolerance: Decimal = DEFAULT_SHARE_SUM_TOLERANCE
): ShareSumDeviation[] => {
  const deviations: ShareSumDeviation[] = [];

  for (const [municipalityCode, shares] of index) {
    const total = shares.reduce(
      (sum, entry) => (entry.share === null ? sum : sum.plus(entry.share)),
      new Decimal(0)
    );
    if (total.minus(1).abs().greaterThan(tolerance)) {
      deviations.push({ municipalityCode, total });
    }
  }

  return deviations.sort((a, b) => a.municipalityCode - b.municipalityCode);
};

/**
 * Number of share entries with no value.
 */
export const countNullShares = (index: GridShareIndex): number => {
  let count = 0;
  for (const shares of index.values()) {
    count += shares.filter((entry) => entry.share === null).length;
  }
  return count;
};
