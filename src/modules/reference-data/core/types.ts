import { type Static, Type } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

/**
 * One row of the crop taxonomy file: IBGE crop name → MagPIE crop.
 */
export const CropMappingRowSchema = Type.Object({
  IBGE_Crops: Type.String({ minLength: 1 }),
  MagPie_Crops: Type.String({ minLength: 1 }),
});

/**
 * One row of the municipality-to-grid share table.
 * Additional columns (areas, names, coordinates) are allowed and ignored.
 */
export const GridShareRowSchema = Type.Object({
  cd_mun: Type.String(),
  idsbrazil: Type.String({ minLength: 1 }),
  adjusted_share_mun_tocr: Type.String(),
});

export const CropMappingFileSchema = Type.Array(CropMappingRowSchema);
export const GridShareFileSchema = Type.Array(GridShareRowSchema);

export type CropMappingRow = Static<typeof CropMappingRowSchema>;
export type GridShareRow = Static<typeof GridShareRowSchema>;

/**
 * Source crop name → target crop name. Each source resolves to exactly one target.
 */
export type CropTaxonomy = ReadonlyMap<string, string>;

export interface GridShare {
  /** Grid cell id with literal quotes removed */
  cellId: string;
  /**
   * Fraction of the municipality's value assigned to the cell.
   * Null when the table leaves it blank or `NA`; such cells receive nothing.
   */
  share: Decimal | null;
}

/**
 * Municipality code → the grid cells overlapping it.
 */
export type GridShareIndex = ReadonlyMap<number, readonly GridShare[]>;

export interface ShareSumDeviation {
  municipalityCode: number;
  total: Decimal;
}
