import type { ReferenceDataError } from './errors.js';
import type { CropTaxonomy, GridShareIndex } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Read-only access to the reference tables shared by every pipeline.
 * Implementations load each table at most once.
 */
export interface ReferenceDataRepo {
  /**
   * Crop taxonomy used by the planted-area pipeline.
   * Fails with NotConfigured when no taxonomy file was supplied.
   */
  loadCropTaxonomy(): Promise<Result<CropTaxonomy, ReferenceDataError>>;

  loadGridShares(): Promise<Result<GridShareIndex, ReferenceDataError>>;
}
