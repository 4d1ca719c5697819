/**
 * Reference Data Module Public API
 *
 * Crop taxonomy and municipality-to-grid shares shared by every pipeline.
 */

// Repository
export {
  createReferenceDataRepo,
  type ReferenceDataRepoOptions,
} from './shell/repo/csv-reference-repo.js';
export type { ReferenceDataRepo } from './core/ports.js';

// Logic
export {
  buildCropTaxonomy,
  buildGridShareIndex,
  findShareSumDeviations,
  countNullShares,
  normalizeCellId,
  DEFAULT_SHARE_SUM_TOLERANCE,
  NULL_SHARE_VALUES,
} from './core/logic.js';

// Types
export type {
  CropMappingRow,
  CropTaxonomy,
  GridShare,
  GridShareIndex,
  GridShareRow,
  ShareSumDeviation,
} from './core/types.js';

// Errors
export type { ReferenceDataError } from './core/errors.js';
