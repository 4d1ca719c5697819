import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Fact table
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Positional field names of an IBGE municipality table export.
 * The file's own header is ignored; fields are named by position.
 */
export const FACT_FIELDS = [
  'territorialLevelCode',
  'territorialLevelName',
  'unitCode',
  'unitName',
  'value',
  'municipalityCode',
  'municipalityName',
  'variableCode',
  'variableName',
  'yearCode',
  'yearName',
  'categoryCode',
  'categoryName',
  'year',
] as const;

export type FactField = (typeof FACT_FIELDS)[number];

export type RawFactRow = Record<FactField, string>;

/**
 * One cleaned observation for a municipality, category and year.
 */
export interface FactRecord {
  municipalityCode: number;
  /** Product or herd name as published */
  categoryName: string;
  year: number;
  value: Decimal;
}

/**
 * A fact after reclassification. `category` is the target category, or null
 * for domains whose output carries no category column.
 */
export interface ClassifiedFact {
  municipalityCode: number;
  year: number;
  category: string | null;
  value: Decimal;
}

/**
 * A fact's share of value in one grid cell, before aggregation.
 */
export interface RedistributedRow {
  cellId: string;
  year: number;
  category: string | null;
  value: Decimal;
}

/**
 * One line of the output file.
 */
export interface OutputRecord {
  cellId: string;
  year: number;
  category: string | null;
  value: Decimal;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain definitions
// ─────────────────────────────────────────────────────────────────────────────

export type DomainName = 'crop' | 'livestock' | 'forestry';

export interface EnumeratedCategory {
  source: string;
  target: string;
  /** Multiplier converting reported units into the target unit */
  factor: Decimal;
}

/**
 * How source categories become target categories.
 *
 * - taxonomy-join: look the name up in the crop taxonomy (inner join)
 * - category-filter: keep one source category; the output has no category
 * - enumerated-factor: fixed source → target list with conversion factors
 */
export type ClassificationPolicy =
  | { kind: 'taxonomy-join' }
  | { kind: 'category-filter'; keep: string }
  | { kind: 'enumerated-factor'; categories: readonly EnumeratedCategory[] };

/**
 * A derived category summed from other categories per (cell, year).
 */
export interface Rollup {
  category: string;
  components: readonly string[];
}

export interface OutputSchema {
  /** Header names in output order; the category column is present iff includeCategory */
  columns: readonly string[];
  includeCategory: boolean;
}

export interface DomainDefinition {
  name: DomainName;
  description: string;
  classification: ClassificationPolicy;
  rollups: readonly Rollup[];
  output: OutputSchema;
  /** Output file name used when the manifest names none */
  defaultOutputFile: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Run options and report
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What to do with facts whose category has no target.
 * - drop: exclude them and report the names
 * - fail: abort the run
 */
export type UnmappedCategoryPolicy = 'drop' | 'fail';

export type AdjustmentName = 'fruit-unit-change-2001';

export interface PipelineOptions {
  onUnmapped: UnmappedCategoryPolicy;
  adjustments: readonly AdjustmentName[];
}

export interface CategoryTotal {
  year: number;
  category: string | null;
  /** Sum of output values divided by 1e6 */
  totalMillions: Decimal;
}

export interface PipelineReport {
  domain: DomainName;
  factRows: number;
  adjustedRows: number;
  classifiedRows: number;
  droppedRows: number;
  unmappedCategories: string[];
  unsharedFacts: number;
  unsharedMunicipalities: number[];
  nullShareRows: number;
  redistributedRows: number;
  outputRows: number;
  totals: CategoryTotal[];
}
