import { Decimal } from 'decimal.js';

import type { DomainDefinition, DomainName, EnumeratedCategory } from './types.js';

const CATEGORY_OUTPUT = {
  columns: ['x.y.iso', 't', 'kcr', 'value'],
  includeCategory: true,
} as const;

/**
 * PEVS products kept for forestry, with factors to dry-matter mass.
 * Charcoal is reported in tonnes, firewood and roundwood in m³.
 */
export const FORESTRY_CATEGORIES: readonly EnumeratedCategory[] = [
  { source: '1.1 - Carvão vegetal', target: 'woodfuel', factor: new Decimal(721) },
  { source: '1.2 - Lenha', target: 'woodfuel', factor: new Decimal(350) },
  { source: '1.3 - Madeira em tora', target: 'wood', factor: new Decimal(350) },
];

/** PAM planted area, reclassified through the crop taxonomy */
export const CROP_DOMAIN: DomainDefinition = {
  name: 'crop',
  description: 'PAM planted area by MagPIE crop',
  classification: { kind: 'taxonomy-join' },
  rollups: [],
  output: CATEGORY_OUTPUT,
  defaultOutputFile: 'crop_planted_area_1998_2023.csv',
};

/** PPM herd size, cattle only */
export const LIVESTOCK_DOMAIN: DomainDefinition = {
  name: 'livestock',
  description: 'PPM bovine herd',
  classification: { kind: 'category-filter', keep: 'Bovino' },
  rollups: [],
  output: {
    columns: ['x.y.iso', 't', 'value'],
    includeCategory: false,
  },
  defaultOutputFile: 'livestock_herd_bovine_1998_2023.csv',
};

/** PEVS forestry production in dry matter, with a timber roll-up */
export const FORESTRY_DOMAIN: DomainDefinition = {
  name: 'forestry',
  description: 'PEVS wood and woodfuel production in dry matter',
  classification: { kind: 'enumerated-factor', categories: FORESTRY_CATEGORIES },
  rollups: [{ category: 'timber', components: ['wood', 'woodfuel'] }],
  output: CATEGORY_OUTPUT,
  defaultOutputFile: 'forestry_products_1998_2023.csv',
};

export const DOMAINS: Readonly<Record<DomainName, DomainDefinition>> = {
  crop: CROP_DOMAIN,
  livestock: LIVESTOCK_DOMAIN,
  forestry: FORESTRY_DOMAIN,
};

export const DOMAIN_NAMES: readonly DomainName[] = ['crop', 'livestock', 'forestry'];

export const isDomainName = (value: string): value is DomainName =>
  DOMAIN_NAMES.some((name) => name === value);
