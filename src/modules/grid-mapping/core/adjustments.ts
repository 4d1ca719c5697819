import { Decimal } from 'decimal.js';

import type { AdjustmentName, FactRecord } from './types.js';

/**
 * From 2001 IBGE reports these fruit crops in tonnes; earlier years were in
 * thousands of fruits (bunches for banana), so pre-2001 values are zeroed.
 * Pineapple and coconut stay in thousands of fruits and are zeroed throughout.
 * Meant for production-quantity tables, not planted area.
 */
export const FRUIT_UNIT_CHANGE_2001 = {
  firstYearInTonnes: 2001,
  zeroBeforeFirstYear: new Set([
    'Abacate',
    'Banana (cacho)',
    'Caqui',
    'Figo',
    'Goiaba',
    'Laranja',
    'Limão',
    'Maçã',
    'Mamão',
    'Manga',
    'Maracujá',
    'Marmelo',
    'Melancia',
    'Melão',
    'Pera',
    'Pêssego',
  ]),
  zeroAlways: new Set(['Abacaxi*', 'Coco-da-baía*']),
} as const;

type Adjustment = (fact: FactRecord) => FactRecord | null;

const ZERO = new Decimal(0);

const fruitUnitChange2001: Adjustment = (fact) => {
  const rule = FRUIT_UNIT_CHANGE_2001;
  const zeroed =
    rule.zeroAlways.has(fact.categoryName) ||
    (rule.zeroBeforeFirstYear.has(fact.categoryName) && fact.year < rule.firstYearInTonnes);

  return zeroed ? { ...fact, value: ZERO } : null;
};

const ADJUSTMENTS: Record<AdjustmentName, Adjustment> = {
  'fruit-unit-change-2001': fruitUnitChange2001,
};

export interface AdjustmentResult {
  facts: FactRecord[];
  /** Rows at least one adjustment applied to */
  adjustedRows: number;
}

/**
 * Applies the named adjustments in order. An adjustment returns null for rows it leaves alone.
 */
export const applyAdjustments = (
  facts: readonly FactRecord[],
  names: readonly AdjustmentName[]
): AdjustmentResult => {
  if (names.length === 0) {
    return { facts: [...facts], adjustedRows: 0 };
  }

  const adjustments = names.map((name) => ADJUSTMENTS[name]);
  let adjustedRows = 0;

  const adjusted = facts.map((fact) => {
    let current = fact;
    let touched = false;

    for (const adjust of adjustments) {
      const next = adjust(current);
      if (next !== null) {
        current = next;
        touched = true;
      }
    }

    if (touched) adjustedRows++;
    return current;
  });

  return { facts: adjusted, adjustedRows };
};
