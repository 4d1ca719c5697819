import { err, ok, type Result } from 'neverthrow';

import { createUnmappedCategoryError, type GridMappingError } from './errors.js';

import type {
  ClassificationPolicy,
  ClassifiedFact,
  EnumeratedCategory,
  FactRecord,
  UnmappedCategoryPolicy,
} from './types.js';
import type { CropTaxonomy } from '../../reference-data/index.js';

export interface ClassificationResult {
  facts: ClassifiedFact[];
  /** Facts excluded because their category was unmapped or not selected */
  droppedRows: number;
  /** Distinct source names with no target, sorted */
  unmappedCategories: string[];
}

export interface ClassificationContext {
  taxonomy?: CropTaxonomy | undefined;
  onUnmapped: UnmappedCategoryPolicy;
}

/**
 * Maps each fact's source category to its target category.
 *
 * Facts without a target never reach redistribution. For the taxonomy and
 * enumerated policies that is governed by `onUnmapped`; a category filter
 * drops the other categories unconditionally.
 */
export const classifyFacts = (
  facts: readonly FactRecord[],
  policy: ClassificationPolicy,
  context: ClassificationContext
): Result<ClassificationResult, GridMappingError> => {
  const classified: ClassifiedFact[] = [];
  const unmapped = new Set<string>();
  let droppedRows = 0;

  switch (policy.kind) {
    case 'taxonomy-join': {
      const taxonomy = context.taxonomy;
      if (taxonomy === undefined) {
        return err({
          type: 'MissingTaxonomy',
          message: 'A crop taxonomy is required to classify by taxonomy join',
        });
      }

      for (const fact of facts) {
        const target = taxonomy.get(fact.categoryName);
        if (target === undefined) {
          unmapped.add(fact.categoryName);
          droppedRows++;
          continue;
        }
        classified.push({
          municipalityCode: fact.municipalityCode,
          year: fact.year,
          category: target,
          value: fact.value,
        });
      }
      break;
    }

    case 'category-filter': {
      for (const fact of facts) {
        if (fact.categoryName !== policy.keep) {
          droppedRows++;
          continue;
        }
        classified.push({
          municipalityCode: fact.municipalityCode,
          year: fact.year,
          category: null,
          value: fact.value,
        });
      }
      break;
    }

    case 'enumerated-factor': {
      const bySource = new Map<string, EnumeratedCategory>(
        policy.categories.map((entry) => [entry.source, entry])
      );

      for (const fact of facts) {
        const entry = bySource.get(fact.categoryName);
        if (entry === undefined) {
          unmapped.add(fact.categoryName);
          droppedRows++;
          continue;
        }
        classified.push({
          municipalityCode: fact.municipalityCode,
          year: fact.year,
          category: entry.target,
          value: fact.value.mul(entry.factor),
        });
      }
      break;
    }
  }

  const unmappedCategories = [...unmapped].sort();

  if (context.onUnmapped === 'fail' && unmappedCategories.length > 0) {
    return err(createUnmappedCategoryError(unmappedCategories));
  }

  return ok({ facts: classified, droppedRows, unmappedCategories });
};
