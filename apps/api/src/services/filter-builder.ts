import type { PlantQuery } from '@houseplants/shared';

/**
 * Attribute under which the gateway stores lower-cased copies of a document's
 * string fields, so text criteria can match case-insensitively in DynamoDB.
 */
export const SEARCH_ATTRIBUTE = 'search';

export const PLANT_TEXT_FIELDS = ['name', 'scientific_name', 'description'] as const;

export type Criterion =
  | { kind: 'text'; fields: readonly string[]; value: string }
  | { kind: 'equals'; field: string; value: string | boolean }
  | { kind: 'contains'; field: string; value: string };

/** Criteria combined with AND. An empty predicate matches every record. */
export type Predicate = readonly Criterion[];

export interface FilterExpression {
  expression: string | undefined;
  names: Record<string, string>;
  values: Record<string, unknown>;
}

/**
 * Turn list query parameters into a predicate. Missing or empty parameters
 * add no criterion; `pet_friendly=false` does.
 */
export function buildPlantPredicate(query: Omit<PlantQuery, 'limit'>): Predicate {
  const criteria: Criterion[] = [];

  if (query.q) {
    criteria.push({ kind: 'text', fields: PLANT_TEXT_FIELDS, value: query.q });
  }
  if (query.light) {
    criteria.push({ kind: 'equals', field: 'light', value: query.light });
  }
  if (query.water) {
    criteria.push({ kind: 'equals', field: 'water', value: query.water });
  }
  if (query.care_level) {
    criteria.push({ kind: 'equals', field: 'care_level', value: query.care_level });
  }
  if (query.pet_friendly !== undefined) {
    criteria.push({ kind: 'equals', field: 'pet_friendly', value: query.pet_friendly });
  }
  if (query.size) {
    criteria.push({ kind: 'equals', field: 'size', value: query.size });
  }
  if (query.tag) {
    criteria.push({ kind: 'contains', field: 'tags', value: query.tag });
  }

  return criteria;
}

/**
 * Render a predicate as a DynamoDB FilterExpression. Placeholders are numbered
 * by criterion position so they never collide with the caller's key condition.
 */
export function renderFilterExpression(predicate: Predicate): FilterExpression {
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};
  const clauses: string[] = [];

  predicate.forEach((criterion, i) => {
    const value = `:v${String(i)}`;

    switch (criterion.kind) {
      case 'text': {
        names['#search'] = SEARCH_ATTRIBUTE;
        values[value] = criterion.value.toLowerCase();
        const alternatives = criterion.fields.map((field, j) => {
          const name = `#f${String(i)}_${String(j)}`;
          names[name] = field;
          return `contains(#search.${name}, ${value})`;
        });
        clauses.push(`(${alternatives.join(' OR ')})`);
        break;
      }
      case 'equals': {
        const name = `#f${String(i)}`;
        names[name] = criterion.field;
        values[value] = criterion.value;
        clauses.push(`${name} = ${value}`);
        break;
      }
      case 'contains': {
        const name = `#f${String(i)}`;
        names[name] = criterion.field;
        values[value] = criterion.value;
        clauses.push(`contains(${name}, ${value})`);
        break;
      }
    }
  });

  return {
    expression: clauses.length > 0 ? clauses.join(' AND ') : undefined,
    names,
    values,
  };
}

function matchesCriterion(record: Readonly<Record<string, unknown>>, criterion: Criterion): boolean {
  switch (criterion.kind) {
    case 'text': {
      const needle = criterion.value.toLowerCase();
      return criterion.fields.some((field) => {
        const haystack = record[field];
        return typeof haystack === 'string' && haystack.toLowerCase().includes(needle);
      });
    }
    case 'equals':
      return record[criterion.field] === criterion.value;
    case 'contains': {
      const list = record[criterion.field];
      return Array.isArray(list) && list.includes(criterion.value);
    }
  }
}

/** Evaluate a predicate in memory. */
export function matchesPredicate(
  record: Readonly<Record<string, unknown>>,
  predicate: Predicate,
): boolean {
  return predicate.every((criterion) => matchesCriterion(record, criterion));
}
