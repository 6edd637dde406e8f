/**
 * Aggregate and Computed Field Descriptors
 *
 * Constructors validate identifiers eagerly; rendering assumes validated input.
 */

import { assertValidSqlExpression } from './expressions.js';
import { assertValidSqlIdentifier } from './identifiers.js';

import type { ComputedField } from './types.js';

export type AggregateFunc = 'count' | 'countDistinct' | 'sum' | 'avg' | 'min' | 'max';

/** An aggregate in the select list. Only COUNT may omit `field`. */
export interface Aggregate {
  readonly func: AggregateFunc;
  readonly field?: string;
  readonly alias?: string;
}

const fieldAggregate = (func: AggregateFunc, field: string): Aggregate => {
  assertValidSqlIdentifier(field, 'aggregate field');
  return Object.freeze({ func, field });
};

/**
 * Aggregate constructors.
 *
 * @example
 * ```typescript
 * aggregateToSql(Aggregate.count());                               // 'COUNT(*) AS count'
 * aggregateToSql(Aggregate.withAlias(Aggregate.sum('amount'), 'total')); // 'SUM(amount) AS total'
 * ```
 */
export const Aggregate = {
  count: (): Aggregate => Object.freeze({ func: 'count', alias: 'count' }),
  countField: (field: string): Aggregate => fieldAggregate('count', field),
  countDistinct: (field: string): Aggregate => fieldAggregate('countDistinct', field),
  sum: (field: string): Aggregate => fieldAggregate('sum', field),
  avg: (field: string): Aggregate => fieldAggregate('avg', field),
  min: (field: string): Aggregate => fieldAggregate('min', field),
  max: (field: string): Aggregate => fieldAggregate('max', field),

  withAlias(aggregate: Aggregate, alias: string): Aggregate {
    assertValidSqlIdentifier(alias, 'aggregate alias');
    return Object.freeze({ ...aggregate, alias });
  },
} as const;

function aggregateExpression(aggregate: Aggregate): string {
  const { func, field } = aggregate;
  if (field === undefined) {
    // Only COUNT has a field-less form
    return 'COUNT(*)';
  }
  switch (func) {
    case 'count':
      return `COUNT(${field})`;
    case 'countDistinct':
      return `COUNT(DISTINCT ${field})`;
    case 'sum':
      return `SUM(${field})`;
    case 'avg':
      return `AVG(${field})`;
    case 'min':
      return `MIN(${field})`;
    case 'max':
      return `MAX(${field})`;
  }
}

export function aggregateToSql(aggregate: Aggregate): string {
  const expression = aggregateExpression(aggregate);
  return aggregate.alias === undefined ? expression : `${expression} AS ${aggregate.alias}`;
}

/**
 * Creates a computed select-list entry. Throws on an invalid alias or expression.
 */
export function computedField(alias: string, expression: string): ComputedField {
  assertValidSqlIdentifier(alias, 'computed field alias');
  assertValidSqlExpression(expression, 'computed field');
  return Object.freeze({ alias, expression });
}

export function computedFieldToSql(field: ComputedField): string {
  return `(${field.expression}) AS ${field.alias}`;
}
