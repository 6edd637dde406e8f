/**
 * Unit tests for aggregate and computed field descriptors
 */

import { describe, expect, it } from 'vitest';

import {
  Aggregate,
  aggregateToSql,
  computedField,
  computedFieldToSql,
} from '@/infra/database/query-builders/aggregates.js';

describe('Aggregate', () => {
  it('renders COUNT(*) with the default alias', () => {
    expect(aggregateToSql(Aggregate.count())).toBe('COUNT(*) AS count');
  });

  it('renders field aggregates without an alias', () => {
    expect(aggregateToSql(Aggregate.countField('email'))).toBe('COUNT(email)');
    expect(aggregateToSql(Aggregate.countDistinct('email'))).toBe('COUNT(DISTINCT email)');
    expect(aggregateToSql(Aggregate.sum('amount'))).toBe('SUM(amount)');
    expect(aggregateToSql(Aggregate.avg('amount'))).toBe('AVG(amount)');
    expect(aggregateToSql(Aggregate.min('amount'))).toBe('MIN(amount)');
    expect(aggregateToSql(Aggregate.max('amount'))).toBe('MAX(amount)');
  });

  it('adds or replaces aliases', () => {
    expect(aggregateToSql(Aggregate.withAlias(Aggregate.sum('amount'), 'total'))).toBe(
      'SUM(amount) AS total'
    );
    expect(aggregateToSql(Aggregate.withAlias(Aggregate.count(), 'n'))).toBe('COUNT(*) AS n');
  });

  it('rejects invalid fields and aliases', () => {
    expect(() => Aggregate.sum('amount; DROP')).toThrow(
      "Invalid SQL identifier for aggregate field: 'amount; DROP'"
    );
    expect(() => Aggregate.withAlias(Aggregate.count(), 'my alias')).toThrow(
      "Invalid SQL identifier for aggregate alias: 'my alias'"
    );
  });
});

describe('computedField', () => {
  it('wraps the expression in parentheses', () => {
    const field = computedField('full_name', "first_name || ' ' || last_name");

    expect(computedFieldToSql(field)).toBe("(first_name || ' ' || last_name) AS full_name");
  });

  it('rejects invalid aliases and expressions', () => {
    expect(() => computedField('full name', 'a')).toThrow(
      "Invalid SQL identifier for computed field alias: 'full name'"
    );
    expect(() => computedField('x', 'a; DROP TABLE t')).toThrow(
      "Invalid SQL expression for computed field: 'a; DROP TABLE t'"
    );
  });
});
