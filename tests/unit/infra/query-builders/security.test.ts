/**
 * Unit tests for identifier and expression validation
 */

import { describe, expect, it } from 'vitest';

import {
  assertValidSqlExpression,
  containsSqlKeyword,
  isValidSqlExpression,
} from '@/infra/database/query-builders/expressions.js';
import {
  assertValidSqlIdentifier,
  assertValidSqlIdentifiers,
  isValidSqlIdentifier,
} from '@/infra/database/query-builders/identifiers.js';

describe('isValidSqlIdentifier', () => {
  it.each(['id', 'user_id', '_private', 'Column2', 'a'.repeat(63)])('accepts %s', (value) => {
    expect(isValidSqlIdentifier(value)).toBe(true);
  });

  it.each([
    '',
    '123abc',
    'user-id',
    'user id',
    'users.id',
    'name"',
    "name'",
    'user; DROP TABLE users',
    'a'.repeat(64),
    'nämé',
  ])('rejects %j', (value) => {
    expect(isValidSqlIdentifier(value)).toBe(false);
  });
});

describe('assertValidSqlIdentifier', () => {
  it('names the context in the error', () => {
    expect(() => {
      assertValidSqlIdentifier('bad-name', 'table');
    }).toThrow(
      "Invalid SQL identifier for table: 'bad-name' " +
        '(must match [A-Za-z_][A-Za-z0-9_]* and be at most 63 characters)'
    );
  });

  it('checks every identifier in a list', () => {
    expect(() => {
      assertValidSqlIdentifiers(['id', 'name'], 'field');
    }).not.toThrow();
    expect(() => {
      assertValidSqlIdentifiers(['id', '1st'], 'field');
    }).toThrow("Invalid SQL identifier for field: '1st'");
  });
});

describe('containsSqlKeyword', () => {
  it('matches whole words only', () => {
    expect(containsSqlKeyword('last_updated', 'update')).toBe(false);
    expect(containsSqlKeyword('selection', 'select')).toBe(false);
    expect(containsSqlKeyword('x + (select 1)', 'select')).toBe(true);
    expect(containsSqlKeyword('update', 'update')).toBe(true);
  });

  it('finds a later bounded occurrence after an embedded one', () => {
    expect(containsSqlKeyword('updates update', 'update')).toBe(true);
  });

  it('never matches an empty keyword', () => {
    expect(containsSqlKeyword('anything', '')).toBe(false);
  });
});

describe('isValidSqlExpression', () => {
  it.each([
    "first_name || ' ' || last_name",
    'price * quantity',
    'COALESCE(discount, 0)',
    'last_updated',
    'LOWER(email)',
  ])('accepts %s', (expression) => {
    expect(isValidSqlExpression(expression)).toBe(true);
  });

  it.each([
    '',
    '1; DROP TABLE users',
    'price -- comment',
    'price /* comment */',
    '`price`',
    '(SELECT password FROM users)',
    'a UNION b',
    'pg_sleep(10)',
    'sleep(5)',
    'CHR(65)',
    'CAST(price AS text)',
    'x FROM information_schema',
    'sqlite_version()',
    '0x41',
  ])('rejects %j', (expression) => {
    expect(isValidSqlExpression(expression)).toBe(false);
  });

  it('rejects keywords regardless of case', () => {
    expect(isValidSqlExpression('1 + (SeLeCt 1)')).toBe(false);
  });

  it('rejects expressions over 1000 characters', () => {
    expect(isValidSqlExpression('a'.repeat(1000))).toBe(true);
    expect(isValidSqlExpression('a'.repeat(1001))).toBe(false);
  });
});

describe('assertValidSqlExpression', () => {
  it('throws with the context and expression', () => {
    expect(() => {
      assertValidSqlExpression('1; DROP', 'computed field');
    }).toThrow("Invalid SQL expression for computed field: '1; DROP' contains denied patterns");
  });
});
