/**
 * Unit tests for the value and filter model
 */

import { describe, expect, it } from 'vitest';

import {
  Value,
  and,
  collectFilters,
  createFilter,
  createQueryResult,
  isOperator,
  not,
  or,
  simple,
  sortField,
  toDriverValue,
} from '@/infra/database/query-builders/types.js';

describe('Value', () => {
  describe('int', () => {
    it('stores integers as bigint', () => {
      expect(Value.int(42)).toEqual({ kind: 'int', value: 42n });
      expect(Value.int(-7n)).toEqual({ kind: 'int', value: -7n });
    });

    it('accepts the full signed 64-bit range', () => {
      expect(Value.int(9223372036854775807n)).toEqual({
        kind: 'int',
        value: 9223372036854775807n,
      });
      expect(Value.int(-9223372036854775808n)).toEqual({
        kind: 'int',
        value: -9223372036854775808n,
      });
    });

    it('throws outside the 64-bit range', () => {
      expect(() => Value.int(9223372036854775808n)).toThrow(
        'Integer value 9223372036854775808 is outside the signed 64-bit range'
      );
    });

    it('throws for non-integral numbers', () => {
      expect(() => Value.int(1.5)).toThrow('Integer value expected, got 1.5');
    });
  });

  describe('from', () => {
    it('maps integral numbers to int and others to float', () => {
      expect(Value.from(3)).toEqual({ kind: 'int', value: 3n });
      expect(Value.from(1.5)).toEqual({ kind: 'float', value: 1.5 });
    });

    it('maps the remaining primitives', () => {
      expect(Value.from(null)).toEqual({ kind: 'null' });
      expect(Value.from(true)).toEqual({ kind: 'bool', value: true });
      expect(Value.from('a')).toEqual({ kind: 'string', value: 'a' });
      expect(Value.from(5n)).toEqual({ kind: 'int', value: 5n });
    });

    it('converts nested arrays', () => {
      expect(Value.from([1, ['x']])).toEqual({
        kind: 'array',
        items: [
          { kind: 'int', value: 1n },
          { kind: 'array', items: [{ kind: 'string', value: 'x' }] },
        ],
      });
    });
  });

  it('freezes constructed values', () => {
    expect(Object.isFrozen(Value.string('a'))).toBe(true);
    const array = Value.array([Value.int(1)]);
    expect(Object.isFrozen(array)).toBe(true);
    expect(Object.isFrozen(array.items)).toBe(true);
  });
});

describe('toDriverValue', () => {
  it('lowers values to plain JS', () => {
    expect(toDriverValue(Value.null())).toBeNull();
    expect(toDriverValue(Value.bool(false))).toBe(false);
    expect(toDriverValue(Value.int(10))).toBe(10n);
    expect(toDriverValue(Value.float(0.5))).toBe(0.5);
    expect(toDriverValue(Value.string('s'))).toBe('s');
    expect(toDriverValue(Value.array([Value.int(1), Value.null()]))).toEqual([1n, null]);
  });
});

describe('isOperator', () => {
  it('recognizes the closed operator set', () => {
    expect(isOperator('notIn')).toBe(true);
    expect(isOperator('between')).toBe(true);
    expect(isOperator('nin')).toBe(false);
    expect(isOperator('exists')).toBe(false);
  });
});

describe('filter helpers', () => {
  it('builds simple and compound expressions', () => {
    const expr = and([simple('a', 'eq', Value.int(1)), not(simple('b', 'lt', Value.int(2)))]);

    expect(expr).toEqual({
      kind: 'compound',
      op: 'and',
      filters: [
        { kind: 'simple', filter: { field: 'a', op: 'eq', value: { kind: 'int', value: 1n } } },
        {
          kind: 'compound',
          op: 'not',
          filters: [
            { kind: 'simple', filter: { field: 'b', op: 'lt', value: { kind: 'int', value: 2n } } },
          ],
        },
      ],
    });
  });

  it('collects filters depth-first', () => {
    const expr = or([
      and([simple('a', 'eq', Value.int(1)), simple('b', 'eq', Value.int(2))]),
      simple('c', 'eq', Value.int(3)),
    ]);

    expect(collectFilters(expr).map((filter) => filter.field)).toEqual(['a', 'b', 'c']);
  });

  it('createFilter and sortField produce frozen records', () => {
    const filter = createFilter('age', 'gte', Value.int(18));
    expect(filter).toEqual({ field: 'age', op: 'gte', value: { kind: 'int', value: 18n } });
    expect(Object.isFrozen(filter)).toBe(true);
    expect(sortField('id')).toEqual({ field: 'id', dir: 'asc' });
  });
});

describe('createQueryResult', () => {
  it('freezes the result and lowers params for drivers', () => {
    const result = createQueryResult('SELECT * FROM t WHERE a = $1', [Value.int(5)]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.params)).toBe(true);
    expect(result.toDriverParams()).toEqual([5n]);
  });
});
