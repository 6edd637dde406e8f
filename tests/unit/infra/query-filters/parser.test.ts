/**
 * Unit tests for the JSON filter parser
 */

import { describe, expect, it } from 'vitest';

import {
  MAX_PARSE_DEPTH,
  operatorFromSigil,
  parseFilter,
  parseFilterJson,
} from '@/infra/database/query-filters/parser.js';
import { Value, and, not, or, simple } from '@/infra/database/query-builders/types.js';

describe('operatorFromSigil', () => {
  it('maps sigils with or without the dollar sign', () => {
    expect(operatorFromSigil('$gte')).toBe('gte');
    expect(operatorFromSigil('lte')).toBe('lte');
    expect(operatorFromSigil('$nin')).toBe('notIn');
    expect(operatorFromSigil('$starts_with')).toBe('startsWith');
    expect(operatorFromSigil('endsWith')).toBe('endsWith');
  });

  it('returns undefined for unknown sigils', () => {
    expect(operatorFromSigil('$exists')).toBeUndefined();
    expect(operatorFromSigil('notIn')).toBeUndefined();
    expect(operatorFromSigil('$constructor')).toBeUndefined();
  });
});

describe('parseFilterJson', () => {
  it('ANDs several keys of one object', () => {
    const result = parseFilterJson('{"age":{"$gte":18},"status":{"$in":["a","b"]}}');

    expect(result._unsafeUnwrap()).toEqual(
      and([
        simple('age', 'gte', Value.int(18)),
        simple('status', 'in', Value.array([Value.string('a'), Value.string('b')])),
      ])
    );
  });

  it('treats plain values as equality', () => {
    expect(parseFilterJson('{"name":"Alice"}')._unsafeUnwrap()).toEqual(
      simple('name', 'eq', Value.string('Alice'))
    );
    expect(parseFilterJson('{"deleted_at":null}')._unsafeUnwrap()).toEqual(
      simple('deleted_at', 'eq', Value.null())
    );
    expect(parseFilterJson('{"score":1.5}')._unsafeUnwrap()).toEqual(
      simple('score', 'eq', Value.float(1.5))
    );
  });

  it('parses $or, $and and $not', () => {
    const result = parseFilterJson(
      '{"$or":[{"a":1},{"$and":[{"b":true},{"c":{"$ne":"x"}}]}],"$not":{"d":2}}'
    );

    expect(result._unsafeUnwrap()).toEqual(
      and([
        or([
          simple('a', 'eq', Value.int(1)),
          and([simple('b', 'eq', Value.bool(true)), simple('c', 'ne', Value.string('x'))]),
        ]),
        not(simple('d', 'eq', Value.int(2))),
      ])
    );
  });

  it('accepts $not with a one-element array', () => {
    expect(parseFilterJson('{"$not":[{"a":1}]}')._unsafeUnwrap()).toEqual(
      not(simple('a', 'eq', Value.int(1)))
    );
  });

  it('parses between, nin and alias operators', () => {
    expect(parseFilterJson('{"age":{"$between":[18,65]}}')._unsafeUnwrap()).toEqual(
      simple('age', 'between', Value.array([Value.int(18), Value.int(65)]))
    );
    expect(parseFilterJson('{"id":{"$nin":[1]}}')._unsafeUnwrap()).toEqual(
      simple('id', 'notIn', Value.array([Value.int(1)]))
    );
    expect(parseFilterJson('{"name":{"$ends_with":"son"}}')._unsafeUnwrap()).toEqual(
      simple('name', 'endsWith', Value.string('son'))
    );
  });

  it('reports invalid JSON', () => {
    const error = parseFilterJson('{not json')._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidSource');
    expect(error.message.startsWith('Invalid JSON: ')).toBe(true);
  });

  it.each([
    ['[]', 'ExpectedObject', 'Expected JSON object'],
    ['"text"', 'ExpectedObject', 'Expected JSON object'],
    ['{}', 'EmptyFilter', 'Filter object cannot be empty'],
    ['{"":1}', 'EmptyFieldName', 'Field name cannot be empty'],
    ['{"$and":{}}', 'ExpectedArray', 'Expected JSON array'],
    ['{"$nor":[]}', 'UnknownOperator', "Unknown operator '$nor'"],
    ['{"a":{"$exists":true}}', 'UnknownOperator', "Unknown operator '$exists'"],
    ['{"a":{"gte":1}}', 'ExpectedValue', 'Expected a value'],
    ['{"a":{"$gt":1,"$lt":5}}', 'ExpectedValue', 'Expected a value'],
    ['{"a":{"$eq":{"b":1}}}', 'ExpectedValue', 'Expected a value'],
    ['{"a":{"$in":5}}', 'InvalidOperatorValue', "Operator '$in' expects array"],
    ['{"a":{"$in":[{"b":1}]}}', 'InvalidOperatorValue', "Operator '$in' expects array of values"],
    [
      '{"a":{"$between":[1]}}',
      'InvalidOperatorValue',
      "Operator '$between' expects array of exactly 2 values",
    ],
    ['{"$not":[]}', 'NotRequiresOneCondition', '$not requires exactly one condition'],
    [
      '{"$not":[{"a":1},{"b":2}]}',
      'NotRequiresOneCondition',
      '$not requires exactly one condition',
    ],
    ['{"$not":5}', 'ExpectedObject', 'Expected JSON object'],
    ['{"$and":[{"a":1},{}]}', 'EmptyFilter', 'Filter object cannot be empty'],
  ])('rejects %s', (json, type, message) => {
    const error = parseFilterJson(json)._unsafeUnwrapErr();

    expect(error.type).toBe(type);
    expect(error.message).toBe(message);
  });

  it('keeps operator details on the error', () => {
    expect(parseFilterJson('{"a":{"$in":5}}')._unsafeUnwrapErr()).toEqual({
      type: 'InvalidOperatorValue',
      message: "Operator '$in' expects array",
      operator: '$in',
      expected: 'array',
    });
  });

  it('turns integers beyond the safe range into floats', () => {
    expect(parseFilterJson('{"id":9007199254740993}')._unsafeUnwrap()).toEqual(
      simple('id', 'eq', Value.float(9007199254740992))
    );
  });
});

describe('parseFilter', () => {
  it('parses already-decoded objects', () => {
    expect(parseFilter({ tags: ['a', ['b']] })._unsafeUnwrap()).toEqual(
      simple('tags', 'eq', Value.from(['a', ['b']]))
    );
  });

  it('rejects non-finite numbers', () => {
    expect(parseFilter({ a: Number.POSITIVE_INFINITY })._unsafeUnwrapErr().type).toBe(
      'ExpectedValue'
    );
  });

  it('rejects non-JSON values', () => {
    expect(parseFilter({ a: undefined })._unsafeUnwrapErr().type).toBe('ExpectedValue');
    expect(parseFilter(null)._unsafeUnwrapErr().type).toBe('ExpectedObject');
  });
});

describe('nesting and size limits', () => {
  const nestedNot = (levels: number): string =>
    '{"$not":'.repeat(levels) + '{"a":1}' + '}'.repeat(levels);
  const nestedArray = (levels: number): string =>
    '{"a":' + '['.repeat(levels) + '1' + ']'.repeat(levels) + '}';
  const tooDeep = {
    type: 'InvalidSource',
    message: 'Filter nesting exceeds 64 levels',
  };

  it('caps nesting at 64 levels', () => {
    expect(MAX_PARSE_DEPTH).toBe(64);
  });

  it('accepts $not chains up to the cap', () => {
    expect(parseFilterJson(nestedNot(63)).isOk()).toBe(true);
    expect(parseFilterJson(nestedNot(64))._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('accepts nested arrays up to the cap', () => {
    expect(parseFilterJson(nestedArray(63)).isOk()).toBe(true);
    expect(parseFilterJson(nestedArray(64))._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('returns an error for a $not chain 20000 levels deep', () => {
    const result = parseFilterJson(nestedNot(20000));

    expect(result._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('returns an error for arrays 20000 levels deep', () => {
    const result = parseFilterJson(nestedArray(20000));

    expect(result._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('returns an error for a deep $in operand', () => {
    const json = '{"a":{"$in":' + '['.repeat(20000) + ']'.repeat(20000) + '}}';

    expect(parseFilterJson(json)._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('returns an error for deeply nested $and lists', () => {
    const json = '{"$and":['.repeat(20000) + '{"a":1}' + ']}'.repeat(20000);

    expect(parseFilterJson(json)._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('bounds decoded trees the same way', () => {
    let input: unknown = { a: 1 };
    for (let i = 0; i < 20000; i++) {
      input = { $not: input };
    }

    expect(parseFilter(input)._unsafeUnwrapErr()).toEqual(tooDeep);
  });

  it('parses wide filters without recursion', () => {
    const items = Array.from({ length: 50000 }, (_, i) => `{"id":${String(i)}}`);
    const expr = parseFilterJson(`{"$or":[${items.join(',')}]}`)._unsafeUnwrap();

    expect(expr.kind === 'compound' ? expr.filters.length : 0).toBe(50000);
  });
});
