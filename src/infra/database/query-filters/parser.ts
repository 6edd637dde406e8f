/**
 * Filter Parser
 *
 * Turns a Mongo-style JSON filter from a request body into a filter tree.
 *
 * | Input                                   | Tree                               |
 * |-----------------------------------------|------------------------------------|
 * | `{"name": "Alice"}`                     | name eq 'Alice'                    |
 * | `{"age": {"$gte": 18}}`                 | age gte 18                         |
 * | `{"a": 1, "b": 2}`                      | and(a eq 1, b eq 2)                |
 * | `{"$or": [{...}, {...}]}`               | or(...)                            |
 * | `{"$not": {...}}`                       | not(...)                           |
 * | `{"status": {"$in": ["a", "b"]}}`       | status in ['a', 'b']               |
 * | `{"age": {"$between": [18, 65]}}`       | age between [18, 65]               |
 *
 * The output is NOT validated: run it through a FilterValidator before
 * handing it to a builder.
 */

import { err, ok, Result } from 'neverthrow';

import { Value, and, not, or, simple } from '../query-builders/types.js';

import {
  createEmptyFieldNameError,
  createEmptyFilterError,
  createExpectedArrayError,
  createExpectedObjectError,
  createExpectedValueError,
  createInvalidOperatorValueError,
  createInvalidSourceError,
  createNotRequiresOneConditionError,
  createSourceTooDeepError,
  createUnknownOperatorError,
  type FilterParseError,
} from './errors.js';

import type { FilterExpr, Operator } from '../query-builders/types.js';

const OPERATOR_SIGILS: Readonly<Record<string, Operator>> = Object.freeze({
  eq: 'eq',
  ne: 'ne',
  gt: 'gt',
  gte: 'gte',
  lt: 'lt',
  lte: 'lte',
  in: 'in',
  nin: 'notIn',
  like: 'like',
  ilike: 'ilike',
  regex: 'regex',
  startsWith: 'startsWith',
  starts_with: 'startsWith',
  endsWith: 'endsWith',
  ends_with: 'endsWith',
  contains: 'contains',
  between: 'between',
});

/**
 * Maps an operator sigil to its operator. The leading `$` is optional.
 *
 * @example
 * ```typescript
 * operatorFromSigil('$nin');        // 'notIn'
 * operatorFromSigil('starts_with'); // 'startsWith'
 * operatorFromSigil('$exists');     // undefined
 * ```
 */
export function operatorFromSigil(sigil: string): Operator | undefined {
  const name = sigil.startsWith('$') ? sigil.slice(1) : sigil;
  return Object.hasOwn(OPERATOR_SIGILS, name) ? OPERATOR_SIGILS[name] : undefined;
}

const isJsonObject = (input: unknown): input is object =>
  typeof input === 'object' && input !== null && !Array.isArray(input);

/** Deepest object or array nesting the parser follows. */
export const MAX_PARSE_DEPTH = 64;

// ============================================================================
// Values
// ============================================================================

type ValueFailure = 'notValue' | 'tooDeep';

const NOT_VALUE: ValueFailure = 'notValue';
const TOO_DEEP: ValueFailure = 'tooDeep';

function numberToValue(n: number): Result<Value, ValueFailure> {
  if (!Number.isFinite(n)) return err(NOT_VALUE);
  return ok(Number.isSafeInteger(n) ? Value.int(n) : Value.float(n));
}

/**
 * Converts a JSON scalar or array to a value. Objects anywhere inside are
 * rejected.
 */
function jsonToValue(input: unknown, depth: number): Result<Value, ValueFailure> {
  if (depth > MAX_PARSE_DEPTH) return err(TOO_DEEP);
  if (input === null) return ok(Value.null());
  switch (typeof input) {
    case 'boolean':
      return ok(Value.bool(input));
    case 'number':
      return numberToValue(input);
    case 'string':
      return ok(Value.string(input));
    default:
      break;
  }
  if (Array.isArray(input)) {
    const items: Value[] = [];
    for (const item of input) {
      const value = jsonToValue(item, depth + 1);
      if (value.isErr()) return value;
      items.push(value.value);
    }
    return ok(Value.array(items));
  }
  return err(NOT_VALUE);
}

function valueOr(
  result: Result<Value, ValueFailure>,
  otherwise: () => FilterParseError
): Result<Value, FilterParseError> {
  return result.mapErr((failure) =>
    failure === TOO_DEEP ? createSourceTooDeepError(MAX_PARSE_DEPTH) : otherwise()
  );
}

function operatorValue(
  sigil: string,
  op: Operator,
  input: unknown,
  depth: number
): Result<Value, FilterParseError> {
  switch (op) {
    case 'in':
    case 'notIn':
      if (!Array.isArray(input)) {
        return err(createInvalidOperatorValueError(sigil, 'array'));
      }
      return valueOr(jsonToValue(input, depth), () =>
        createInvalidOperatorValueError(sigil, 'array of values')
      );
    case 'between':
      if (!Array.isArray(input) || input.length !== 2) {
        return err(createInvalidOperatorValueError(sigil, 'array of exactly 2 values'));
      }
      return valueOr(jsonToValue(input, depth), () =>
        createInvalidOperatorValueError(sigil, 'array of 2 values')
      );
    default:
      return valueOr(jsonToValue(input, depth), createExpectedValueError);
  }
}

// ============================================================================
// Tree
// ============================================================================

/**
 * `{"$gte": 18}` style operand, or a plain value for implicit equality.
 */
function parseFieldFilter(
  field: string,
  input: unknown,
  depth: number
): Result<FilterExpr, FilterParseError> {
  if (!isJsonObject(input)) {
    return valueOr(jsonToValue(input, depth), createExpectedValueError).map((value) =>
      simple(field, 'eq', value)
    );
  }

  const entries = Object.entries(input);
  const [entry] = entries;
  if (entries.length !== 1 || entry === undefined || !entry[0].startsWith('$')) {
    return err(createExpectedValueError());
  }

  const [sigil, operand] = entry;
  const op = operatorFromSigil(sigil);
  if (op === undefined) {
    return err(createUnknownOperatorError(sigil));
  }
  return operatorValue(sigil, op, operand, depth + 1).map((value) => simple(field, op, value));
}

function parseExprList(input: unknown, depth: number): Result<FilterExpr[], FilterParseError> {
  if (!Array.isArray(input)) {
    return err(createExpectedArrayError());
  }
  const exprs: FilterExpr[] = [];
  for (const item of input) {
    const result = parseObject(item, depth);
    if (result.isErr()) return err(result.error);
    exprs.push(result.value);
  }
  return ok(exprs);
}

function parseNot(input: unknown, depth: number): Result<FilterExpr, FilterParseError> {
  if (Array.isArray(input)) {
    const only: unknown = input[0];
    if (input.length !== 1) {
      return err(createNotRequiresOneConditionError());
    }
    return parseObject(only, depth).map(not);
  }
  return parseObject(input, depth).map(not);
}

function parseEntry(
  key: string,
  input: unknown,
  depth: number
): Result<FilterExpr, FilterParseError> {
  if (key.length === 0) {
    return err(createEmptyFieldNameError());
  }
  if (!key.startsWith('$')) {
    return parseFieldFilter(key, input, depth + 1);
  }
  switch (key) {
    case '$and':
      return parseExprList(input, depth + 1).map(and);
    case '$or':
      return parseExprList(input, depth + 1).map(or);
    case '$not':
      return parseNot(input, depth + 1);
    default:
      return err(createUnknownOperatorError(key));
  }
}

function parseObject(input: unknown, depth: number): Result<FilterExpr, FilterParseError> {
  if (depth > MAX_PARSE_DEPTH) {
    return err(createSourceTooDeepError(MAX_PARSE_DEPTH));
  }
  if (!isJsonObject(input)) {
    return err(createExpectedObjectError());
  }

  const entries = Object.entries(input);
  if (entries.length === 0) {
    return err(createEmptyFilterError());
  }

  const parsed: FilterExpr[] = [];
  for (const [key, value] of entries) {
    const result = parseEntry(key, value, depth);
    if (result.isErr()) return err(result.error);
    parsed.push(result.value);
  }

  const [only] = parsed;
  return parsed.length === 1 && only !== undefined ? ok(only) : ok(and(parsed));
}

/**
 * Parses an already-decoded JSON tree. Several keys in one object are ANDed;
 * a single key is returned unwrapped. Trees nested past MAX_PARSE_DEPTH are
 * rejected with an InvalidSource error.
 *
 * @example
 * ```typescript
 * parseFilter({ age: { $gte: 18 }, status: { $in: ['a', 'b'] } });
 * // ok(and([
 * //   simple('age', 'gte', Value.int(18)),
 * //   simple('status', 'in', Value.from(['a', 'b'])),
 * // ]))
 * ```
 */
export function parseFilter(input: unknown): Result<FilterExpr, FilterParseError> {
  return parseObject(input, 0);
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => createInvalidSourceError(error instanceof Error ? error.message : String(error))
);

/**
 * Parses raw JSON text, e.g. a request body.
 *
 * Integers beyond 2^53 lose precision in JSON.parse and come out as floats.
 */
export function parseFilterJson(text: string): Result<FilterExpr, FilterParseError> {
  return parseJson(text).andThen(parseFilter);
}
