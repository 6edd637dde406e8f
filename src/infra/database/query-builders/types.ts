/**
 * Query Model Types
 *
 * Values, operators, filter trees and the descriptors the statement builders consume.
 * Everything here is plain immutable data. Validation is a separate, explicit step
 * (see identifiers.ts, expressions.ts and the query-filters validator).
 */

// ============================================================================
// Values
// ============================================================================

/**
 * A bound parameter value.
 *
 * Integers are carried as bigint so the full signed 64-bit range survives
 * the trip to the driver.
 */
export type Value =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'int'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'array'; readonly items: readonly Value[] };

export type ValueKind = Value['kind'];

/** Values allowed in cursors (everything except arrays). */
export type PrimitiveValue = Exclude<Value, { kind: 'array' }>;

/** Plain JS shape of a value as handed to a database driver. */
export type DriverValue = null | boolean | bigint | number | string | readonly DriverValue[];

/** Inputs accepted by Value.from(). */
export type ValueInput = null | boolean | bigint | number | string | readonly ValueInput[];

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** The member of the Value union with the given kind. */
export type ValueOfKind<K extends ValueKind> = Extract<Value, { kind: K }>;

const NULL_VALUE: ValueOfKind<'null'> = Object.freeze({ kind: 'null' });

function toInt64(n: number | bigint): bigint {
  if (typeof n === 'number' && !Number.isInteger(n)) {
    throw new Error(`Integer value expected, got ${String(n)}`);
  }
  const big = BigInt(n);
  if (big < INT64_MIN || big > INT64_MAX) {
    throw new Error(`Integer value ${big.toString()} is outside the signed 64-bit range`);
  }
  return big;
}

/**
 * Value constructors.
 *
 * @example
 * ```typescript
 * Value.int(18);              // { kind: 'int', value: 18n }
 * Value.from(['a', 'b']);     // array of two strings
 * ```
 */
export const Value = {
  null: (): ValueOfKind<'null'> => NULL_VALUE,
  bool: (value: boolean): ValueOfKind<'bool'> => Object.freeze({ kind: 'bool', value }),
  int: (value: number | bigint): ValueOfKind<'int'> =>
    Object.freeze({ kind: 'int', value: toInt64(value) }),
  float: (value: number): ValueOfKind<'float'> => Object.freeze({ kind: 'float', value }),
  string: (value: string): ValueOfKind<'string'> => Object.freeze({ kind: 'string', value }),
  array: (items: readonly Value[]): ValueOfKind<'array'> =>
    Object.freeze({ kind: 'array', items: Object.freeze([...items]) }),

  /**
   * Converts a plain JS value. Integral numbers become `int`, other numbers `float`.
   */
  from(input: ValueInput): Value {
    if (input === null) return NULL_VALUE;
    switch (typeof input) {
      case 'boolean':
        return Value.bool(input);
      case 'bigint':
        return Value.int(input);
      case 'number':
        return Number.isSafeInteger(input) ? Value.int(input) : Value.float(input);
      case 'string':
        return Value.string(input);
      default:
        return Value.array(input.map((item) => Value.from(item)));
    }
  },
} as const;

/**
 * Lowers a value to the plain JS shape drivers expect.
 */
export function toDriverValue(value: Value): DriverValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'array':
      return value.items.map(toDriverValue);
    default:
      return value.value;
  }
}

export function isPrimitiveValue(value: Value): value is PrimitiveValue {
  return value.kind !== 'array';
}

// ============================================================================
// Operators
// ============================================================================

export const OPERATORS = [
  'eq',
  'ne',
  'gt',
  'gte',
  'lt',
  'lte',
  'in',
  'notIn',
  'like',
  'ilike',
  'regex',
  'startsWith',
  'endsWith',
  'contains',
  'between',
] as const;

/** Comparison operator. Closed set. */
export type Operator = (typeof OPERATORS)[number];

export const LOGICAL_OPS = ['and', 'or', 'not'] as const;

export type LogicalOp = (typeof LOGICAL_OPS)[number];

export function isOperator(value: string): value is Operator {
  return (OPERATORS as readonly string[]).includes(value);
}

// ============================================================================
// Filters
// ============================================================================

export interface Filter {
  readonly field: string;
  readonly op: Operator;
  readonly value: Value;
}

export interface SimpleFilterExpr {
  readonly kind: 'simple';
  readonly filter: Filter;
}

export interface CompoundFilterExpr {
  readonly kind: 'compound';
  readonly op: LogicalOp;
  readonly filters: readonly FilterExpr[];
}

/**
 * Recursive filter tree. Depth is unbounded here; the query-filters validator
 * bounds it when the tree comes from untrusted input.
 */
export type FilterExpr = SimpleFilterExpr | CompoundFilterExpr;

export const createFilter = (field: string, op: Operator, value: Value): Filter =>
  Object.freeze({ field, op, value });

export const simple = (field: string, op: Operator, value: Value): FilterExpr =>
  Object.freeze({ kind: 'simple', filter: createFilter(field, op, value) });

const compound = (op: LogicalOp, filters: readonly FilterExpr[]): FilterExpr =>
  Object.freeze({ kind: 'compound', op, filters: Object.freeze([...filters]) });

export const and = (filters: readonly FilterExpr[]): FilterExpr => compound('and', filters);

export const or = (filters: readonly FilterExpr[]): FilterExpr => compound('or', filters);

export const not = (expr: FilterExpr): FilterExpr => compound('not', [expr]);

/**
 * Flattens a filter tree into its simple filters, depth-first.
 */
export function collectFilters(expr: FilterExpr): Filter[] {
  if (expr.kind === 'simple') {
    return [expr.filter];
  }
  return expr.filters.flatMap(collectFilters);
}

// ============================================================================
// Sorting, Computed Fields
// ============================================================================

export type SortDir = 'asc' | 'desc';

export interface SortField {
  readonly field: string;
  readonly dir: SortDir;
}

export const sortField = (field: string, dir: SortDir = 'asc'): SortField =>
  Object.freeze({ field, dir });

export interface ComputedField {
  readonly alias: string;
  /** Raw SQL; must pass isValidSqlExpression before it reaches a builder. */
  readonly expression: string;
}

export type CursorDirection = 'after' | 'before';

// ============================================================================
// Query Result
// ============================================================================

/**
 * Output of a builder's build(). Placeholders in `sql` map 1:1, in order, onto `params`.
 */
export interface QueryResult {
  readonly sql: string;
  readonly params: readonly Value[];
  /** Params lowered to plain JS values for the driver. */
  toDriverParams(): DriverValue[];
}

export function createQueryResult(sql: string, params: readonly Value[]): QueryResult {
  const frozenParams = Object.freeze([...params]);
  return Object.freeze({
    sql,
    params: frozenParams,
    toDriverParams: () => frozenParams.map(toDriverValue),
  });
}
