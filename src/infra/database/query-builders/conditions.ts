/**
 * Filter Condition Compiler
 *
 * Lowers filters and filter trees into parameterized SQL fragments.
 * The parameter index is threaded through every call so a caller can keep
 * appending clauses after the returned `nextIndex`.
 *
 * SECURITY: Values only ever reach the output as placeholders. Field names are
 * emitted as-is and must already have passed identifier validation.
 */

import type { Dialect } from './dialect.js';
import type { CompoundFilterExpr, Filter, FilterExpr, Operator, Value } from './types.js';

export interface CompiledCondition {
  readonly sql: string;
  readonly params: Value[];
  /** Next free 1-based parameter index. */
  readonly nextIndex: number;
}

function binaryOperatorSql(op: Operator): string {
  switch (op) {
    case 'ne':
      return '!=';
    case 'gt':
      return '>';
    case 'gte':
      return '>=';
    case 'lt':
      return '<';
    case 'lte':
      return '<=';
    case 'like':
      return 'LIKE';
    default:
      // eq, and operators whose value did not have the shape they need
      return '=';
  }
}

/**
 * Compiles a single filter.
 *
 * @example
 * ```typescript
 * compileFilter(Postgres, createFilter('age', 'gte', Value.int(18)), 1);
 * // { sql: 'age >= $1', params: [Value.int(18)], nextIndex: 2 }
 * ```
 */
export function compileFilter(
  dialect: Dialect,
  filter: Filter,
  startIndex: number
): CompiledCondition {
  const { field, op, value } = filter;
  const idx = startIndex;
  const single = (sql: string): CompiledCondition => ({
    sql,
    params: [value],
    nextIndex: idx + 1,
  });

  if (value.kind === 'null' && (op === 'eq' || op === 'ne')) {
    const test = op === 'eq' ? 'IS NULL' : 'IS NOT NULL';
    return { sql: `${field} ${test}`, params: [], nextIndex: idx };
  }

  if (value.kind === 'array' && (op === 'in' || op === 'notIn')) {
    const clause =
      op === 'in'
        ? dialect.inClause(field, value.items, idx)
        : dialect.notInClause(field, value.items, idx);
    return { sql: clause.sql, params: clause.params, nextIndex: idx + clause.params.length };
  }

  if (value.kind === 'array' && op === 'between') {
    const [low, high] = value.items;
    if (value.items.length !== 2 || low === undefined || high === undefined) {
      // Fail closed: a malformed range matches nothing.
      return {
        sql: `1=0 /* BETWEEN requires 2 values, got ${String(value.items.length)} */`,
        params: [],
        nextIndex: idx,
      };
    }
    return {
      sql: `${field} BETWEEN ${dialect.param(idx)} AND ${dialect.param(idx + 1)}`,
      params: [low, high],
      nextIndex: idx + 2,
    };
  }

  switch (op) {
    case 'regex':
      return single(`${field} ${dialect.regexOperator()} ${dialect.param(idx)}`);
    case 'ilike':
      return single(`${field} ${dialect.supportsILike() ? 'ILIKE' : 'LIKE'} ${dialect.param(idx)}`);
    case 'startsWith':
      return single(dialect.startsWithClause(field, idx));
    case 'endsWith':
      return single(dialect.endsWithClause(field, idx));
    case 'contains':
      return single(dialect.containsClause(field, idx));
    default:
      return single(`${field} ${binaryOperatorSql(op)} ${dialect.param(idx)}`);
  }
}

function compileCompound(
  dialect: Dialect,
  expr: CompoundFilterExpr,
  startIndex: number
): CompiledCondition {
  let idx = startIndex;
  const params: Value[] = [];
  const parts: string[] = [];

  for (const child of expr.filters) {
    const compiled = compileFilterExpr(dialect, child, idx);
    parts.push(compiled.sql);
    params.push(...compiled.params);
    idx = compiled.nextIndex;
  }

  if (expr.op === 'not') {
    return { sql: `NOT (${parts[0] ?? ''})`, params, nextIndex: idx };
  }

  const [only] = parts;
  if (parts.length === 1 && only !== undefined) {
    return { sql: only, params, nextIndex: idx };
  }

  const keyword = expr.op === 'and' ? ' AND ' : ' OR ';
  return { sql: `(${parts.join(keyword)})`, params, nextIndex: idx };
}

/**
 * Compiles a filter tree, children left to right.
 *
 * AND/OR groups with one child are returned unwrapped. Empty groups compile to
 * `()` and an empty NOT to `NOT ()`; neither is treated as an error.
 */
export function compileFilterExpr(
  dialect: Dialect,
  expr: FilterExpr,
  startIndex: number
): CompiledCondition {
  return expr.kind === 'simple'
    ? compileFilter(dialect, expr.filter, startIndex)
    : compileCompound(dialect, expr, startIndex);
}

/**
 * Compiles a list of conditions joined by AND, as used by WHERE clauses.
 * Returns undefined when there is nothing to compile.
 */
export function compileWhere(
  dialect: Dialect,
  exprs: readonly FilterExpr[],
  startIndex: number
): CompiledCondition | undefined {
  if (exprs.length === 0) {
    return undefined;
  }

  let idx = startIndex;
  const params: Value[] = [];
  const parts: string[] = [];

  for (const expr of exprs) {
    const compiled = compileFilterExpr(dialect, expr, idx);
    parts.push(compiled.sql);
    params.push(...compiled.params);
    idx = compiled.nextIndex;
  }

  return { sql: parts.join(' AND '), params, nextIndex: idx };
}
