/**
 * SQL Dialects
 *
 * Placeholder syntax, IN-list handling and pattern-match support for the two
 * supported engines. Dialects are stateless capability objects.
 */

import { Value } from './types.js';

export type DialectName = 'postgres' | 'sqlite';

export interface SqlFragment {
  readonly sql: string;
  readonly params: Value[];
}

export interface Dialect {
  readonly name: DialectName;
  /** Placeholder for the 1-based parameter `index`. */
  param(index: number): string;
  boolLiteral(value: boolean): string;
  regexOperator(): string;
  inClause(field: string, values: readonly Value[], startIndex: number): SqlFragment;
  notInClause(field: string, values: readonly Value[], startIndex: number): SqlFragment;
  supportsILike(): boolean;
  startsWithClause(field: string, index: number): string;
  endsWithClause(field: string, index: number): string;
  containsClause(field: string, index: number): string;
}

// ============================================================================
// Postgres
// ============================================================================

/**
 * Postgres: `$N` placeholders; IN lists bind the whole array as one parameter.
 */
export const Postgres: Dialect = Object.freeze({
  name: 'postgres',
  param: (index: number) => `$${String(index)}`,
  boolLiteral: (value: boolean) => (value ? 'TRUE' : 'FALSE'),
  regexOperator: () => '~',
  inClause: (field: string, values: readonly Value[], startIndex: number) => ({
    sql: `${field} = ANY($${String(startIndex)})`,
    params: [Value.array(values)],
  }),
  notInClause: (field: string, values: readonly Value[], startIndex: number) => ({
    sql: `${field} != ALL($${String(startIndex)})`,
    params: [Value.array(values)],
  }),
  supportsILike: () => true,
  startsWithClause: (field: string, index: number) => `${field} LIKE $${String(index)} || '%'`,
  endsWithClause: (field: string, index: number) => `${field} LIKE '%' || $${String(index)}`,
  containsClause: (field: string, index: number) =>
    `${field} LIKE '%' || $${String(index)} || '%'`,
});

// ============================================================================
// SQLite
// ============================================================================

function expandedList(values: readonly Value[], startIndex: number): string {
  return values.map((_, i) => `?${String(startIndex + i)}`).join(', ');
}

/**
 * SQLite: `?N` placeholders; IN lists expand to one placeholder per element.
 *
 * SQLite has no ILIKE and no regex operator. Both fall back to LIKE, which is
 * case-insensitive for ASCII only and knows nothing of regex syntax.
 */
export const Sqlite: Dialect = Object.freeze({
  name: 'sqlite',
  param: (index: number) => `?${String(index)}`,
  boolLiteral: (value: boolean) => (value ? '1' : '0'),
  regexOperator: () => 'LIKE',
  inClause: (field: string, values: readonly Value[], startIndex: number) => ({
    sql: `${field} IN (${expandedList(values, startIndex)})`,
    params: [...values],
  }),
  notInClause: (field: string, values: readonly Value[], startIndex: number) => ({
    sql: `${field} NOT IN (${expandedList(values, startIndex)})`,
    params: [...values],
  }),
  supportsILike: () => false,
  startsWithClause: (field: string, index: number) => `${field} LIKE ?${String(index)} || '%'`,
  endsWithClause: (field: string, index: number) => `${field} LIKE '%' || ?${String(index)}`,
  containsClause: (field: string, index: number) =>
    `${field} LIKE '%' || ?${String(index)} || '%'`,
});

const DIALECTS: Readonly<Record<DialectName, Dialect>> = Object.freeze({
  postgres: Postgres,
  sqlite: Sqlite,
});

export function getDialect(name: DialectName): Dialect {
  return DIALECTS[name];
}
