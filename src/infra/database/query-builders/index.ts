/**
 * Query Builders
 *
 * Parameterized SQL construction for Postgres and SQLite.
 *
 * SECURITY: Values only ever reach SQL as placeholders. Identifiers (tables,
 * columns, aliases) are validated when handed to a builder and rejected with
 * an exception if unsafe; computed expressions go through a keyword denylist.
 *
 * @example
 * ```typescript
 * import { postgres, simple, Value } from '@/infra/database/query-builders/index.js';
 *
 * const { sql, params } = postgres('orders')
 *   .fields(['id', 'total'])
 *   .or([simple('status', 'eq', Value.string('open')), simple('total', 'gt', Value.int(100))])
 *   .sort('id', 'desc')
 *   .limit(20)
 *   .build();
 * // SELECT id, total FROM orders WHERE (status = $1 OR total > $2) ORDER BY id DESC LIMIT 20
 * ```
 */

// ============================================================================
// Model
// ============================================================================

export {
  LOGICAL_OPS,
  OPERATORS,
  Value,
  and,
  collectFilters,
  createFilter,
  createQueryResult,
  isOperator,
  isPrimitiveValue,
  not,
  or,
  simple,
  sortField,
  toDriverValue,
  type CompoundFilterExpr,
  type ComputedField,
  type CursorDirection,
  type DriverValue,
  type Filter,
  type FilterExpr,
  type LogicalOp,
  type Operator,
  type PrimitiveValue,
  type QueryResult,
  type SimpleFilterExpr,
  type SortDir,
  type SortField,
  type ValueInput,
  type ValueKind,
} from './types.js';

export {
  Aggregate,
  aggregateToSql,
  computedField,
  computedFieldToSql,
  type AggregateFunc,
} from './aggregates.js';

// ============================================================================
// Dialects and Compilation
// ============================================================================

export {
  Postgres,
  Sqlite,
  getDialect,
  type Dialect,
  type DialectName,
  type SqlFragment,
} from './dialect.js';

export {
  compileFilter,
  compileFilterExpr,
  compileWhere,
  type CompiledCondition,
} from './conditions.js';

// ============================================================================
// Identifier and Expression Validation
// ============================================================================

export {
  MAX_IDENTIFIER_LENGTH,
  assertValidSqlIdentifier,
  assertValidSqlIdentifiers,
  isValidSqlIdentifier,
} from './identifiers.js';

export {
  MAX_EXPRESSION_LENGTH,
  assertValidSqlExpression,
  containsSqlKeyword,
  isValidSqlExpression,
} from './expressions.js';

// ============================================================================
// Statement Builders
// ============================================================================

export { StatementBuilder, type BuilderOptions } from './statement-builder.js';
export {
  MAX_LIMIT_OFFSET,
  SelectBuilder,
  postgres,
  selectFrom,
  sqlite,
  type CursorInput,
} from './select.js';
export { InsertBuilder, insertInto } from './insert.js';
export { UpdateBuilder, update } from './update.js';
export { DeleteBuilder, deleteFrom } from './delete.js';
export { forDialect, type StatementFactories } from './factory.js';
