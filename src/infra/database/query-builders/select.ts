/**
 * SELECT Builder
 *
 * Clause order:
 *   SELECT <fields, computed, aggregates | *> FROM <table>
 *   [WHERE <filter expr> AND <filters> AND <cursor seek>]
 *   [GROUP BY] [HAVING] [ORDER BY] [LIMIT] [OFFSET]
 *
 * @example
 * ```typescript
 * const { sql, params } = postgres('users')
 *   .fields(['id', 'name'])
 *   .filter('active', 'eq', Value.bool(true))
 *   .sort('id', 'asc')
 *   .limit(10)
 *   .build();
 * // sql: 'SELECT id, name FROM users WHERE active = $1 ORDER BY id ASC LIMIT 10'
 * ```
 */

import { Cursor } from '../pagination/cursor.js';
import { KeysetCondition } from '../pagination/keyset.js';

import { Aggregate, aggregateToSql, computedField, computedFieldToSql } from './aggregates.js';
import { compileFilterExpr, compileWhere } from './conditions.js';
import { Postgres, Sqlite } from './dialect.js';
import {
  assertValidSqlIdentifier,
  assertValidSqlIdentifiers,
  isValidSqlIdentifier,
} from './identifiers.js';
import { StatementBuilder, type BuilderOptions } from './statement-builder.js';
import { and, or, simple, sortField } from './types.js';

import type { Dialect } from './dialect.js';
import type {
  ComputedField,
  CursorDirection,
  FilterExpr,
  Operator,
  QueryResult,
  SortDir,
  SortField,
  Value,
} from './types.js';

/** LIMIT and OFFSET are unsigned 32-bit. */
export const MAX_LIMIT_OFFSET = 2 ** 32 - 1;

/** Loose cursor input, e.g. straight from a query string. */
export type CursorInput = Cursor | string | null | undefined;

interface CursorState {
  readonly cursor: Cursor;
  readonly direction: CursorDirection;
}

function assertUint32(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_LIMIT_OFFSET) {
    throw new Error(`${name} must be an integer between 0 and ${String(MAX_LIMIT_OFFSET)}`);
  }
}

export class SelectBuilder extends StatementBuilder {
  private selectFields: string[] = [];
  private readonly computedFields: ComputedField[] = [];
  private readonly aggregates: Aggregate[] = [];
  private readonly filters: FilterExpr[] = [];
  private expr: FilterExpr | undefined;
  private groupFields: string[] = [];
  private havingExpr: FilterExpr | undefined;
  private readonly sortFields: SortField[] = [];
  private limitValue: number | undefined;
  private offsetValue: number | undefined;
  private cursorState: CursorState | undefined;

  constructor(dialect: Dialect, table: string, options: BuilderOptions = {}) {
    super(dialect, table, 'select', options);
  }

  // ==========================================================================
  // Select list
  // ==========================================================================

  /** Sets the selected columns, replacing any set before. */
  fields(fields: readonly string[]): this {
    this.assertUsable('fields');
    assertValidSqlIdentifiers(fields, 'select field');
    this.selectFields = [...fields];
    return this;
  }

  /**
   * Adds `(expression) AS alias`. The expression is checked against the
   * computed-field denylist; only pass expressions written in code.
   */
  computed(alias: string, expression: string): this {
    this.assertUsable('computed');
    this.computedFields.push(computedField(alias, expression));
    return this;
  }

  aggregate(aggregate: Aggregate): this {
    this.assertUsable('aggregate');
    if (aggregate.field !== undefined) {
      assertValidSqlIdentifier(aggregate.field, 'aggregate field');
    }
    if (aggregate.alias !== undefined) {
      assertValidSqlIdentifier(aggregate.alias, 'aggregate alias');
    }
    this.aggregates.push(aggregate);
    return this;
  }

  /** Adds `COUNT(*) AS count`. */
  count(): this {
    return this.aggregate(Aggregate.count());
  }

  sum(field: string): this {
    return this.aggregate(Aggregate.sum(field));
  }

  avg(field: string): this {
    return this.aggregate(Aggregate.avg(field));
  }

  min(field: string): this {
    return this.aggregate(Aggregate.min(field));
  }

  max(field: string): this {
    return this.aggregate(Aggregate.max(field));
  }

  // ==========================================================================
  // Filtering
  // ==========================================================================

  /** Adds a condition, ANDed with everything else in WHERE. */
  filter(field: string, op: Operator, value: Value): this {
    this.assertUsable('filter');
    assertValidSqlIdentifier(field, 'filter field');
    this.filters.push(simple(field, op, value));
    return this;
  }

  /**
   * Sets the filter tree. Replaces a tree set earlier by filterExpr(), and()
   * or or(); conditions added with filter() are kept.
   */
  filterExpr(expr: FilterExpr): this {
    this.assertUsable('filterExpr');
    this.assertFilterFields(expr, 'filter field');
    this.expr = expr;
    return this;
  }

  and(filters: readonly FilterExpr[]): this {
    return this.filterExpr(and(filters));
  }

  or(filters: readonly FilterExpr[]): this {
    return this.filterExpr(or(filters));
  }

  // ==========================================================================
  // Grouping and ordering
  // ==========================================================================

  groupBy(fields: readonly string[]): this {
    this.assertUsable('groupBy');
    assertValidSqlIdentifiers(fields, 'group by field');
    this.groupFields = [...fields];
    return this;
  }

  having(expr: FilterExpr): this {
    this.assertUsable('having');
    this.assertFilterFields(expr, 'having field');
    this.havingExpr = expr;
    return this;
  }

  sort(field: string, dir: SortDir = 'asc'): this {
    this.assertUsable('sort');
    assertValidSqlIdentifier(field, 'sort field');
    this.sortFields.push(sortField(field, dir));
    return this;
  }

  /** Appends sort fields, e.g. the output of parseSortString(). */
  sorts(sorts: readonly SortField[]): this {
    this.assertUsable('sorts');
    assertValidSqlIdentifiers(sorts.map((sort) => sort.field), 'sort field');
    this.sortFields.push(...sorts);
    return this;
  }

  // ==========================================================================
  // Pagination
  // ==========================================================================

  /**
   * 1-based page pagination. Page 0 is treated as page 1; the offset saturates
   * at 2^32 - 1.
   */
  page(page: number, limit: number): this {
    this.assertUsable('page');
    assertUint32(page, 'page');
    assertUint32(limit, 'limit');
    this.limitValue = limit;
    this.offsetValue = Math.min(Math.max(page - 1, 0) * limit, MAX_LIMIT_OFFSET);
    return this;
  }

  limitOffset(limit: number, offset: number): this {
    this.assertUsable('limitOffset');
    assertUint32(limit, 'limit');
    assertUint32(offset, 'offset');
    this.limitValue = limit;
    this.offsetValue = offset;
    return this;
  }

  limit(limit: number): this {
    this.assertUsable('limit');
    assertUint32(limit, 'limit');
    this.limitValue = limit;
    return this;
  }

  /**
   * Seeks past the given cursor. Missing, empty and undecodable cursors are
   * ignored, so a raw query-string value can be passed straight through.
   */
  afterCursor(input: CursorInput): this {
    return this.setCursor(input, 'after', 'afterCursor');
  }

  beforeCursor(input: CursorInput): this {
    return this.setCursor(input, 'before', 'beforeCursor');
  }

  private setCursor(input: CursorInput, direction: CursorDirection, method: string): this {
    this.assertUsable(method);
    const cursor = this.resolveCursor(input, direction);
    if (cursor !== undefined) {
      this.cursorState = { cursor, direction };
    }
    return this;
  }

  private resolveCursor(input: CursorInput, direction: CursorDirection): Cursor | undefined {
    if (input === null || input === undefined) {
      return undefined;
    }
    if (typeof input !== 'string') {
      return input.isEmpty ? undefined : input;
    }
    return Cursor.decode(input).match(
      (cursor) => (cursor.isEmpty ? undefined : cursor),
      (error) => {
        this.log?.debug({ direction, error: error.type }, 'Ignoring undecodable cursor');
        return undefined;
      }
    );
  }

  /**
   * Keyset predicate for the current cursor. Falls back to the cursor's own
   * fields in ascending order when no sort is set.
   */
  private cursorCondition(): FilterExpr | undefined {
    if (this.cursorState === undefined) {
      return undefined;
    }
    const { cursor, direction } = this.cursorState;

    const sorts =
      this.sortFields.length > 0
        ? this.sortFields
        : cursor.fields.map(([name]) => sortField(name, 'asc'));

    // Cursor field names come from the client.
    if (!sorts.every((sort) => isValidSqlIdentifier(sort.field))) {
      this.log?.debug({ direction }, 'Ignoring cursor with invalid field names');
      return undefined;
    }

    const condition =
      direction === 'after'
        ? KeysetCondition.after(sorts, cursor)
        : KeysetCondition.before(sorts, cursor);

    if (condition === undefined) {
      this.log?.debug({ direction }, 'Ignoring cursor that does not cover the sort fields');
      return undefined;
    }
    return condition.toFilterExpr();
  }

  // ==========================================================================
  // Build
  // ==========================================================================

  build(startIndex = 1): QueryResult {
    this.beginBuild(startIndex);

    const selectList = [
      ...this.selectFields,
      ...this.computedFields.map(computedFieldToSql),
      ...this.aggregates.map(aggregateToSql),
    ];
    let sql = `SELECT ${selectList.length > 0 ? selectList.join(', ') : '*'} FROM ${this.table}`;
    const params: Value[] = [];
    let idx = startIndex;

    const conditions: FilterExpr[] = [];
    if (this.expr !== undefined) {
      conditions.push(this.expr);
    }
    conditions.push(...this.filters);
    const seek = this.cursorCondition();
    if (seek !== undefined) {
      conditions.push(seek);
    }

    const where = compileWhere(this.dialect, conditions, idx);
    if (where !== undefined) {
      sql += ` WHERE ${where.sql}`;
      params.push(...where.params);
      idx = where.nextIndex;
    }

    if (this.groupFields.length > 0) {
      sql += ` GROUP BY ${this.groupFields.join(', ')}`;
    }

    if (this.havingExpr !== undefined) {
      const having = compileFilterExpr(this.dialect, this.havingExpr, idx);
      sql += ` HAVING ${having.sql}`;
      params.push(...having.params);
    }

    if (this.sortFields.length > 0) {
      const orderBy = this.sortFields.map((sort) => `${sort.field} ${sort.dir.toUpperCase()}`);
      sql += ` ORDER BY ${orderBy.join(', ')}`;
    }

    if (this.limitValue !== undefined) {
      sql += ` LIMIT ${String(this.limitValue)}`;
    }
    // OFFSET 0 is a no-op and is left out
    if (this.offsetValue !== undefined && this.offsetValue > 0) {
      sql += ` OFFSET ${String(this.offsetValue)}`;
    }

    return this.finish(sql, params);
  }
}

/** SELECT builder for Postgres (`$N` placeholders). */
export const postgres = (table: string, options?: BuilderOptions): SelectBuilder =>
  new SelectBuilder(Postgres, table, options);

/** SELECT builder for SQLite (`?N` placeholders). */
export const sqlite = (table: string, options?: BuilderOptions): SelectBuilder =>
  new SelectBuilder(Sqlite, table, options);

export const selectFrom = (
  dialect: Dialect,
  table: string,
  options?: BuilderOptions
): SelectBuilder => new SelectBuilder(dialect, table, options);
