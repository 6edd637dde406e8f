/**
 * DELETE Builder
 *
 * A DELETE without conditions removes every row; nothing here stops that.
 */

import { compileWhere } from './conditions.js';
import { assertValidSqlIdentifier, assertValidSqlIdentifiers } from './identifiers.js';
import { StatementBuilder, type BuilderOptions } from './statement-builder.js';
import { simple } from './types.js';

import type { Dialect } from './dialect.js';
import type { FilterExpr, Operator, QueryResult, Value } from './types.js';

export class DeleteBuilder extends StatementBuilder {
  private readonly filters: FilterExpr[] = [];
  private expr: FilterExpr | undefined;
  private returningColumns: string[] = [];

  constructor(dialect: Dialect, table: string, options: BuilderOptions = {}) {
    super(dialect, table, 'delete', options);
  }

  filter(field: string, op: Operator, value: Value): this {
    this.assertUsable('filter');
    assertValidSqlIdentifier(field, 'filter field');
    this.filters.push(simple(field, op, value));
    return this;
  }

  filterExpr(expr: FilterExpr): this {
    this.assertUsable('filterExpr');
    this.assertFilterFields(expr, 'filter field');
    this.expr = expr;
    return this;
  }

  returning(columns: readonly string[]): this {
    this.assertUsable('returning');
    assertValidSqlIdentifiers(columns, 'returning column');
    this.returningColumns = [...columns];
    return this;
  }

  build(startIndex = 1): QueryResult {
    this.beginBuild(startIndex);

    let sql = `DELETE FROM ${this.table}`;
    const params: Value[] = [];

    const conditions = this.expr === undefined ? this.filters : [this.expr, ...this.filters];
    const where = compileWhere(this.dialect, conditions, startIndex);
    if (where !== undefined) {
      sql += ` WHERE ${where.sql}`;
      params.push(...where.params);
    }

    if (this.returningColumns.length > 0) {
      sql += ` RETURNING ${this.returningColumns.join(', ')}`;
    }

    return this.finish(sql, params);
  }
}

export const deleteFrom = (
  dialect: Dialect,
  table: string,
  options?: BuilderOptions
): DeleteBuilder => new DeleteBuilder(dialect, table, options);
