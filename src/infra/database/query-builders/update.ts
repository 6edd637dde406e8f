/**
 * UPDATE Builder
 *
 * SET parameters are numbered first, WHERE parameters after them.
 */

import { compileWhere } from './conditions.js';
import { assertValidSqlIdentifier, assertValidSqlIdentifiers } from './identifiers.js';
import { StatementBuilder, type BuilderOptions } from './statement-builder.js';
import { simple } from './types.js';

import type { Dialect } from './dialect.js';
import type { FilterExpr, Operator, QueryResult, Value } from './types.js';

export class UpdateBuilder extends StatementBuilder {
  private readonly assignments: (readonly [string, Value])[] = [];
  private readonly filters: FilterExpr[] = [];
  private expr: FilterExpr | undefined;
  private returningColumns: string[] = [];

  constructor(dialect: Dialect, table: string, options: BuilderOptions = {}) {
    super(dialect, table, 'update', options);
  }

  set(column: string, value: Value): this {
    this.assertUsable('set');
    assertValidSqlIdentifier(column, 'update column');
    this.assignments.push([column, value]);
    return this;
  }

  setMany(pairs: readonly (readonly [string, Value])[]): this {
    this.assertUsable('setMany');
    assertValidSqlIdentifiers(pairs.map(([column]) => column), 'update column');
    this.assignments.push(...pairs);
    return this;
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

    if (this.assignments.length === 0) {
      throw new Error(`UPDATE of '${this.table}' needs at least one SET column`);
    }

    const params: Value[] = [];
    let idx = startIndex;
    const setList = this.assignments.map(([column, value]) => {
      params.push(value);
      return `${column} = ${this.dialect.param(idx++)}`;
    });

    let sql = `UPDATE ${this.table} SET ${setList.join(', ')}`;

    const conditions = this.expr === undefined ? this.filters : [this.expr, ...this.filters];
    const where = compileWhere(this.dialect, conditions, idx);
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

export const update = (dialect: Dialect, table: string, options?: BuilderOptions): UpdateBuilder =>
  new UpdateBuilder(dialect, table, options);
