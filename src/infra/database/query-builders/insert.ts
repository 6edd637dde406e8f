/**
 * INSERT Builder
 *
 * `INSERT INTO t (cols) VALUES (...), (...) [RETURNING ...]`
 */

import { assertValidSqlIdentifiers } from './identifiers.js';
import { StatementBuilder, type BuilderOptions } from './statement-builder.js';

import type { Dialect } from './dialect.js';
import type { QueryResult, Value } from './types.js';

export class InsertBuilder extends StatementBuilder {
  private columnNames: string[] = [];
  private readonly rows: (readonly Value[])[] = [];
  private returningColumns: string[] = [];

  constructor(dialect: Dialect, table: string, options: BuilderOptions = {}) {
    super(dialect, table, 'insert', options);
  }

  columns(columns: readonly string[]): this {
    this.assertUsable('columns');
    assertValidSqlIdentifiers(columns, 'insert column');
    this.columnNames = [...columns];
    return this;
  }

  /** Adds one row. Values are matched to columns by position. */
  values(row: readonly Value[]): this {
    this.assertUsable('values');
    this.rows.push([...row]);
    return this;
  }

  valuesMany(rows: readonly (readonly Value[])[]): this {
    this.assertUsable('valuesMany');
    for (const row of rows) {
      this.rows.push([...row]);
    }
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

    if (this.columnNames.length === 0 || this.rows.length === 0) {
      throw new Error(`INSERT into '${this.table}' needs at least one column and one row`);
    }

    const params: Value[] = [];
    let idx = startIndex;
    const groups = this.rows.map((row, rowIndex) => {
      if (row.length !== this.columnNames.length) {
        throw new Error(
          `INSERT row ${String(rowIndex)} has ${String(row.length)} values ` +
            `for ${String(this.columnNames.length)} columns`
        );
      }
      const placeholders = row.map((value) => {
        params.push(value);
        return this.dialect.param(idx++);
      });
      return `(${placeholders.join(', ')})`;
    });

    const columnList = this.columnNames.join(', ');
    let sql = `INSERT INTO ${this.table} (${columnList}) VALUES ${groups.join(', ')}`;
    if (this.returningColumns.length > 0) {
      sql += ` RETURNING ${this.returningColumns.join(', ')}`;
    }

    return this.finish(sql, params);
  }
}

export const insertInto = (
  dialect: Dialect,
  table: string,
  options?: BuilderOptions
): InsertBuilder => new InsertBuilder(dialect, table, options);
