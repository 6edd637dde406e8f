/**
 * Statement Builder Base
 *
 * Shared plumbing for the SELECT/INSERT/UPDATE/DELETE builders: table
 * validation, the single-use guard and logging of built statements.
 */

import { assertValidSqlIdentifier, assertValidSqlIdentifiers } from './identifiers.js';
import { collectFilters, createQueryResult } from './types.js';

import type { Dialect } from './dialect.js';
import type { FilterExpr, QueryResult, Value } from './types.js';
import type { Logger } from 'pino';

/**
 * Options shared by all statement builders.
 */
export interface BuilderOptions {
  /** Receives a trace entry per built statement and debug entries for ignored input. */
  logger?: Logger;
}

export abstract class StatementBuilder {
  protected readonly log: Logger | undefined;
  private consumed = false;

  protected constructor(
    protected readonly dialect: Dialect,
    protected readonly table: string,
    private readonly kind: string,
    options: BuilderOptions
  ) {
    assertValidSqlIdentifier(table, 'table');
    this.log = options.logger?.child({ builder: kind, table });
  }

  /**
   * Compiles the statement. Placeholders are numbered from `startIndex`, so the
   * result can be embedded after other parameterized SQL.
   */
  abstract build(startIndex?: number): QueryResult;

  /** Throws once the builder has been consumed by build(). */
  protected assertUsable(method: string): void {
    if (this.consumed) {
      throw new Error(
        `${this.kind} builder for '${this.table}' was already built; ${method}() is not allowed`
      );
    }
  }

  private assertStartIndex(startIndex: number): void {
    if (!Number.isSafeInteger(startIndex) || startIndex < 1) {
      throw new Error(
        `Parameter start index must be a positive integer, got ${String(startIndex)}`
      );
    }
  }

  /** Validates every field referenced by a filter tree. */
  protected assertFilterFields(expr: FilterExpr, context: string): void {
    assertValidSqlIdentifiers(collectFilters(expr).map((filter) => filter.field), context);
  }

  /** Call first in build(). */
  protected beginBuild(startIndex: number): void {
    this.assertUsable('build');
    this.assertStartIndex(startIndex);
  }

  protected finish(sql: string, params: readonly Value[]): QueryResult {
    this.consumed = true;
    this.log?.trace({ sql, paramCount: params.length }, 'Built SQL statement');
    return createQueryResult(sql, params);
  }
}
