/**
 * Dialect-bound builder factories.
 *
 * @example
 * ```typescript
 * const sql = forDialect(Sqlite, { logger });
 * sql.insert('users').columns(['name']).values([Value.string('Alice')]).build();
 * // INSERT INTO users (name) VALUES (?1)
 * ```
 */

import { DeleteBuilder } from './delete.js';
import { InsertBuilder } from './insert.js';
import { SelectBuilder } from './select.js';
import { UpdateBuilder } from './update.js';

import type { Dialect } from './dialect.js';
import type { BuilderOptions } from './statement-builder.js';

export interface StatementFactories {
  readonly dialect: Dialect;
  select(table: string): SelectBuilder;
  insert(table: string): InsertBuilder;
  update(table: string): UpdateBuilder;
  delete(table: string): DeleteBuilder;
}

export const forDialect = (dialect: Dialect, options: BuilderOptions = {}): StatementFactories => ({
  dialect,
  select: (table) => new SelectBuilder(dialect, table, options),
  insert: (table) => new InsertBuilder(dialect, table, options),
  update: (table) => new UpdateBuilder(dialect, table, options),
  delete: (table) => new DeleteBuilder(dialect, table, options),
});
