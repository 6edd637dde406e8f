/**
 * SQL kit factory
 * Wires configuration and logging into dialect-bound builders, the client
 * filter pipeline and page-size clamping.
 */

import { normalizePagination } from '../common/constants/pagination.js';
import { getDialect, type Dialect } from '../infra/database/query-builders/dialect.js';
import { forDialect } from '../infra/database/query-builders/factory.js';
import { parseFilter as parseFilterTree } from '../infra/database/query-filters/parser.js';
import {
  createFilterValidator,
  type FilterValidator,
} from '../infra/database/query-filters/validator.js';

import type { AppConfig } from '../infra/config/env.js';
import type { DeleteBuilder } from '../infra/database/query-builders/delete.js';
import type { InsertBuilder } from '../infra/database/query-builders/insert.js';
import type { SelectBuilder } from '../infra/database/query-builders/select.js';
import type { FilterExpr } from '../infra/database/query-builders/types.js';
import type { UpdateBuilder } from '../infra/database/query-builders/update.js';
import type {
  FilterParseError,
  FilterValidationError,
} from '../infra/database/query-filters/errors.js';
import type { Logger } from 'pino';
import type { Result } from 'neverthrow';

/**
 * SQL kit dependencies
 */
export interface SqlKitDeps {
  config: AppConfig;
  logger: Logger;
}

/** Anything that can go wrong with a filter sent by a client. */
export type ClientFilterError = FilterParseError | FilterValidationError;

export interface PageRequest {
  page?: number | null | undefined;
  limit?: number | null | undefined;
}

export interface SqlKit {
  readonly dialect: Dialect;
  select(table: string): SelectBuilder;
  insert(table: string): InsertBuilder;
  update(table: string): UpdateBuilder;
  delete(table: string): DeleteBuilder;
  /** Validator built from the FILTER_* settings. */
  readonly validator: FilterValidator;
  /** Parses a client filter tree and validates it against the configured validator. */
  parseFilter(input: unknown): Result<FilterExpr, ClientFilterError>;
  /** Applies page pagination with the limit clamped to the configured page sizes. */
  paginate(builder: SelectBuilder, request: PageRequest): SelectBuilder;
}

export const buildSqlKit = (deps: SqlKitDeps): SqlKit => {
  const { config } = deps;
  const log = deps.logger.child({ component: 'SqlKit' });

  const dialect = getDialect(config.sql.dialect);
  const factories = forDialect(dialect, { logger: log });
  const validator = createFilterValidator({
    allowedFields: config.filters.allowedFields,
    deniedOperators: config.filters.deniedOperators,
    maxDepth: config.filters.maxDepth,
    logger: log,
  });

  log.debug(
    {
      dialect: dialect.name,
      allowedFields: config.filters.allowedFields.length,
      deniedOperators: config.filters.deniedOperators,
    },
    'SQL kit initialized'
  );

  return {
    dialect,
    select: factories.select,
    insert: factories.insert,
    update: factories.update,
    delete: factories.delete,
    validator,
    parseFilter: (input) =>
      parseFilterTree(input).andThen((expr) =>
        validator.validateExpr(expr).map(() => expr)
      ),
    paginate: (builder, request) => {
      const { page, limit } = normalizePagination(request, config.pagination);
      return builder.page(page, limit);
    },
  };
};
