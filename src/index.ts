/**
 * sql-kit
 *
 * Parameterized SQL statement compiler for Postgres and SQLite, with cursor
 * pagination and validation of client-supplied filters.
 */

export * from './infra/database/query-builders/index.js';
export * from './infra/database/pagination/index.js';
export * from './infra/database/query-filters/index.js';

export {
  buildSqlKit,
  type ClientFilterError,
  type PageRequest,
  type SqlKit,
  type SqlKitDeps,
} from './app/build-sql-kit.js';
export { createConfig, parseEnv, type AppConfig, type Env } from './infra/config/env.js';
export {
  createChildLogger,
  createLogger,
  type LogLevel,
  type Logger,
  type LoggerConfig,
} from './infra/logger/index.js';
export {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  clampLimit,
  normalizePage,
  normalizePagination,
} from './common/constants/pagination.js';
