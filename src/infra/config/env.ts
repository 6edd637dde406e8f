/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

const OperatorSchema = Type.Union([
  Type.Literal('eq'),
  Type.Literal('ne'),
  Type.Literal('gt'),
  Type.Literal('gte'),
  Type.Literal('lt'),
  Type.Literal('lte'),
  Type.Literal('in'),
  Type.Literal('notIn'),
  Type.Literal('like'),
  Type.Literal('ilike'),
  Type.Literal('regex'),
  Type.Literal('startsWith'),
  Type.Literal('endsWith'),
  Type.Literal('contains'),
  Type.Literal('between'),
]);

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // SQL generation
  SQL_DIALECT: Type.Union([Type.Literal('postgres'), Type.Literal('sqlite')], {
    default: 'postgres',
  }),

  // Untrusted filters
  FILTER_MAX_DEPTH: Type.Integer({ default: 5, minimum: 1, maximum: 32 }),
  /** Comma-separated; empty allows every field */
  FILTER_ALLOWED_FIELDS: Type.Array(Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$' })),
  /** Comma-separated operator names */
  FILTER_DENIED_OPERATORS: Type.Array(OperatorSchema),

  // Pagination
  PAGE_SIZE_DEFAULT: Type.Integer({ default: 20, minimum: 1 }),
  PAGE_SIZE_MAX: Type.Integer({ default: 100, minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

const parseList = (value: string | undefined, fallback: string[]): string[] =>
  value != null
    ? value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    SQL_DIALECT: env['SQL_DIALECT'] ?? 'postgres',
    FILTER_MAX_DEPTH: parseInteger(env['FILTER_MAX_DEPTH'], 5),
    FILTER_ALLOWED_FIELDS: parseList(env['FILTER_ALLOWED_FIELDS'], []),
    FILTER_DENIED_OPERATORS: parseList(env['FILTER_DENIED_OPERATORS'], ['regex']),
    PAGE_SIZE_DEFAULT: parseInteger(env['PAGE_SIZE_DEFAULT'], 20),
    PAGE_SIZE_MAX: parseInteger(env['PAGE_SIZE_MAX'], 100),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.PAGE_SIZE_DEFAULT > rawEnv.PAGE_SIZE_MAX) {
    throw new Error(
      'Invalid environment configuration: PAGE_SIZE_DEFAULT must not exceed PAGE_SIZE_MAX'
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  env: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  sql: {
    dialect: env.SQL_DIALECT,
  },
  filters: {
    /** Fields clients may filter on; empty allows all */
    allowedFields: env.FILTER_ALLOWED_FIELDS,
    deniedOperators: env.FILTER_DENIED_OPERATORS,
    maxDepth: env.FILTER_MAX_DEPTH,
  },
  pagination: {
    defaultPageSize: env.PAGE_SIZE_DEFAULT,
    maxPageSize: env.PAGE_SIZE_MAX,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
