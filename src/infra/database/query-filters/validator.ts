/**
 * Filter Validator
 *
 * Gatekeeper for filters that come from clients. A filter tree produced by
 * parseFilter() must pass here before it reaches a statement builder:
 * - field whitelist (empty whitelist allows every field)
 * - operator blacklist (regex by default)
 * - nesting depth of compound expressions and array values
 * - total number of array elements
 *
 * Field names that pass the whitelist are still validated as identifiers by the
 * builders.
 */

import { ok, err, type Result } from 'neverthrow';

import { and } from '../query-builders/types.js';

import {
  createFieldNotAllowedError,
  createNestingTooDeepError,
  createOperatorDeniedError,
  createTooManyNodesError,
  type FilterValidationError,
} from './errors.js';

import type { Filter, FilterExpr, Operator, Value } from '../query-builders/types.js';
import type { Logger } from 'pino';

export const MAX_VALUE_NODES = 10_000;
export const DEFAULT_MAX_DEPTH = 5;
export const DEFAULT_DENIED_OPERATORS: readonly Operator[] = Object.freeze(['regex'] as const);

export interface FilterValidatorOptions {
  /** Fields clients may filter on. Empty allows all. */
  allowedFields?: readonly string[];
  /** Defaults to `['regex']`. */
  deniedOperators?: readonly Operator[];
  maxDepth?: number;
  logger?: Logger;
}

export interface FilterValidator {
  readonly allowedFields: readonly string[];
  readonly deniedOperators: readonly Operator[];
  readonly maxDepth: number;
  validate(filter: Filter): Result<void, FilterValidationError>;
  /** Validates every filter in a tree. Compound nesting counts toward depth. */
  validateExpr(expr: FilterExpr): Result<void, FilterValidationError>;
}

/** Shared across one validation call. */
interface NodeBudget {
  count: number;
}

export const createFilterValidator = (options: FilterValidatorOptions = {}): FilterValidator => {
  const allowedFields = Object.freeze([...(options.allowedFields ?? [])]);
  const deniedOperators = Object.freeze([
    ...(options.deniedOperators ?? DEFAULT_DENIED_OPERATORS),
  ]);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const log = options.logger?.child({ component: 'FilterValidator' });

  const checkDepth = (depth: number): Result<void, FilterValidationError> =>
    depth > maxDepth ? err(createNestingTooDeepError(maxDepth, depth)) : ok(undefined);

  // Conditions, compound nodes and array elements all draw on the budget.
  const charge = (budget: NodeBudget): Result<void, FilterValidationError> => {
    budget.count += 1;
    return budget.count > MAX_VALUE_NODES
      ? err(createTooManyNodesError(MAX_VALUE_NODES))
      : ok(undefined);
  };

  const walkValue = (
    value: Value,
    depth: number,
    budget: NodeBudget
  ): Result<void, FilterValidationError> => {
    const charged = charge(budget);
    if (charged.isErr()) return charged;

    const depthCheck = checkDepth(depth);
    if (depthCheck.isErr()) return depthCheck;

    if (value.kind === 'array') {
      for (const item of value.items) {
        const result = walkValue(item, depth + 1, budget);
        if (result.isErr()) return result;
      }
    }
    return ok(undefined);
  };

  const checkFilter = (
    filter: Filter,
    depth: number,
    budget: NodeBudget
  ): Result<void, FilterValidationError> => {
    const charged = charge(budget);
    if (charged.isErr()) return charged;

    const depthCheck = checkDepth(depth);
    if (depthCheck.isErr()) return depthCheck;

    if (allowedFields.length > 0 && !allowedFields.includes(filter.field)) {
      return err(createFieldNotAllowedError(filter.field, allowedFields));
    }

    if (deniedOperators.includes(filter.op)) {
      return err(createOperatorDeniedError(filter.op, filter.field));
    }

    if (filter.value.kind === 'array') {
      for (const item of filter.value.items) {
        const result = walkValue(item, depth + 1, budget);
        if (result.isErr()) return result;
      }
    }
    return ok(undefined);
  };

  const checkExpr = (
    expr: FilterExpr,
    depth: number,
    budget: NodeBudget
  ): Result<void, FilterValidationError> => {
    if (expr.kind === 'simple') {
      return checkFilter(expr.filter, depth, budget);
    }

    const charged = charge(budget);
    if (charged.isErr()) return charged;

    const depthCheck = checkDepth(depth);
    if (depthCheck.isErr()) return depthCheck;

    for (const child of expr.filters) {
      const result = checkExpr(child, depth + 1, budget);
      if (result.isErr()) return result;
    }
    return ok(undefined);
  };

  const report = (
    result: Result<void, FilterValidationError>
  ): Result<void, FilterValidationError> => {
    if (result.isErr()) {
      log?.debug({ error: result.error }, 'Filter rejected');
    }
    return result;
  };

  return {
    allowedFields,
    deniedOperators,
    maxDepth,
    validate: (filter) => report(checkFilter(filter, 0, { count: 0 })),
    validateExpr: (expr) => report(checkExpr(expr, 0, { count: 0 })),
  };
};

/**
 * A validator that denies no operator and allows every field. Depth and size
 * limits still apply. Only for filters that do not come from clients.
 */
export const permissiveFilterValidator = (logger?: Logger): FilterValidator =>
  createFilterValidator({ deniedOperators: [], ...(logger !== undefined ? { logger } : {}) });

/**
 * Validates the user filters and appends them after the trusted ones.
 */
export function mergeFilters(
  trusted: readonly Filter[],
  user: readonly Filter[],
  validator: FilterValidator
): Result<Filter[], FilterValidationError> {
  for (const filter of user) {
    const result = validator.validate(filter);
    if (result.isErr()) return err(result.error);
  }
  return ok([...trusted, ...user]);
}

/**
 * Tree variant of mergeFilters(): ANDs the trusted expressions with the
 * validated user expression. Undefined when there is nothing to combine.
 *
 * @example
 * ```typescript
 * mergeFilterExprs([simple('tenant_id', 'eq', Value.int(7))], userExpr, validator);
 * // ok(and([tenant_id = 7, userExpr]))
 * ```
 */
export function mergeFilterExprs(
  trusted: readonly FilterExpr[],
  user: FilterExpr | undefined,
  validator: FilterValidator
): Result<FilterExpr | undefined, FilterValidationError> {
  if (user !== undefined) {
    const result = validator.validateExpr(user);
    if (result.isErr()) return err(result.error);
  }

  const parts = user === undefined ? [...trusted] : [...trusted, user];
  const [only] = parts;
  if (parts.length <= 1) {
    return ok(only);
  }
  return ok(and(parts));
}
