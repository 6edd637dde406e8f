/**
 * Query Filters
 *
 * Untrusted filter input: parsing client JSON into filter trees, validating
 * those trees against whitelists and limits, and parsing sort parameters.
 *
 * Usage:
 * ```ts
 * import { createFilterValidator, parseFilterJson } from '@/infra/database/query-filters/index.js';
 *
 * const validator = createFilterValidator({ allowedFields: ['name', 'status'] });
 * const filter = parseFilterJson(body).andThen((expr) =>
 *   validator.validateExpr(expr).map(() => expr)
 * );
 * ```
 */

// ============================================================================
// Errors
// ============================================================================

export {
  createEmptyFieldNameError,
  createEmptyFilterError,
  createExpectedArrayError,
  createExpectedObjectError,
  createExpectedValueError,
  createFieldNotAllowedError,
  createInvalidOperatorValueError,
  createInvalidSortFieldError,
  createInvalidSourceError,
  createNestingTooDeepError,
  createNotRequiresOneConditionError,
  createOperatorDeniedError,
  createSortFieldNotAllowedError,
  createSourceTooDeepError,
  createTooManyNodesError,
  createUnknownOperatorError,
  type EmptyFieldNameError,
  type EmptyFilterError,
  type ExpectedArrayError,
  type ExpectedObjectError,
  type ExpectedValueError,
  type FieldNotAllowedError,
  type FilterParseError,
  type FilterValidationError,
  type InvalidOperatorValueError,
  type InvalidSortFieldError,
  type InvalidSourceError,
  type NestingTooDeepError,
  type NotRequiresOneConditionError,
  type OperatorDeniedError,
  type SortFieldNotAllowedError,
  type SortParseError,
  type TooManyNodesError,
  type UnknownOperatorError,
} from './errors.js';

// ============================================================================
// Validation
// ============================================================================

export {
  DEFAULT_DENIED_OPERATORS,
  DEFAULT_MAX_DEPTH,
  MAX_VALUE_NODES,
  createFilterValidator,
  mergeFilterExprs,
  mergeFilters,
  permissiveFilterValidator,
  type FilterValidator,
  type FilterValidatorOptions,
} from './validator.js';

// ============================================================================
// Parsing
// ============================================================================

export { operatorFromSigil, parseFilter, parseFilterJson } from './parser.js';
export { parseSortString } from './sort.js';
