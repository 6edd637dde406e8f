/**
 * Query Filters - Errors
 *
 * Errors for untrusted filter and sort input. All errors are discriminated
 * unions with a 'type' field for easy matching.
 */

import type { Operator } from '../query-builders/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Validation Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface FieldNotAllowedError {
  readonly type: 'FieldNotAllowed';
  readonly message: string;
  readonly field: string;
  readonly allowed: readonly string[];
}

export interface OperatorDeniedError {
  readonly type: 'OperatorDenied';
  readonly message: string;
  readonly operator: Operator;
  readonly field: string;
}

export interface NestingTooDeepError {
  readonly type: 'NestingTooDeep';
  readonly message: string;
  readonly max: number;
  readonly actual: number;
}

/**
 * The filter tree holds too many nodes in total, counting conditions and
 * array elements.
 */
export interface TooManyNodesError {
  readonly type: 'TooManyNodes';
  readonly message: string;
  readonly max: number;
}

export type FilterValidationError =
  | FieldNotAllowedError
  | OperatorDeniedError
  | NestingTooDeepError
  | TooManyNodesError;

export const createFieldNotAllowedError = (
  field: string,
  allowed: readonly string[]
): FieldNotAllowedError => ({
  type: 'FieldNotAllowed',
  message: `Field '${field}' is not allowed, allowed fields: ${allowed.join(', ')}`,
  field,
  allowed,
});

export const createOperatorDeniedError = (
  operator: Operator,
  field: string
): OperatorDeniedError => ({
  type: 'OperatorDenied',
  message: `Operator '${operator}' is denied for field '${field}'`,
  operator,
  field,
});

export const createNestingTooDeepError = (max: number, actual: number): NestingTooDeepError => ({
  type: 'NestingTooDeep',
  message: `Filter nesting depth ${String(actual)} exceeds maximum ${String(max)}`,
  max,
  actual,
});

export const createTooManyNodesError = (max: number): TooManyNodesError => ({
  type: 'TooManyNodes',
  message: `Filter contains too many nodes (max ${String(max)})`,
  max,
});

// ─────────────────────────────────────────────────────────────────────────────
// Parse Errors
// ─────────────────────────────────────────────────────────────────────────────

/** Raw text is not valid JSON, or nests deeper than the parser follows. */
export interface InvalidSourceError {
  readonly type: 'InvalidSource';
  readonly message: string;
}

export interface UnknownOperatorError {
  readonly type: 'UnknownOperator';
  readonly message: string;
  readonly operator: string;
}

export interface ExpectedObjectError {
  readonly type: 'ExpectedObject';
  readonly message: string;
}

export interface ExpectedArrayError {
  readonly type: 'ExpectedArray';
  readonly message: string;
}

export interface ExpectedValueError {
  readonly type: 'ExpectedValue';
  readonly message: string;
}

export interface EmptyFieldNameError {
  readonly type: 'EmptyFieldName';
  readonly message: string;
}

export interface EmptyFilterError {
  readonly type: 'EmptyFilter';
  readonly message: string;
}

export interface InvalidOperatorValueError {
  readonly type: 'InvalidOperatorValue';
  readonly message: string;
  readonly operator: string;
  readonly expected: string;
}

export interface NotRequiresOneConditionError {
  readonly type: 'NotRequiresOneCondition';
  readonly message: string;
}

export type FilterParseError =
  | InvalidSourceError
  | UnknownOperatorError
  | ExpectedObjectError
  | ExpectedArrayError
  | ExpectedValueError
  | EmptyFieldNameError
  | EmptyFilterError
  | InvalidOperatorValueError
  | NotRequiresOneConditionError;

export const createInvalidSourceError = (detail: string): InvalidSourceError => ({
  type: 'InvalidSource',
  message: `Invalid JSON: ${detail}`,
});

export const createSourceTooDeepError = (max: number): InvalidSourceError => ({
  type: 'InvalidSource',
  message: `Filter nesting exceeds ${String(max)} levels`,
});

export const createUnknownOperatorError = (operator: string): UnknownOperatorError => ({
  type: 'UnknownOperator',
  message: `Unknown operator '${operator}'`,
  operator,
});

export const createExpectedObjectError = (): ExpectedObjectError => ({
  type: 'ExpectedObject',
  message: 'Expected JSON object',
});

export const createExpectedArrayError = (): ExpectedArrayError => ({
  type: 'ExpectedArray',
  message: 'Expected JSON array',
});

export const createExpectedValueError = (): ExpectedValueError => ({
  type: 'ExpectedValue',
  message: 'Expected a value',
});

export const createEmptyFieldNameError = (): EmptyFieldNameError => ({
  type: 'EmptyFieldName',
  message: 'Field name cannot be empty',
});

export const createEmptyFilterError = (): EmptyFilterError => ({
  type: 'EmptyFilter',
  message: 'Filter object cannot be empty',
});

export const createInvalidOperatorValueError = (
  operator: string,
  expected: string
): InvalidOperatorValueError => ({
  type: 'InvalidOperatorValue',
  message: `Operator '${operator}' expects ${expected}`,
  operator,
  expected,
});

export const createNotRequiresOneConditionError = (): NotRequiresOneConditionError => ({
  type: 'NotRequiresOneCondition',
  message: '$not requires exactly one condition',
});

// ─────────────────────────────────────────────────────────────────────────────
// Sort Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface SortFieldNotAllowedError {
  readonly type: 'SortFieldNotAllowed';
  readonly message: string;
  readonly field: string;
  readonly allowed: readonly string[];
}

export interface InvalidSortFieldError {
  readonly type: 'InvalidSortField';
  readonly message: string;
  readonly field: string;
}

export type SortParseError = SortFieldNotAllowedError | InvalidSortFieldError;

export const createSortFieldNotAllowedError = (
  field: string,
  allowed: readonly string[]
): SortFieldNotAllowedError => ({
  type: 'SortFieldNotAllowed',
  message: `Sort field '${field}' not allowed. Allowed: ${allowed.join(', ')}`,
  field,
  allowed,
});

export const createInvalidSortFieldError = (field: string): InvalidSortFieldError => ({
  type: 'InvalidSortField',
  message: `Sort field '${field}' is not a valid identifier`,
  field,
});
