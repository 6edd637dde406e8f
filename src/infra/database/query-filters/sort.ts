/**
 * Sort String Parser
 *
 * Parses `?sort=-created_at,id` style parameters.
 */

import { err, ok, type Result } from 'neverthrow';

import { isValidSqlIdentifier } from '../query-builders/identifiers.js';
import { sortField, type SortField } from '../query-builders/types.js';

import {
  createInvalidSortFieldError,
  createSortFieldNotAllowedError,
  type SortParseError,
} from './errors.js';

/**
 * Parses a comma-separated sort list. A leading `-` sorts descending; empty
 * parts are skipped.
 *
 * SECURITY: An empty `allowed` list allows every field. Pass an explicit list
 * for client input so sensitive columns cannot be inferred through ordering.
 *
 * @example
 * ```typescript
 * parseSortString('-created_at,id', ['created_at', 'id']);
 * // ok([{ field: 'created_at', dir: 'desc' }, { field: 'id', dir: 'asc' }])
 * ```
 */
export function parseSortString(
  sort: string,
  allowed: readonly string[]
): Result<SortField[], SortParseError> {
  const fields: SortField[] = [];

  for (const rawPart of sort.split(',')) {
    const part = rawPart.trim();
    if (part.length === 0) continue;

    const descending = part.startsWith('-');
    const field = descending ? part.slice(1) : part;

    if (allowed.length > 0 && !allowed.includes(field)) {
      return err(createSortFieldNotAllowedError(field, allowed));
    }
    if (!isValidSqlIdentifier(field)) {
      return err(createInvalidSortFieldError(field));
    }

    fields.push(sortField(field, descending ? 'desc' : 'asc'));
  }

  return ok(fields);
}
