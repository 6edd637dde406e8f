/**
 * SQL Identifiers - Table, Column and Alias Validation
 *
 * Every identifier a builder embeds in SQL text passes through here.
 * Identifiers come from trusted code, so a bad one is a programmer error:
 * the assert* helpers throw at configuration time instead of returning a result.
 *
 * SECURITY: Identifiers are never quoted or escaped, only accepted or rejected.
 */

/** Postgres truncates identifiers beyond 63 bytes. */
export const MAX_IDENTIFIER_LENGTH = 63;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Checks that a string is a safe SQL identifier.
 *
 * Accepts `[A-Za-z_][A-Za-z0-9_]*` up to 63 characters.
 *
 * @example
 * ```typescript
 * isValidSqlIdentifier('user_id');     // true
 * isValidSqlIdentifier('123abc');      // false
 * isValidSqlIdentifier('user; DROP');  // false
 * ```
 */
export function isValidSqlIdentifier(value: string): boolean {
  if (value.length === 0 || value.length > MAX_IDENTIFIER_LENGTH) {
    return false;
  }
  return IDENTIFIER_PATTERN.test(value);
}

/**
 * Throws if `value` is not a valid identifier.
 *
 * @param context - What the identifier is used for, e.g. "table" or "sort field"
 */
export function assertValidSqlIdentifier(value: string, context: string): void {
  if (!isValidSqlIdentifier(value)) {
    throw new Error(
      `Invalid SQL identifier for ${context}: '${value}' ` +
        '(must match [A-Za-z_][A-Za-z0-9_]* and be at most ' +
        `${String(MAX_IDENTIFIER_LENGTH)} characters)`
    );
  }
}

export function assertValidSqlIdentifiers(values: readonly string[], context: string): void {
  for (const value of values) {
    assertValidSqlIdentifier(value, context);
  }
}
