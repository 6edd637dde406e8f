/**
 * SQL Expressions - Computed Field Validation
 *
 * Computed fields embed raw SQL in the select list. The checks below reject the
 * usual injection shapes (comments, statement terminators, sub-statements,
 * catalog access, timing and file functions). This is not a SQL parser and
 * cannot catch every variant: only pass expressions written in code.
 */

export const MAX_EXPRESSION_LENGTH = 1000;

/**
 * Keywords and function names rejected as whole words (case-insensitive).
 */
const DENIED_KEYWORDS: readonly string[] = Object.freeze([
  // statements and clauses
  'select',
  'insert',
  'update',
  'delete',
  'drop',
  'truncate',
  'alter',
  'create',
  'grant',
  'revoke',
  'exec',
  'execute',
  'union',
  'into',
  'from',
  'where',
  'having',
  'group',
  'order',
  'limit',
  'offset',
  'fetch',
  'returning',
  // timing
  'sleep',
  'benchmark',
  'waitfor',
  'pg_sleep',
  'dbms_lock',
  // file access
  'load_file',
  'into_outfile',
  'into_dumpfile',
  // encoding functions usable to smuggle keywords
  'chr',
  'char',
  'ascii',
  'unicode',
  'hex',
  'unhex',
  'convert',
  'cast',
  'encode',
  'decode',
]);

const DENIED_FRAGMENTS: readonly string[] = Object.freeze(['--', '/*', '*/', ';', '`']);

const DENIED_SUBSTRINGS: readonly string[] = Object.freeze([
  'pg_',
  'sqlite_',
  'information_schema',
  'sys.',
  '0x',
  '\\x',
]);

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[a-z0-9_]/.test(ch);
}

/**
 * True when `keyword` occurs in `haystack` bounded by non-word characters,
 * so "last_updated" does not match "update".
 */
export function containsSqlKeyword(haystack: string, keyword: string): boolean {
  if (keyword.length === 0) return false;

  let from = 0;
  for (;;) {
    const at = haystack.indexOf(keyword, from);
    if (at === -1) return false;
    if (!isWordChar(haystack[at - 1]) && !isWordChar(haystack[at + keyword.length])) {
      return true;
    }
    from = at + 1;
  }
}

/**
 * Checks a computed-field expression.
 *
 * @example
 * ```typescript
 * isValidSqlExpression("first_name || ' ' || last_name"); // true
 * isValidSqlExpression('last_updated');                    // true
 * isValidSqlExpression('1; DROP TABLE users');             // false
 * ```
 */
export function isValidSqlExpression(expression: string): boolean {
  if (expression.length === 0 || expression.length > MAX_EXPRESSION_LENGTH) {
    return false;
  }

  if (DENIED_FRAGMENTS.some((fragment) => expression.includes(fragment))) {
    return false;
  }

  const lower = expression.toLowerCase();

  if (DENIED_KEYWORDS.some((keyword) => containsSqlKeyword(lower, keyword))) {
    return false;
  }

  return !DENIED_SUBSTRINGS.some((fragment) => lower.includes(fragment));
}

export function assertValidSqlExpression(expression: string, context: string): void {
  if (!isValidSqlExpression(expression)) {
    throw new Error(
      `Invalid SQL expression for ${context}: '${expression}' contains denied patterns ` +
        '(comments, statement terminators or SQL keywords)'
    );
  }
}
