/**
 * Pagination Constants
 *
 * SECURITY: Page sizes requested by clients are clamped so a single request
 * cannot fetch an unbounded number of rows.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default number of records per page */
export const DEFAULT_PAGE_SIZE = 20;

/** Maximum allowed records per page */
export const MAX_PAGE_SIZE = 100;

/** Pages are 1-based */
export const FIRST_PAGE = 1;

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clamps a limit value to the allowed range.
 *
 * Fractional limits are truncated. Values above the maximum are clamped
 * silently rather than rejected.
 *
 * @example
 * clampLimit(undefined)    // Returns 20 (default)
 * clampLimit(50)           // Returns 50
 * clampLimit(500)          // Returns 100 (max)
 * clampLimit(-1)           // Returns 1 (min)
 */
export function clampLimit(
  limit: number | undefined | null,
  defaultValue: number = DEFAULT_PAGE_SIZE,
  maxValue: number = MAX_PAGE_SIZE
): number {
  if (limit === undefined || limit === null || Number.isNaN(limit)) {
    return defaultValue;
  }
  return Math.min(Math.max(1, Math.trunc(limit)), maxValue);
}

/**
 * Normalizes a page number. Missing and non-finite pages become the first page;
 * others are truncated and clamped to the valid range.
 */
export function normalizePage(page: number | undefined | null): number {
  if (page === undefined || page === null || !Number.isFinite(page)) {
    return FIRST_PAGE;
  }
  return Math.min(Math.max(FIRST_PAGE, Math.trunc(page)), 2 ** 32 - 1);
}

/**
 * Validates and clamps page-based pagination parameters.
 */
export function normalizePagination(
  params: { page?: number | null | undefined; limit?: number | null | undefined },
  defaults: { defaultPageSize: number; maxPageSize: number } = {
    defaultPageSize: DEFAULT_PAGE_SIZE,
    maxPageSize: MAX_PAGE_SIZE,
  }
): { page: number; limit: number } {
  return {
    page: normalizePage(params.page),
    limit: clampLimit(params.limit, defaults.defaultPageSize, defaults.maxPageSize),
  };
}
