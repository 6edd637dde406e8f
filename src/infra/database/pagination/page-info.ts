/**
 * Page Info
 *
 * Pagination metadata returned alongside a page of rows. All helpers return a
 * new object.
 */

import type { Cursor } from './cursor.js';

export interface PageInfo {
  /** Whether there are more items after the current page */
  readonly hasNext: boolean;
  /** Whether there are items before the current page */
  readonly hasPrev: boolean;
  readonly nextCursor?: string;
  readonly prevCursor?: string;
  /** Total item count, when the caller ran a count query */
  readonly total?: number;
}

/**
 * Creates page info from the number of rows fetched and the page limit.
 * A full page is taken to mean more rows follow.
 */
export const createPageInfo = (count: number, limit: number): PageInfo => ({
  hasNext: count >= limit,
  hasPrev: false,
});

export const withHasPrev = (info: PageInfo, hasPrev: boolean): PageInfo => ({
  ...info,
  hasPrev,
});

/** Setting a cursor also sets `hasNext`; undefined clears the cursor only. */
export const withNextCursor = (info: PageInfo, cursor: string | undefined): PageInfo => {
  const { nextCursor: _previous, ...rest } = info;
  return cursor === undefined ? rest : { ...rest, nextCursor: cursor, hasNext: true };
};

export const withPrevCursor = (info: PageInfo, cursor: string | undefined): PageInfo => {
  const { prevCursor: _previous, ...rest } = info;
  return cursor === undefined ? rest : { ...rest, prevCursor: cursor, hasPrev: true };
};

export const withTotal = (info: PageInfo, total: number): PageInfo => ({
  ...info,
  total,
});

/**
 * Encodes a cursor for `item`, typically the last row of a page.
 *
 * @example
 * ```typescript
 * const next = cursorFrom(rows.at(-1), (row) => Cursor.create().int('id', row.id));
 * ```
 */
export function cursorFrom<T>(item: T | undefined, build: (item: T) => Cursor): string | undefined {
  return item === undefined ? undefined : build(item).encode();
}
