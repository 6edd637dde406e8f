/**
 * Pagination
 *
 * Opaque cursors, keyset seek predicates and page metadata.
 *
 * @example
 * ```typescript
 * import { Cursor, KeysetCondition } from '@/infra/database/pagination/index.js';
 *
 * const cursor = Cursor.create().string('created_at', '2024-01-01').int('id', 42);
 * const token = cursor.encode();
 * const condition = KeysetCondition.after([sortField('created_at', 'desc')], cursor);
 * ```
 */

export {
  Cursor,
  decodeCursor,
  encodeCursor,
  toCursor,
  type CursorField,
} from './cursor.js';

export {
  MAX_CURSOR_FIELDS,
  MAX_CURSOR_SIZE,
  createCursorInvalidEncodingError,
  createCursorInvalidFormatError,
  createCursorTooLargeError,
  createCursorTooManyFieldsError,
  isCursorFormatError,
  isCursorLimitError,
  type CursorError,
  type CursorInvalidEncodingError,
  type CursorInvalidFormatError,
  type CursorTooLargeError,
  type CursorTooManyFieldsError,
} from './errors.js';

export { KeysetCondition } from './keyset.js';

export {
  createPageInfo,
  cursorFrom,
  withHasPrev,
  withNextCursor,
  withPrevCursor,
  withTotal,
  type PageInfo,
} from './page-info.js';
