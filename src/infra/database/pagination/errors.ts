/**
 * Pagination - Cursor Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

/** Largest accepted encoded cursor, in bytes. */
export const MAX_CURSOR_SIZE = 4096;

/** Largest number of fields a decoded cursor may carry. */
export const MAX_CURSOR_FIELDS = 16;

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token is not URL-safe base64, or its bytes are not UTF-8.
 */
export interface CursorInvalidEncodingError {
  readonly type: 'InvalidEncoding';
  readonly message: string;
}

/**
 * Decoded payload is not a flat JSON object of primitive values.
 */
export interface CursorInvalidFormatError {
  readonly type: 'InvalidFormat';
  readonly message: string;
}

export interface CursorTooLargeError {
  readonly type: 'TooLarge';
  readonly message: string;
  readonly size: number;
}

export interface CursorTooManyFieldsError {
  readonly type: 'TooManyFields';
  readonly message: string;
}

export type CursorError =
  | CursorInvalidEncodingError
  | CursorInvalidFormatError
  | CursorTooLargeError
  | CursorTooManyFieldsError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createCursorInvalidEncodingError = (): CursorInvalidEncodingError => ({
  type: 'InvalidEncoding',
  message: 'Invalid base64 encoding in cursor',
});

export const createCursorInvalidFormatError = (detail?: string): CursorInvalidFormatError => ({
  type: 'InvalidFormat',
  message:
    detail === undefined
      ? 'Invalid cursor format (expected JSON object)'
      : `Invalid cursor format (expected JSON object): ${detail}`,
});

export const createCursorTooLargeError = (size: number): CursorTooLargeError => ({
  type: 'TooLarge',
  message: `Cursor exceeds maximum size (${String(MAX_CURSOR_SIZE / 1024)}KB limit)`,
  size,
});

export const createCursorTooManyFieldsError = (): CursorTooManyFieldsError => ({
  type: 'TooManyFields',
  message: `Cursor has too many fields (max ${String(MAX_CURSOR_FIELDS)})`,
});

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

/** Malformed token: the client sent something that was never a cursor. */
export const isCursorFormatError = (error: CursorError): boolean =>
  error.type === 'InvalidEncoding' || error.type === 'InvalidFormat';

/** Well-formed but over a size limit. */
export const isCursorLimitError = (error: CursorError): boolean =>
  error.type === 'TooLarge' || error.type === 'TooManyFields';
