/**
 * Pagination Cursor
 *
 * An ordered set of (field, value) pairs taken from the last row of a page,
 * serialized into an opaque token for the client.
 *
 * SECURITY: Tokens are base64, not encrypted. Clients can read and forge them,
 * so every value goes back into SQL as a bound parameter only.
 */

import { Buffer } from 'node:buffer';

import { err, type Result } from 'neverthrow';

import { Value, type PrimitiveValue } from '../query-builders/types.js';

import { decodeBase64Url, encodeBase64Url, entriesToJson, jsonToEntries } from './encoding.js';
import { MAX_CURSOR_SIZE, createCursorTooLargeError, type CursorError } from './errors.js';

/** Cursor values are scalars; arrays have no place in a seek predicate. */
export type CursorField = readonly [name: string, value: PrimitiveValue];

export class Cursor {
  private constructor(private readonly entries: readonly CursorField[]) {}

  static create(): Cursor {
    return new Cursor([]);
  }

  /**
   * Decodes a client token. The size limit is checked before any decoding.
   */
  static decode(token: string): Result<Cursor, CursorError> {
    const size = Buffer.byteLength(token, 'utf8');
    if (size > MAX_CURSOR_SIZE) {
      return err(createCursorTooLargeError(size));
    }
    return decodeBase64Url(token)
      .andThen(jsonToEntries)
      .map((entries) => new Cursor(Object.freeze(entries)));
  }

  /** Returns a new cursor with the field appended. */
  field(name: string, value: PrimitiveValue): Cursor {
    return new Cursor(Object.freeze([...this.entries, [name, value] as const]));
  }

  int(name: string, value: number | bigint): Cursor {
    return this.field(name, Value.int(value));
  }

  float(name: string, value: number): Cursor {
    return this.field(name, Value.float(value));
  }

  string(name: string, value: string): Cursor {
    return this.field(name, Value.string(value));
  }

  bool(name: string, value: boolean): Cursor {
    return this.field(name, Value.bool(value));
  }

  /** First value stored under `name`. */
  get(name: string): PrimitiveValue | undefined {
    return this.entries.find(([fieldName]) => fieldName === name)?.[1];
  }

  get fields(): readonly CursorField[] {
    return this.entries;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * URL-safe base64 (no padding) of the JSON object form.
   * Non-finite floats have no JSON form and are left out.
   */
  encode(): string {
    return encodeBase64Url(entriesToJson(this.entries));
  }
}

export const encodeCursor = (cursor: Cursor): string => cursor.encode();

export const decodeCursor = (token: string): Result<Cursor, CursorError> => Cursor.decode(token);

/**
 * Normalizes the loose cursor inputs request handlers deal with.
 * Empty cursors and tokens that fail to decode yield undefined.
 */
export function toCursor(input: Cursor | string | null | undefined): Cursor | undefined {
  if (input === null || input === undefined || input === '') {
    return undefined;
  }
  if (typeof input !== 'string') {
    return input.isEmpty ? undefined : input;
  }
  return Cursor.decode(input).match(
    (cursor) => (cursor.isEmpty ? undefined : cursor),
    () => undefined
  );
}
