/**
 * Cursor Wire Encoding
 *
 * A cursor travels as URL-safe base64 (no padding) of a flat JSON object:
 * `{"created_at":"2024-01-01","id":42}`.
 *
 * The payload is scanned by hand instead of going through JSON.parse so that
 * integers keep their full 64-bit precision and field order is preserved.
 */

import { Buffer } from 'node:buffer';

import { err, ok, Result } from 'neverthrow';

import type { PrimitiveValue } from '../query-builders/types.js';

import {
  MAX_CURSOR_FIELDS,
  createCursorInvalidEncodingError,
  createCursorInvalidFormatError,
  createCursorTooManyFieldsError,
  type CursorError,
} from './errors.js';

export type CursorEntry = readonly [string, PrimitiveValue];

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const NULL_ENTRY: PrimitiveValue = Object.freeze({ kind: 'null' });
const boolEntry = (value: boolean): PrimitiveValue => Object.freeze({ kind: 'bool', value });
const intEntry = (value: bigint): PrimitiveValue => Object.freeze({ kind: 'int', value });
const floatEntry = (value: number): PrimitiveValue => Object.freeze({ kind: 'float', value });
const stringEntry = (value: string): PrimitiveValue => Object.freeze({ kind: 'string', value });

// ============================================================================
// Base64
// ============================================================================

/** URL-safe alphabet; standard `+` and `/` are accepted on input as well. */
const BASE64_INPUT_PATTERN = /^[A-Za-z0-9\-_+/]*$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const decodeUtf8 = Result.fromThrowable(
  (bytes: Uint8Array): string => utf8Decoder.decode(bytes),
  () => createCursorInvalidEncodingError()
);

export function encodeBase64Url(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64url');
}

export function decodeBase64Url(input: string): Result<string, CursorError> {
  // A lone trailing sextet cannot carry a full byte.
  if (!BASE64_INPUT_PATTERN.test(input) || input.length % 4 === 1) {
    return err(createCursorInvalidEncodingError());
  }
  const normalized = input.replaceAll('+', '-').replaceAll('/', '_');
  return decodeUtf8(Buffer.from(normalized, 'base64url'));
}

// ============================================================================
// JSON Writer
// ============================================================================

function formatFloat(value: number): string {
  const text = String(value);
  // Keep integral floats distinguishable from ints after a round trip.
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

function entryValueJson(value: PrimitiveValue): string | undefined {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
      return value.value.toString();
    case 'float':
      return Number.isFinite(value.value) ? formatFloat(value.value) : undefined;
    case 'string':
      return JSON.stringify(value.value);
  }
}

/**
 * Serializes entries to a flat JSON object. Non-finite floats have no cursor
 * form and are skipped.
 */
export function entriesToJson(entries: readonly CursorEntry[]): string {
  const parts: string[] = [];
  for (const [name, value] of entries) {
    const json = entryValueJson(value);
    if (json !== undefined) {
      parts.push(`${JSON.stringify(name)}:${json}`);
    }
  }
  return `{${parts.join(',')}}`;
}

// ============================================================================
// JSON Scanner
// ============================================================================

const WHITESPACE = /[ \t\n\r]*/y;
const STRING_TOKEN = /"(?:[^"\\\u0000-\u001f]|\\["\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/y;
const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/y;
const LITERAL_TOKEN = /true|false|null/y;

const parseStringToken = Result.fromThrowable(
  (token: string): unknown => JSON.parse(token),
  () => createCursorInvalidFormatError('bad string')
);

class FlatObjectScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  scan(): Result<CursorEntry[], CursorError> {
    const entries: CursorEntry[] = [];

    this.skipWhitespace();
    if (!this.consume('{')) {
      return err(createCursorInvalidFormatError());
    }
    this.skipWhitespace();

    if (!this.consume('}')) {
      for (;;) {
        this.skipWhitespace();
        const key = this.readString();
        if (key.isErr()) return err(key.error);

        this.skipWhitespace();
        if (!this.consume(':')) {
          return err(createCursorInvalidFormatError('expected ":"'));
        }
        this.skipWhitespace();

        const value = this.readValue();
        if (value.isErr()) return err(value.error);

        entries.push([key.value, value.value]);
        if (entries.length > MAX_CURSOR_FIELDS) {
          return err(createCursorTooManyFieldsError());
        }

        this.skipWhitespace();
        if (this.consume('}')) break;
        if (!this.consume(',')) {
          return err(createCursorInvalidFormatError('expected "," or "}"'));
        }
      }
    }

    this.skipWhitespace();
    if (this.pos !== this.text.length) {
      return err(createCursorInvalidFormatError('trailing characters'));
    }
    return ok(entries);
  }

  private match(pattern: RegExp): RegExpExecArray | null {
    pattern.lastIndex = this.pos;
    const found = pattern.exec(this.text);
    if (found !== null) {
      this.pos += found[0].length;
    }
    return found;
  }

  private skipWhitespace(): void {
    this.match(WHITESPACE);
  }

  private consume(ch: string): boolean {
    if (this.text[this.pos] !== ch) return false;
    this.pos += 1;
    return true;
  }

  private readString(): Result<string, CursorError> {
    const token = this.match(STRING_TOKEN);
    if (token === null) {
      return err(createCursorInvalidFormatError('expected string'));
    }
    return parseStringToken(token[0]).andThen((parsed) =>
      typeof parsed === 'string'
        ? ok(parsed)
        : err(createCursorInvalidFormatError('expected string'))
    );
  }

  private readValue(): Result<PrimitiveValue, CursorError> {
    if (this.text[this.pos] === '"') {
      return this.readString().map(stringEntry);
    }

    const literal = this.match(LITERAL_TOKEN);
    if (literal !== null) {
      if (literal[0] === 'null') return ok(NULL_ENTRY);
      return ok(boolEntry(literal[0] === 'true'));
    }

    const number = this.match(NUMBER_TOKEN);
    if (number !== null) {
      return numberValue(number[0], number[1] !== undefined || number[2] !== undefined);
    }

    // Nested objects, arrays and anything else
    return err(createCursorInvalidFormatError('expected primitive value'));
  }
}

function numberValue(text: string, isFloat: boolean): Result<PrimitiveValue, CursorError> {
  if (isFloat) {
    const parsed = Number(text);
    return Number.isFinite(parsed)
      ? ok(floatEntry(parsed))
      : err(createCursorInvalidFormatError('number out of range'));
  }
  const big = BigInt(text);
  if (big < INT64_MIN || big > INT64_MAX) {
    return err(createCursorInvalidFormatError('integer out of range'));
  }
  return ok(intEntry(big));
}

/**
 * Parses a flat JSON object into ordered cursor entries.
 */
export function jsonToEntries(json: string): Result<CursorEntry[], CursorError> {
  return new FlatObjectScanner(json).scan();
}
