/**
 * Parse Results
 * Success/failure values returned by every grammar rule.
 */

import type { Cursor } from './cursor.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type SyntaxCode,
} from '../error-registry.js';

export interface ParseFailure {
  readonly code: SyntaxCode;
  readonly message: string;
  /** Position where the rule gave up */
  readonly cursor: Cursor;
  /** Tokens that would have been accepted here */
  readonly expected: readonly string[];
}

export interface Parsed<T> {
  readonly ok: true;
  readonly value: T;
  readonly cursor: Cursor;
}

export interface ParseFailed {
  readonly ok: false;
  readonly error: ParseFailure;
}

export type ParseResult<T> = Parsed<T> | ParseFailed;

/** @internal */
export function success<T>(value: T, cursor: Cursor): Parsed<T> {
  return { ok: true, value, cursor };
}

function fail(
  code: SyntaxCode,
  cursor: Cursor,
  context: Record<string, unknown>,
  expected: readonly string[]
): ParseFailed {
  const template = ERROR_REGISTRY.get(code)?.messageTemplate ?? '{reason}';
  return {
    ok: false,
    error: {
      code,
      message: renderMessage(template, context),
      cursor,
      expected,
    },
  };
}

/**
 * The next character is not one of the expected tokens.
 * Reports UNEXPECTED_EOF at end of input, INVALID_CHARACTER otherwise.
 * @internal
 */
export function expectedAt(
  cursor: Cursor,
  expected: readonly string[]
): ParseFailed {
  const list = expected.join(' or ');
  const char = cursor.peek();
  if (char === null) {
    return fail('UNEXPECTED_EOF', cursor, { expected: list }, expected);
  }
  return fail(
    'INVALID_CHARACTER',
    cursor,
    { found: describeChar(char), expected: list },
    expected
  );
}

/**
 * A construct is well-tokenized but structurally invalid
 * (duplicate defaults, named argument rules, empty values).
 * @internal
 */
export function invalidAt(
  cursor: Cursor,
  reason: string,
  expected: readonly string[] = []
): ParseFailed {
  return fail('EXPECTED_TOKEN', cursor, { reason }, expected);
}

/** @internal */
export function describeChar(char: string): string {
  switch (char) {
    case '\n':
      return 'end of line';
    case '\r':
      return 'carriage return';
    case '\t':
      return 'tab';
    case ' ':
      return 'space';
    default:
      return `'${char}'`;
  }
}
