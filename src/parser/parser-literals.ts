/**
 * Parser Extension: Literals
 * Identifiers, number literals, string literals with escapes
 */

import { Parser } from './parser.js';
import type { Cursor } from './cursor.js';
import type {
  IdentifierNode,
  NumberLiteralNode,
  StringLiteralNode,
} from '../ast-nodes.js';
import {
  type ParseResult,
  expectedAt,
  invalidAt,
  success,
} from './result.js';
import { isAsciiLetter, isDigit, isHexDigit, isIdentifierChar } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIdentifier(cursor: Cursor): ParseResult<IdentifierNode>;
    parseNumberLiteral(cursor: Cursor): ParseResult<NumberLiteralNode>;
    parseStringLiteral(cursor: Cursor): ParseResult<StringLiteralNode>;
    parseEscapeSequence(cursor: Cursor): ParseResult<string>;
  }
}

const MAX_CODE_POINT = 0x10ffff;

// ============================================================
// IDENTIFIERS
// ============================================================

/**
 * Identifier: [A-Za-z][A-Za-z0-9_-]*
 */
Parser.prototype.parseIdentifier = function (
  this: Parser,
  cursor: Cursor
): ParseResult<IdentifierNode> {
  if (!isAsciiLetter(cursor.peek())) {
    return expectedAt(cursor, ['identifier']);
  }
  const end = cursor.advance().skipWhile(isIdentifierChar);
  return success(
    {
      type: 'Identifier',
      name: end.slice(cursor.pos),
      span: { start: cursor.pos, end: end.pos },
    },
    end
  );
};

// ============================================================
// NUMBERS
// ============================================================

/**
 * Number: -?[0-9]+(\.[0-9]+)?
 * A trailing dot without digits is left unconsumed.
 */
Parser.prototype.parseNumberLiteral = function (
  this: Parser,
  cursor: Cursor
): ParseResult<NumberLiteralNode> {
  let next = cursor.peek() === '-' ? cursor.advance() : cursor;

  if (!isDigit(next.peek())) {
    return expectedAt(next, ['digit']);
  }
  next = next.skipWhile((c) => isDigit(c));

  if (next.peek() === '.' && isDigit(next.peek(1))) {
    next = next.advance().skipWhile((c) => isDigit(c));
  }

  const raw = next.slice(cursor.pos);
  return success(
    {
      type: 'NumberLiteral',
      raw,
      value: Number(raw),
      span: { start: cursor.pos, end: next.pos },
    },
    next
  );
};

// ============================================================
// STRINGS
// ============================================================

/**
 * String literal: "..." on a single line.
 * Escapes: \" \\ \n \t \uXXXX \UXXXXXX
 */
Parser.prototype.parseStringLiteral = function (
  this: Parser,
  cursor: Cursor
): ParseResult<StringLiteralNode> {
  const open = cursor.expect('"');
  if (open === null) {
    return expectedAt(cursor, ['"']);
  }

  let next = open;
  let value = '';
  for (;;) {
    const char = next.peek();
    if (char === null || char === '\n' || char === '\r') {
      return expectedAt(next, ['"']);
    }
    if (char === '"') {
      next = next.advance();
      break;
    }
    if (char === '\\') {
      const escape = this.parseEscapeSequence(next.advance());
      if (!escape.ok) return escape;
      value += escape.value;
      next = escape.cursor;
      continue;
    }
    value += char;
    next = next.advance();
  }

  return success(
    {
      type: 'StringLiteral',
      value,
      span: { start: cursor.pos, end: next.pos },
    },
    next
  );
};

/**
 * Decode the escape after a backslash. The cursor sits on the
 * character following `\`.
 */
Parser.prototype.parseEscapeSequence = function (
  this: Parser,
  cursor: Cursor
): ParseResult<string> {
  const char = cursor.peek();
  switch (char) {
    case '"':
    case '\\':
      return success(char, cursor.advance());
    case 'n':
      return success('\n', cursor.advance());
    case 't':
      return success('\t', cursor.advance());
    case 'u':
    case 'U': {
      const length = char === 'u' ? 4 : 6;
      const digitsStart = cursor.advance();
      let next = digitsStart;
      for (let i = 0; i < length; i++) {
        const digit = next.peek();
        if (digit === null || !isHexDigit(digit)) {
          return expectedAt(next, ['hex digit']);
        }
        next = next.advance();
      }
      const hex = next.slice(digitsStart.pos);
      const codePoint = parseInt(hex, 16);
      if (codePoint > MAX_CODE_POINT) {
        return invalidAt(
          cursor,
          `Invalid Unicode escape \\U${hex}: code point exceeds U+10FFFF`
        );
      }
      return success(String.fromCodePoint(codePoint), next);
    }
    case null:
      return expectedAt(cursor, ['escape sequence']);
    default:
      return invalidAt(cursor, `Unknown escape sequence \\${char}`, [
        '\\"',
        '\\\\',
        '\\n',
        '\\t',
        '\\u',
        '\\U',
      ]);
  }
};
