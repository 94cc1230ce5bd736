/**
 * Parser Helpers
 * Character classes and whitespace handling shared by grammar rules.
 */

import type { Cursor } from './cursor.js';

// ============================================================
// CHARACTER CLASSES
// ============================================================

/** @internal */
export function isAsciiLetter(char: string | null): boolean {
  return (
    char !== null &&
    char.length === 1 &&
    ((char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z'))
  );
}

/** @internal */
export function isDigit(char: string | null): boolean {
  return char !== null && char.length === 1 && char >= '0' && char <= '9';
}

/** @internal */
export function isIdentifierChar(char: string): boolean {
  return isAsciiLetter(char) || isDigit(char) || char === '_' || char === '-';
}

/** @internal */
export function isHexDigit(char: string): boolean {
  return /^[0-9a-fA-F]$/.test(char);
}

/** Function names: [A-Z][A-Z0-9_-]* */
export function isFunctionName(name: string): boolean {
  return /^[A-Z][A-Z0-9_-]*$/.test(name);
}

/** Characters that begin a new top-level entry when at column 1 */
export function isEntryStart(char: string | null): boolean {
  return char === '#' || char === '-' || isAsciiLetter(char);
}

// ============================================================
// WHITESPACE
// ============================================================

/** Skip spaces only (blank_inline). Tabs are not blank in FTL. */
export function skipBlankInline(cursor: Cursor): Cursor {
  return cursor.skipWhile((c) => c === ' ');
}

/** Skip spaces and line terminators (blank) */
export function skipBlank(cursor: Cursor): Cursor {
  return cursor.skipWhile((c) => c === ' ' || c === '\n' || c === '\r');
}

/** True at \n or \r\n */
export function isLineEnd(cursor: Cursor): boolean {
  const char = cursor.peek();
  return char === '\n' || (char === '\r' && cursor.peek(1) === '\n');
}

/** Step over \n or \r\n; returns the cursor unchanged elsewhere */
export function skipLineEnd(cursor: Cursor): Cursor {
  if (cursor.peek() === '\n') return cursor.advance();
  if (cursor.peek() === '\r' && cursor.peek(1) === '\n') {
    return cursor.advance(2);
  }
  return cursor;
}

/** Move to the start of the next line, or to end of input */
export function skipToNextLine(cursor: Cursor): Cursor {
  let next = cursor;
  while (!next.isEof && !isLineEnd(next)) {
    next = next.advance();
  }
  return skipLineEnd(next);
}

/** Skip any following lines that hold nothing but spaces */
export function skipBlankLines(lineStart: Cursor): Cursor {
  let cursor = lineStart;
  for (;;) {
    const after = skipBlankInline(cursor);
    if (!isLineEnd(after)) return cursor;
    cursor = skipLineEnd(after);
  }
}

/**
 * Check whether the line after a line end continues the current pattern.
 *
 * A continuation line starts with at least one space, and its first
 * non-space character is not `[`, `*` or `.` (variant, default variant,
 * attribute). Blank lines in between are skipped. Returns the cursor at
 * that first non-space character, or null when the pattern ends here.
 */
export function indentedContinuation(cursor: Cursor): Cursor | null {
  if (!isLineEnd(cursor)) return null;

  const lineStart = skipBlankLines(skipLineEnd(cursor));
  if (lineStart.peek() !== ' ') return null;

  const content = skipBlankInline(lineStart);
  const first = content.peek();
  if (first === null || first === '[' || first === '*' || first === '.') {
    return null;
  }
  return content;
}

/**
 * Skip blank_inline after `=`, plus the line break when the value starts
 * on a following indented line.
 */
export function skipPatternStart(cursor: Cursor): Cursor {
  const inline = skipBlankInline(cursor);
  return indentedContinuation(inline) ?? inline;
}
