/**
 * Parser Extension: Entries
 * Messages, terms and their attributes
 */

import { Parser } from './parser.js';
import type { Cursor } from './cursor.js';
import type {
  AttributeNode,
  MessageNode,
  PatternNode,
  TermNode,
} from '../ast-nodes.js';
import {
  type ParseResult,
  expectedAt,
  invalidAt,
  success,
} from './result.js';
import {
  isLineEnd,
  skipBlankInline,
  skipBlankLines,
  skipLineEnd,
  skipPatternStart,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseMessage(cursor: Cursor): ParseResult<MessageNode>;
    parseTerm(cursor: Cursor): ParseResult<TermNode>;
    parseEntryValue(cursor: Cursor): ParseResult<PatternNode | null>;
    parseAttributes(cursor: Cursor): ParseResult<AttributeNode[]>;
    parseAttribute(cursor: Cursor): ParseResult<AttributeNode>;
  }
}

// ============================================================
// MESSAGES AND TERMS
// ============================================================

/**
 * identifier blank_inline? "=" pattern attributes*
 * Needs a value, at least one attribute, or both.
 */
Parser.prototype.parseMessage = function (
  this: Parser,
  cursor: Cursor
): ParseResult<MessageNode> {
  const id = this.parseIdentifier(cursor);
  if (!id.ok) return id;

  const value = this.parseEntryValue(id.cursor);
  if (!value.ok) return value;

  const attributes = this.parseAttributes(value.cursor);
  if (!attributes.ok) return attributes;

  if (value.value === null && attributes.value.length === 0) {
    return invalidAt(
      value.cursor,
      `Expected message '${id.value.name}' to have a value or attributes`
    );
  }

  return success(
    {
      type: 'Message',
      id: id.value,
      value: value.value,
      attributes: attributes.value,
      comment: null,
      span: { start: cursor.pos, end: attributes.cursor.pos },
    },
    attributes.cursor
  );
};

/** "-" identifier blank_inline? "=" pattern attributes*, value required */
Parser.prototype.parseTerm = function (
  this: Parser,
  cursor: Cursor
): ParseResult<TermNode> {
  const id = this.parseIdentifier(cursor.advance());
  if (!id.ok) return id;

  const value = this.parseEntryValue(id.cursor);
  if (!value.ok) return value;
  if (value.value === null) {
    return invalidAt(
      value.cursor,
      `Expected term '-${id.value.name}' to have a value`
    );
  }

  const attributes = this.parseAttributes(value.cursor);
  if (!attributes.ok) return attributes;

  return success(
    {
      type: 'Term',
      id: id.value,
      value: value.value,
      attributes: attributes.value,
      comment: null,
      span: { start: cursor.pos, end: attributes.cursor.pos },
    },
    attributes.cursor
  );
};

/**
 * blank_inline? "=" followed by a pattern.
 * An empty pattern yields null; the caller decides whether that is allowed.
 */
Parser.prototype.parseEntryValue = function (
  this: Parser,
  cursor: Cursor
): ParseResult<PatternNode | null> {
  const equals = skipBlankInline(cursor).expect('=');
  if (equals === null) {
    return expectedAt(skipBlankInline(cursor), ['=']);
  }

  const pattern = this.parsePattern(skipPatternStart(equals), false);
  if (!pattern.ok) return pattern;
  return success(
    pattern.value.elements.length > 0 ? pattern.value : null,
    pattern.cursor
  );
};

// ============================================================
// ATTRIBUTES
// ============================================================

/**
 * Zero or more attributes, each on its own indented line starting with `.`.
 * Stops, without consuming the line break, at the first line that is not
 * an attribute.
 */
Parser.prototype.parseAttributes = function (
  this: Parser,
  cursor: Cursor
): ParseResult<AttributeNode[]> {
  const attributes: AttributeNode[] = [];
  let next = cursor;

  while (isLineEnd(next)) {
    const lineStart = skipBlankLines(skipLineEnd(next));
    if (lineStart.peek() !== ' ') break;

    const dot = skipBlankInline(lineStart);
    if (dot.peek() !== '.') break;

    const attribute = this.parseAttribute(dot);
    if (!attribute.ok) return attribute;
    attributes.push(attribute.value);
    next = attribute.cursor;
  }

  return success(attributes, next);
};

/** "." identifier blank_inline? "=" pattern, value required */
Parser.prototype.parseAttribute = function (
  this: Parser,
  cursor: Cursor
): ParseResult<AttributeNode> {
  const id = this.parseIdentifier(cursor.advance());
  if (!id.ok) return id;

  const value = this.parseEntryValue(id.cursor);
  if (!value.ok) return value;
  if (value.value === null) {
    return invalidAt(
      value.cursor,
      `Expected attribute '.${id.value.name}' to have a value`
    );
  }

  return success(
    {
      type: 'Attribute',
      id: id.value,
      value: value.value,
      span: { start: cursor.pos, end: value.cursor.pos },
    },
    value.cursor
  );
};
