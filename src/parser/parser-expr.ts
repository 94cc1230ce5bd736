/**
 * Parser Extension: Inline Expressions
 * Variable, message, term and function references; call arguments
 */

import { MAX_NESTING_DEPTH, NESTING_TOO_DEEP, Parser } from './parser.js';
import type { Cursor } from './cursor.js';
import type {
  CallArgumentsNode,
  IdentifierNode,
  InlineExpressionNode,
  NamedArgumentNode,
  TermReferenceNode,
} from '../ast-nodes.js';
import {
  type ParseResult,
  expectedAt,
  invalidAt,
  success,
} from './result.js';
import {
  isAsciiLetter,
  isDigit,
  isFunctionName,
  skipBlank,
  skipBlankInline,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseInlineExpression(
      cursor: Cursor,
      depth?: number
    ): ParseResult<InlineExpressionNode>;
    parseVariableReference(cursor: Cursor): ParseResult<InlineExpressionNode>;
    parseTermReference(
      cursor: Cursor,
      depth: number
    ): ParseResult<TermReferenceNode>;
    parseIdentifierExpression(
      cursor: Cursor,
      depth: number
    ): ParseResult<InlineExpressionNode>;
    parseAttributeAccessor(
      cursor: Cursor
    ): ParseResult<IdentifierNode | null>;
    parseCallArguments(
      cursor: Cursor,
      depth: number
    ): ParseResult<CallArgumentsNode>;
  }
}

const INLINE_EXPRESSION_START = [
  '$variable',
  '"string"',
  'number',
  '-term',
  'message',
  'FUNCTION()',
  '{',
];

// ============================================================
// DISPATCH
// ============================================================

/**
 * Inline expression, dispatched on the first character:
 * - `$` variable reference
 * - `"` string literal
 * - `-` + letter: term reference; `-` + anything else: negative number
 * - digit: number literal
 * - letter: function call or message reference
 * - `{` nested placeable
 */
Parser.prototype.parseInlineExpression = function (
  this: Parser,
  cursor: Cursor,
  depth = 0
): ParseResult<InlineExpressionNode> {
  const char = cursor.peek();

  if (char === '$') {
    return this.parseVariableReference(cursor);
  }
  if (char === '"') {
    return this.parseStringLiteral(cursor);
  }
  if (char === '-') {
    if (isAsciiLetter(cursor.peek(1))) {
      return this.parseTermReference(cursor, depth);
    }
    return this.parseNumberLiteral(cursor);
  }
  if (isDigit(char)) {
    return this.parseNumberLiteral(cursor);
  }
  if (isAsciiLetter(char)) {
    return this.parseIdentifierExpression(cursor, depth);
  }
  if (char === '{') {
    return this.parsePlaceable(cursor, depth);
  }
  return expectedAt(cursor, INLINE_EXPRESSION_START);
};

// ============================================================
// REFERENCES
// ============================================================

/** $identifier */
Parser.prototype.parseVariableReference = function (
  this: Parser,
  cursor: Cursor
): ParseResult<InlineExpressionNode> {
  const id = this.parseIdentifier(cursor.advance());
  if (!id.ok) return id;
  return success(
    {
      type: 'VariableReference',
      id: id.value,
      span: { start: cursor.pos, end: id.cursor.pos },
    },
    id.cursor
  );
};

/** -identifier(.attribute)?(arguments)? */
Parser.prototype.parseTermReference = function (
  this: Parser,
  cursor: Cursor,
  depth: number
): ParseResult<TermReferenceNode> {
  const id = this.parseIdentifier(cursor.advance());
  if (!id.ok) return id;

  const attribute = this.parseAttributeAccessor(id.cursor);
  if (!attribute.ok) return attribute;

  let next = attribute.cursor;
  let args: CallArgumentsNode | null = null;
  const afterBlank = skipBlankInline(next);
  if (afterBlank.peek() === '(') {
    const call = this.parseCallArguments(afterBlank, depth);
    if (!call.ok) return call;
    args = call.value;
    next = call.cursor;
  }

  return success(
    {
      type: 'TermReference',
      id: id.value,
      attribute: attribute.value,
      arguments: args,
      span: { start: cursor.pos, end: next.pos },
    },
    next
  );
};

/**
 * identifier followed by `(` is a function call (name must be uppercase);
 * otherwise a message reference with optional `.attribute`.
 */
Parser.prototype.parseIdentifierExpression = function (
  this: Parser,
  cursor: Cursor,
  depth: number
): ParseResult<InlineExpressionNode> {
  const id = this.parseIdentifier(cursor);
  if (!id.ok) return id;

  const afterBlank = skipBlankInline(id.cursor);
  if (afterBlank.peek() === '(') {
    if (!isFunctionName(id.value.name)) {
      return invalidAt(
        cursor,
        `Function names must be all uppercase: '${id.value.name}'`
      );
    }
    const call = this.parseCallArguments(afterBlank, depth);
    if (!call.ok) return call;
    return success(
      {
        type: 'FunctionReference',
        id: id.value,
        arguments: call.value,
        span: { start: cursor.pos, end: call.cursor.pos },
      },
      call.cursor
    );
  }

  const attribute = this.parseAttributeAccessor(id.cursor);
  if (!attribute.ok) return attribute;
  return success(
    {
      type: 'MessageReference',
      id: id.value,
      attribute: attribute.value,
      span: { start: cursor.pos, end: attribute.cursor.pos },
    },
    attribute.cursor
  );
};

/** Optional `.identifier` directly after a reference id */
Parser.prototype.parseAttributeAccessor = function (
  this: Parser,
  cursor: Cursor
): ParseResult<IdentifierNode | null> {
  if (cursor.peek() !== '.') {
    return success(null, cursor);
  }
  return this.parseIdentifier(cursor.advance());
};

// ============================================================
// CALL ARGUMENTS
// ============================================================

/**
 * ( argument (, argument)* ,? )
 *
 * Positional arguments come first. A named argument is `name: literal`;
 * its name must be unique and its value a string or number literal.
 */
Parser.prototype.parseCallArguments = function (
  this: Parser,
  cursor: Cursor,
  depth: number
): ParseResult<CallArgumentsNode> {
  if (depth >= MAX_NESTING_DEPTH) {
    return invalidAt(cursor, NESTING_TOO_DEEP);
  }
  const positional: InlineExpressionNode[] = [];
  const named: NamedArgumentNode[] = [];
  const seenNames = new Set<string>();

  let next = cursor.advance(); // (
  for (;;) {
    next = skipBlank(next);
    if (next.peek() === ')') {
      next = next.advance();
      break;
    }

    const arg = this.parseInlineExpression(next, depth + 1);
    if (!arg.ok) return arg;
    next = skipBlank(arg.cursor);

    if (next.peek() === ':') {
      const nameExpr = arg.value;
      if (nameExpr.type !== 'MessageReference' || nameExpr.attribute) {
        return invalidAt(
          next,
          'Named argument names must be simple identifiers'
        );
      }
      const name = nameExpr.id.name;
      if (seenNames.has(name)) {
        return invalidAt(next, `Duplicate named argument '${name}'`);
      }
      seenNames.add(name);

      const valueStart = skipBlank(next.advance());
      const value = this.parseInlineExpression(valueStart, depth + 1);
      if (!value.ok) return value;
      if (
        value.value.type !== 'StringLiteral' &&
        value.value.type !== 'NumberLiteral'
      ) {
        return invalidAt(
          valueStart,
          `Named argument '${name}' must be a string or number literal. ` +
            'To vary an option by a variable, use a select expression: ' +
            `{ $var -> [a] { FN($x, ${name}: "a") } *[b] { FN($x, ${name}: "b") } }`,
          ['"string"', 'number']
        );
      }

      named.push({
        type: 'NamedArgument',
        name: nameExpr.id,
        value: value.value,
        span: { start: arg.value.span.start, end: value.cursor.pos },
      });
      next = skipBlank(value.cursor);
    } else {
      if (named.length > 0) {
        return invalidAt(
          arg.cursor,
          'Positional arguments must come before named arguments'
        );
      }
      positional.push(arg.value);
    }

    if (next.peek() === ',') {
      next = next.advance();
      continue;
    }
    if (next.peek() === ')') {
      next = next.advance();
      break;
    }
    return expectedAt(next, [',', ')']);
  }

  return success(
    {
      type: 'CallArguments',
      positional,
      named,
      span: { start: cursor.pos, end: next.pos },
    },
    next
  );
};
