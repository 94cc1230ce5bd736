/**
 * Parser Extension: Patterns
 * Text, placeables, select expressions and variants
 */

import { MAX_NESTING_DEPTH, NESTING_TOO_DEEP, Parser } from './parser.js';
import type { Cursor } from './cursor.js';
import type {
  InlineExpressionNode,
  PatternElementNode,
  PatternNode,
  PlaceableNode,
  SelectExpressionNode,
  VariantNode,
} from '../ast-nodes.js';
import {
  type ParseResult,
  expectedAt,
  invalidAt,
  success,
} from './result.js';
import {
  indentedContinuation,
  isDigit,
  isLineEnd,
  skipBlank,
  skipBlankInline,
  skipPatternStart,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePattern(
      cursor: Cursor,
      inVariant: boolean,
      depth?: number
    ): ParseResult<PatternNode>;
    parsePlaceable(cursor: Cursor, depth?: number): ParseResult<PlaceableNode>;
    parseSelectExpression(
      selector: InlineExpressionNode,
      cursor: Cursor,
      depth: number
    ): ParseResult<SelectExpressionNode>;
    parseVariant(cursor: Cursor, depth: number): ParseResult<VariantNode>;
  }
}

// ============================================================
// PATTERN
// ============================================================

/** Text run being assembled; continuation spaces merge into it */
interface TextDraft {
  readonly type: 'TextDraft';
  value: string;
  readonly start: number;
  end: number;
}

type ElementDraft = TextDraft | PlaceableNode;

function appendText(
  drafts: ElementDraft[],
  value: string,
  start: number,
  end: number
): void {
  const last = drafts[drafts.length - 1];
  if (last?.type === 'TextDraft') {
    last.value += value;
    last.end = end;
    return;
  }
  drafts.push({ type: 'TextDraft', value, start, end });
}

/** Drop trailing spaces from the last text run */
function trimTrailingSpaces(drafts: ElementDraft[]): void {
  const last = drafts[drafts.length - 1];
  if (last?.type !== 'TextDraft') return;

  const trimmed = last.value.replace(/ +$/, '');
  if (trimmed.length === 0) {
    drafts.pop();
    return;
  }
  const removed = last.value.length - trimmed.length;
  last.end = Math.max(last.start, last.end - removed);
  last.value = trimmed;
}

/** True when the character at cursor ends a text run */
function endsText(cursor: Cursor, inVariant: boolean): boolean {
  const char = cursor.peek();
  if (char === null || char === '{' || char === '}' || isLineEnd(cursor)) {
    return true;
  }
  if (!inVariant) return false;
  return char === '[' || (char === '*' && cursor.peek(1) === '[');
}

/**
 * Pattern: text and placeables up to the end of the line, continued on
 * indented lines. Each line break inside the pattern becomes one space.
 *
 * Inside a variant, `[`, `*[` and `}` also end the pattern so that
 * variants can share a line: `{ $n -> [one] One *[other] Many }`.
 * Outside a variant a stray `}` is a syntax error.
 */
Parser.prototype.parsePattern = function (
  this: Parser,
  cursor: Cursor,
  inVariant: boolean,
  depth = 0
): ParseResult<PatternNode> {
  const drafts: ElementDraft[] = [];
  let next = cursor;

  for (;;) {
    const char = next.peek();
    if (char === null) break;

    if (isLineEnd(next)) {
      const continued = indentedContinuation(next);
      if (continued === null) break;
      trimTrailingSpaces(drafts);
      appendText(drafts, ' ', next.pos, continued.pos);
      next = continued;
      continue;
    }

    if (char === '{') {
      const placeable = this.parsePlaceable(next, depth);
      if (!placeable.ok) return placeable;
      drafts.push(placeable.value);
      next = placeable.cursor;
      continue;
    }

    if (char === '}') {
      if (inVariant) break;
      return invalidAt(
        next,
        'Unbalanced \'}\' in text; write {"}"} for a literal brace'
      );
    }

    if (inVariant && endsText(next, inVariant)) break;

    const start = next.pos;
    do {
      next = next.advance();
    } while (!endsText(next, inVariant));
    appendText(drafts, next.slice(start), start, next.pos);
  }

  trimTrailingSpaces(drafts);

  const elements = drafts.map(
    (draft): PatternElementNode =>
      draft.type === 'TextDraft'
        ? {
            type: 'TextElement',
            value: draft.value,
            span: { start: draft.start, end: draft.end },
          }
        : draft
  );
  const last = elements[elements.length - 1];
  return success(
    {
      type: 'Pattern',
      elements,
      span: { start: cursor.pos, end: last ? last.span.end : cursor.pos },
    },
    next
  );
};

// ============================================================
// PLACEABLES
// ============================================================

/**
 * { blank? expression blank? }
 * A selector followed by `->` becomes a select expression.
 * depth counts the placeables and call argument lists around this one.
 */
Parser.prototype.parsePlaceable = function (
  this: Parser,
  cursor: Cursor,
  depth = 0
): ParseResult<PlaceableNode> {
  if (depth >= MAX_NESTING_DEPTH) {
    return invalidAt(cursor, NESTING_TOO_DEEP);
  }
  const expr = this.parseInlineExpression(
    skipBlank(cursor.advance()),
    depth + 1
  );
  if (!expr.ok) return expr;

  let next = skipBlank(expr.cursor);
  let expression: InlineExpressionNode | SelectExpressionNode = expr.value;

  if (next.peek() === '-' && next.peek(1) === '>') {
    if (expr.value.type === 'Placeable') {
      return invalidAt(next, 'A nested placeable cannot be used as a selector');
    }
    const select = this.parseSelectExpression(
      expr.value,
      next.advance(2),
      depth + 1
    );
    if (!select.ok) return select;
    expression = select.value;
    next = skipBlank(select.cursor);
  }

  const close = next.expect('}');
  if (close === null) {
    return expectedAt(next, ['}']);
  }

  return success(
    {
      type: 'Placeable',
      expression,
      span: { start: cursor.pos, end: close.pos },
    },
    close
  );
};

// ============================================================
// SELECT EXPRESSIONS
// ============================================================

/**
 * Variants following `->`, collected until anything that is not `[` or `*`.
 * Requires at least one variant and exactly one default.
 */
Parser.prototype.parseSelectExpression = function (
  this: Parser,
  selector: InlineExpressionNode,
  cursor: Cursor,
  depth: number
): ParseResult<SelectExpressionNode> {
  const variants: VariantNode[] = [];
  let next = cursor;

  for (;;) {
    next = skipBlank(next);
    const char = next.peek();
    if (char !== '[' && char !== '*') break;

    const variant = this.parseVariant(next, depth);
    if (!variant.ok) return variant;
    variants.push(variant.value);
    next = variant.cursor;
  }

  if (variants.length === 0) {
    return expectedAt(next, ['[', '*[']);
  }

  const defaults = variants.filter((v) => v.isDefault).length;
  if (defaults !== 1) {
    return invalidAt(
      next,
      `Select expression must have exactly one default variant (marked with *), found ${defaults}`
    );
  }

  return success(
    {
      type: 'SelectExpression',
      selector,
      variants,
      span: { start: selector.span.start, end: next.pos },
    },
    next
  );
};

/** *? [ key ] pattern, where key is a number or identifier */
Parser.prototype.parseVariant = function (
  this: Parser,
  cursor: Cursor,
  depth: number
): ParseResult<VariantNode> {
  const isDefault = cursor.peek() === '*';
  const afterStar = isDefault ? cursor.advance() : cursor;

  const open = afterStar.expect('[');
  if (open === null) {
    return expectedAt(afterStar, ['[']);
  }

  const keyStart = skipBlankInline(open);
  const first = keyStart.peek();
  const key =
    isDigit(first) || first === '-'
      ? this.parseNumberLiteral(keyStart)
      : this.parseIdentifier(keyStart);
  if (!key.ok) return key;

  const afterKey = skipBlankInline(key.cursor);
  const close = afterKey.expect(']');
  if (close === null) {
    return expectedAt(afterKey, [']']);
  }

  const valueStart = skipPatternStart(close);
  const value = this.parsePattern(valueStart, true, depth);
  if (!value.ok) return value;
  if (value.value.elements.length === 0) {
    return invalidAt(valueStart, 'Expected a value for the variant');
  }

  return success(
    {
      type: 'Variant',
      key: key.value,
      value: value.value,
      isDefault,
      span: { start: cursor.pos, end: value.value.span.end },
    },
    value.cursor
  );
};
