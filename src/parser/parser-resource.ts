/**
 * Parser Extension: Resource
 * Top-level entry loop, comments, and junk recovery
 */

import { Parser } from './parser.js';
import type { Cursor } from './cursor.js';
import type {
  CommentKind,
  CommentNode,
  EntryNode,
  JunkNode,
  ResourceNode,
} from '../ast-nodes.js';
import {
  type ParseFailure,
  type ParseResult,
  type Parsed,
  invalidAt,
  success,
} from './result.js';
import {
  isAsciiLetter,
  isEntryStart,
  isLineEnd,
  skipBlank,
  skipLineEnd,
  skipToNextLine,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseResource(cursor: Cursor): ResourceNode;
    parseComment(cursor: Cursor): ParseResult<CommentNode>;
    parseJunk(cursor: Cursor, failure: ParseFailure): Parsed<JunkNode>;
  }
}

const COMMENT_KINDS: readonly CommentKind[] = ['comment', 'group', 'resource'];

// ============================================================
// RESOURCE
// ============================================================

/**
 * Top-level loop. Never fails: an entry that does not parse becomes Junk
 * and scanning resumes at the next line that can start an entry.
 */
Parser.prototype.parseResource = function (
  this: Parser,
  cursor: Cursor
): ResourceNode {
  const body: EntryNode[] = [];
  let pendingComment: CommentNode | null = null;
  let next = skipBlank(cursor);

  const flushComment = (): void => {
    if (pendingComment !== null) {
      body.push(pendingComment);
      pendingComment = null;
    }
  };

  while (!next.isEof) {
    const start = next;

    if (start.current === '#') {
      const comment = this.parseComment(start);
      if (comment.ok) {
        flushComment();
        if (
          this.attachComments &&
          comment.value.kind === 'comment' &&
          startsEntryOnNextLine(comment.cursor)
        ) {
          pendingComment = comment.value;
        } else {
          body.push(comment.value);
        }
        next = skipBlank(comment.cursor);
        continue;
      }
      flushComment();
      const junk = this.parseJunk(start, comment.error);
      body.push(junk.value);
      next = skipBlank(junk.cursor);
      continue;
    }

    const entry =
      start.current === '-' ? this.parseTerm(start) : this.parseMessage(start);

    if (entry.ok) {
      const comment: CommentNode | null = pendingComment;
      pendingComment = null;
      body.push(comment ? { ...entry.value, comment } : entry.value);
      next = skipBlank(entry.cursor);
    } else {
      flushComment();
      const junk = this.parseJunk(start, entry.error);
      body.push(junk.value);
      next = skipBlank(junk.cursor);
    }
  }

  flushComment();

  return {
    type: 'Resource',
    body,
    span: { start: cursor.pos, end: next.pos },
  };
};

/** The line after this line end begins a message or term */
function startsEntryOnNextLine(cursor: Cursor): boolean {
  if (!isLineEnd(cursor)) return false;
  const lineStart = skipLineEnd(cursor);
  const first = lineStart.peek();
  return first === '-' || isAsciiLetter(first);
}

// ============================================================
// COMMENTS
// ============================================================

interface CommentLine {
  readonly level: number;
  readonly content: string;
}

/** One line of 1-3 `#`, an optional space, then content to end of line */
function readCommentLine(cursor: Cursor): ParseResult<CommentLine> {
  const hashesEnd = cursor.skipWhile((c) => c === '#');
  const level = hashesEnd.pos - cursor.pos;
  if (level > 3) {
    return invalidAt(
      cursor,
      `Comments start with at most three '#' characters, found ${level}`
    );
  }

  const contentStart = hashesEnd.peek() === ' ' ? hashesEnd.advance() : hashesEnd;
  let end = contentStart;
  while (!end.isEof && !isLineEnd(end)) {
    end = end.advance();
  }
  return success({ level, content: end.slice(contentStart.pos) }, end);
}

/**
 * Comment block. Consecutive lines with the same number of `#` merge into
 * one Comment with contents joined by newlines.
 */
Parser.prototype.parseComment = function (
  this: Parser,
  cursor: Cursor
): ParseResult<CommentNode> {
  const first = readCommentLine(cursor);
  if (!first.ok) return first;

  const lines = [first.value.content];
  let next = first.cursor;

  while (isLineEnd(next)) {
    const lineStart = skipLineEnd(next);
    if (lineStart.peek() !== '#') break;
    const line = readCommentLine(lineStart);
    if (!line.ok || line.value.level !== first.value.level) break;
    lines.push(line.value.content);
    next = line.cursor;
  }

  const kind = COMMENT_KINDS[first.value.level - 1] ?? 'comment';
  return success(
    {
      type: 'Comment',
      kind,
      content: lines.join('\n'),
      span: { start: cursor.pos, end: next.pos },
    },
    next
  );
};

// ============================================================
// JUNK RECOVERY
// ============================================================

/**
 * Consume the failed entry's first line unconditionally, then every line
 * until one starts with `#`, `-` or a letter. Always advances.
 */
Parser.prototype.parseJunk = function (
  this: Parser,
  cursor: Cursor,
  failure: ParseFailure
): Parsed<JunkNode> {
  let end = skipToNextLine(cursor);
  if (end.pos === cursor.pos) {
    end = cursor.advance();
  }
  while (!end.isEof && !isEntryStart(end.peek())) {
    end = skipToNextLine(end);
  }

  return success(
    {
      type: 'Junk',
      content: end.slice(cursor.pos),
      annotations: [
        {
          type: 'Annotation',
          code: failure.code,
          message: failure.message,
          arguments: [...failure.expected],
          span: { start: failure.cursor.pos, end: failure.cursor.pos },
        },
      ],
      span: { start: cursor.pos, end: end.pos },
    },
    end
  );
};
