/**
 * Cursor
 * Immutable position into FTL source text.
 *
 * Every operation returns a new Cursor. Grammar rules reassign their local
 * cursor on each step, so a rule that forgets to advance stalls visibly
 * instead of corrupting shared state.
 */

import { CursorEofError } from '../error-classes.js';
import { locate } from '../source-location.js';

export class Cursor {
  readonly source: string;
  readonly pos: number;

  constructor(source: string, pos = 0) {
    this.source = source;
    this.pos = Math.max(0, Math.min(pos, source.length));
  }

  get isEof(): boolean {
    return this.pos >= this.source.length;
  }

  /**
   * Character at the current position.
   * @throws CursorEofError at end of input; check isEof or use peek() first
   */
  get current(): string {
    if (this.isEof) {
      throw new CursorEofError(this.pos);
    }
    return this.source.charAt(this.pos);
  }

  /** Character at pos + offset, or null past either end */
  peek(offset = 0): string | null {
    const index = this.pos + offset;
    if (index < 0 || index >= this.source.length) {
      return null;
    }
    return this.source.charAt(index);
  }

  /** Move forward, clamping at end of input */
  advance(count = 1): Cursor {
    if (count <= 0) return this;
    return new Cursor(this.source, this.pos + count);
  }

  slice(from: number, to: number = this.pos): string {
    return this.source.slice(from, to);
  }

  /** Advance while predicate holds for the current character */
  skipWhile(predicate: (char: string) => boolean): Cursor {
    let end = this.pos;
    while (end < this.source.length && predicate(this.source.charAt(end))) {
      end++;
    }
    return end === this.pos ? this : new Cursor(this.source, end);
  }

  /** Consume char if it is next, otherwise null */
  expect(char: string): Cursor | null {
    return this.peek() === char ? this.advance() : null;
  }

  /** 1-based line and column. O(n); diagnostics only. */
  lineCol(): { line: number; column: number } {
    const { line, column } = locate(this.source, this.pos);
    return { line, column };
  }
}
