/**
 * Cursor: immutable source positions
 */

import { describe, it, expect } from 'vitest';
import { Cursor, CursorEofError } from '../../src/index.js';

describe('Cursor', () => {
  it('reads the current character', () => {
    const cursor = new Cursor('abc', 1);

    expect(cursor.current).toBe('b');
    expect(cursor.isEof).toBe(false);
  });

  it('throws CursorEofError when reading current at end of input', () => {
    const cursor = new Cursor('ab', 2);

    expect(cursor.isEof).toBe(true);
    expect(() => cursor.current).toThrow(CursorEofError);
    expect(() => cursor.current).toThrow(
      'Cursor read past end of input at position 2'
    );
  });

  it('peeks without failing past either end', () => {
    const cursor = new Cursor('ab');

    expect(cursor.peek()).toBe('a');
    expect(cursor.peek(1)).toBe('b');
    expect(cursor.peek(2)).toBeNull();
    expect(cursor.peek(-1)).toBeNull();
  });

  it('returns a new cursor on advance and leaves the original alone', () => {
    const start = new Cursor('abc');
    const next = start.advance();

    expect(start.pos).toBe(0);
    expect(next.pos).toBe(1);
    expect(next).not.toBe(start);
  });

  it('clamps advance at end of input', () => {
    expect(new Cursor('abc', 2).advance(10).pos).toBe(3);
    expect(new Cursor('abc', 3).advance().pos).toBe(3);
  });

  it('returns itself for a non-positive advance', () => {
    const cursor = new Cursor('abc', 1);

    expect(cursor.advance(0)).toBe(cursor);
    expect(cursor.advance(-2)).toBe(cursor);
  });

  it('clamps the initial position', () => {
    expect(new Cursor('ab', 9).pos).toBe(2);
    expect(new Cursor('ab', -3).pos).toBe(0);
  });

  it('slices up to the current position by default', () => {
    const cursor = new Cursor('hello world', 5);

    expect(cursor.slice(0)).toBe('hello');
    expect(cursor.slice(6, 11)).toBe('world');
  });

  it('skips while a predicate holds', () => {
    const cursor = new Cursor('   x');

    expect(cursor.skipWhile((c) => c === ' ').pos).toBe(3);
    expect(cursor.skipWhile((c) => c === 'y')).toBe(cursor);
  });

  it('consumes an expected character or returns null', () => {
    const cursor = new Cursor('=x');

    expect(cursor.expect('=')?.pos).toBe(1);
    expect(cursor.expect('x')).toBeNull();
  });

  it('computes 1-based line and column', () => {
    expect(new Cursor('ab\ncd', 4).lineCol()).toEqual({ line: 2, column: 2 });
    expect(new Cursor('ab\ncd', 0).lineCol()).toEqual({ line: 1, column: 1 });
  });
});
