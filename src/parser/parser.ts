/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Grammar rules are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 *
 * Rules take a Cursor and return a ParseResult; the parser itself holds
 * only its options, so one instance can be shared freely.
 */

import type { ResourceNode } from '../ast-nodes.js';
import { Cursor } from './cursor.js';

/** Placeables and call argument lists may enclose each other this deep */
export const MAX_NESTING_DEPTH = 100;

export const NESTING_TOO_DEEP = `Placeables and call arguments nest deeper than ${MAX_NESTING_DEPTH} levels`;

export interface ParserOptions {
  /**
   * Attach a `#` comment directly preceding a message or term to that entry
   * instead of emitting it as a standalone Comment (default: true).
   */
  readonly attachComments?: boolean | undefined;
}

/**
 * Parser that converts FTL source into a Resource.
 *
 * Rules are organized across multiple files:
 * - parser-resource.ts: Top-level loop, comments, junk recovery
 * - parser-entries.ts: Messages, terms, attributes
 * - parser-pattern.ts: Patterns, placeables, select expressions
 * - parser-expr.ts: Inline expressions, references, call arguments
 * - parser-literals.ts: Identifiers, numbers, string literals
 *
 * @example
 * ```typescript
 * const parser = new Parser();
 * const resource = parser.parse('hello = Hello, world!');
 * ```
 */
export class Parser {
  readonly attachComments: boolean;

  constructor(options: ParserOptions = {}) {
    this.attachComments = options.attachComments ?? true;
  }

  /**
   * Parse source into a Resource. Never throws on malformed input;
   * unparseable entries become Junk.
   */
  parse(source: string): ResourceNode {
    return this.parseResource(new Cursor(source));
  }
}
