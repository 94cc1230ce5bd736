/**
 * FTL Parser
 * Main entry point and re-exports
 */

import type { ResourceNode } from '../ast-nodes.js';
import { Parser, type ParserOptions } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-resource.js';
import './parser-entries.js';
import './parser-pattern.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

const defaultParser = new Parser();

/**
 * Parse FTL source into a Resource.
 *
 * Total: never throws on malformed input. Entries that fail to parse are
 * kept as Junk nodes carrying an annotation that describes the failure.
 *
 * @example
 * ```typescript
 * const resource = parse('hello = Hello, world!');
 * resource.body[0]; // Message "hello"
 * ```
 */
export function parse(source: string, options?: ParserOptions): ResourceNode {
  const parser = options ? new Parser(options) : defaultParser;
  return parser.parse(source);
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { Parser, type ParserOptions } from './parser.js';
export { Cursor } from './cursor.js';
export type {
  ParseFailure,
  ParseFailed,
  ParseResult,
  Parsed,
} from './result.js';
export { isFunctionName } from './helpers.js';
