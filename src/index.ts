/**
 * ftlkit
 * Exports the FTL parser, AST types, static checks, runtime and serializer
 */

// ============================================================
// AST AND PARSER
// ============================================================
export type * from './ast-nodes.js';
export {
  parse,
  Parser,
  Cursor,
  isFunctionName,
  type ParserOptions,
  type ParseFailure,
  type ParseFailed,
  type ParseResult,
  type Parsed,
} from './parser/index.js';
export {
  locate,
  type SourceLocation,
  type SourceSpan,
  type Span,
} from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ERROR_REGISTRY,
  getHelpUrl,
  renderMessage,
  type DiagnosticCode,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type ParsingCode,
  type ReferenceCode,
  type ResolutionCode,
  type SyntaxCode,
} from './error-registry.js';
export {
  createDiagnostic,
  diagnosticNumber,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics.js';
export {
  CursorEofError,
  FtlError,
  FtlParsingError,
  FtlReferenceError,
  FtlResolutionError,
  FtlSyntaxError,
  toError,
  type FtlErrorData,
} from './error-classes.js';

// ============================================================
// TREE TOOLS AND CHECKS
// ============================================================
export * from './check/index.js';
export {
  MessageIntrospection,
  extractVariables,
  introspectMessage,
  type FunctionCallInfo,
  type ReferenceInfo,
  type VariableContext,
  type VariableInfo,
} from './introspection.js';
export { serialize, type SerializeOptions } from './serializer.js';

// ============================================================
// RUNTIME
// ============================================================
export * from './runtime/index.js';
