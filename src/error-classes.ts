/**
 * Error Classes
 * Throwable wrappers around diagnostics, plus the cursor invariant violation.
 */

import type { Diagnostic } from './diagnostics.js';
import type { DiagnosticCode, ErrorCategory } from './error-registry.js';
import type { SourceSpan } from './source-location.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface FtlErrorData {
  readonly code: DiagnosticCode;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly helpUrl?: string | undefined;
  readonly hint?: string | undefined;
  readonly span?: SourceSpan | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class for raised diagnostics.
 * The resolver never throws these; they exist for callers that want to
 * escalate a diagnostic (strict mode in tooling, test assertions).
 */
export class FtlError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    const locationStr = diagnostic.span
      ? ` at ${diagnostic.span.line}:${diagnostic.span.column}`
      : '';
    super(`${diagnostic.message}${locationStr}`);
    this.name = 'FtlError';
    this.diagnostic = diagnostic;
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }

  get helpUrl(): string | undefined {
    return this.diagnostic.helpUrl;
  }

  /** Get structured error data for custom formatting */
  toData(): FtlErrorData {
    return {
      code: this.diagnostic.code,
      category: this.diagnostic.category,
      message: this.diagnostic.message,
      helpUrl: this.diagnostic.helpUrl,
      hint: this.diagnostic.hint,
      span: this.diagnostic.span,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: FtlErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function requireCategory(diagnostic: Diagnostic, category: ErrorCategory): void {
  if (diagnostic.category !== category) {
    throw new TypeError(
      `Expected ${category} diagnostic, got: ${diagnostic.code}`
    );
  }
}

/** Unknown message, term, attribute or variable */
export class FtlReferenceError extends FtlError {
  constructor(diagnostic: Diagnostic) {
    requireCategory(diagnostic, 'reference');
    super(diagnostic);
    this.name = 'FtlReferenceError';
  }
}

/** Cycles, missing variants, function failures */
export class FtlResolutionError extends FtlError {
  constructor(diagnostic: Diagnostic) {
    requireCategory(diagnostic, 'resolution');
    super(diagnostic);
    this.name = 'FtlResolutionError';
  }
}

/** Grammar violations surfaced from Junk annotations */
export class FtlSyntaxError extends FtlError {
  constructor(diagnostic: Diagnostic) {
    requireCategory(diagnostic, 'syntax');
    super(diagnostic);
    this.name = 'FtlSyntaxError';
  }
}

/** Display text that could not be read back as a number, date or amount */
export class FtlParsingError extends FtlError {
  constructor(diagnostic: Diagnostic) {
    requireCategory(diagnostic, 'parsing');
    super(diagnostic);
    this.name = 'FtlParsingError';
  }
}

/** Raise a diagnostic as the error class matching its category */
export function toError(diagnostic: Diagnostic): FtlError {
  switch (diagnostic.category) {
    case 'reference':
      return new FtlReferenceError(diagnostic);
    case 'resolution':
      return new FtlResolutionError(diagnostic);
    case 'syntax':
      return new FtlSyntaxError(diagnostic);
    case 'parsing':
      return new FtlParsingError(diagnostic);
  }
}

// ============================================================
// INVARIANT VIOLATIONS
// ============================================================

/**
 * Reading the current character at end of input.
 * A bug in the calling grammar rule, never a property of user data.
 */
export class CursorEofError extends Error {
  readonly position: number;

  constructor(position: number) {
    super(`Cursor read past end of input at position ${position}`);
    this.name = 'CursorEofError';
    this.position = position;
  }
}
