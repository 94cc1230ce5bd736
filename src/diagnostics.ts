/**
 * Diagnostics
 * Structured, immutable records of reference, resolution and syntax problems.
 * Returned by value from the parser and resolver; never thrown on expected paths.
 */

import type { SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  getHelpUrl,
  renderMessage,
  type DiagnosticCode,
  type ErrorCategory,
} from './error-registry.js';

export interface Diagnostic {
  readonly code: DiagnosticCode;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly hint?: string | undefined;
  readonly helpUrl?: string | undefined;
}

/**
 * Create a diagnostic from the registry.
 *
 * @throws TypeError if code is not registered (programming error)
 *
 * @example
 * createDiagnostic('VARIABLE_NOT_PROVIDED', { name: 'count' })
 * // message: "Variable '$count' not provided"
 */
export function createDiagnostic(
  code: DiagnosticCode,
  context: Record<string, unknown> = {},
  span?: SourceSpan
): Diagnostic {
  const definition = ERROR_REGISTRY.get(code);
  if (!definition) {
    throw new TypeError(`Unknown diagnostic code: ${code}`);
  }

  const hint = definition.hintTemplate
    ? renderMessage(definition.hintTemplate, context)
    : undefined;
  const helpUrl = getHelpUrl(code);

  return Object.freeze({
    code,
    category: definition.category,
    message: renderMessage(definition.messageTemplate, context),
    span,
    hint,
    helpUrl: helpUrl || undefined,
  });
}

/**
 * Render a diagnostic in compiler style:
 *
 * ```
 * error[MESSAGE_NOT_FOUND]: Message 'hello' not found
 *   --> line 5, column 10
 *   = help: Check that the message is defined in the loaded resources
 *   = note: see https://projectfluent.org/fluent/guide/messages.html
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const parts = [`error[${diagnostic.code}]: ${diagnostic.message}`];
  if (diagnostic.span) {
    parts.push(
      `  --> line ${diagnostic.span.line}, column ${diagnostic.span.column}`
    );
  }
  if (diagnostic.hint) {
    parts.push(`  = help: ${diagnostic.hint}`);
  }
  if (diagnostic.helpUrl) {
    parts.push(`  = note: see ${diagnostic.helpUrl}`);
  }
  return parts.join('\n');
}

/** Numeric code of a diagnostic (1001, 2001, ...) */
export function diagnosticNumber(diagnostic: Diagnostic): number {
  return ERROR_REGISTRY.get(diagnostic.code)?.number ?? 0;
}
