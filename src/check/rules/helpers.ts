/**
 * Shared Helper Functions
 * Common utilities used across validation rules.
 */

import { locate } from '../../source-location.js';
import type {
  CheckDiagnostic,
  Severity,
  ValidationContext,
} from '../types.js';

/**
 * Extract source line at location for context display.
 * Splits source by newlines, retrieves the specified line (1-indexed), and trims it.
 */
export function extractContextLine(line: number, source: string): string {
  const lines = source.split('\n');
  const sourceLine = lines[line - 1];
  return sourceLine ? sourceLine.trim() : '';
}

/** Build a diagnostic positioned at a source offset */
export function diagnosticAt(
  context: ValidationContext,
  offset: number,
  code: string,
  severity: Severity,
  message: string
): CheckDiagnostic {
  const location = locate(context.source, offset);
  return {
    location,
    severity,
    code,
    message,
    context: extractContextLine(location.line, context.source),
  };
}
