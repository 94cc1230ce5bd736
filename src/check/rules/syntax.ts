/**
 * Syntax Rules
 * Surfaces Junk entries produced by the parser.
 */

import type { ASTNode } from '../../ast-nodes.js';
import type {
  CheckDiagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { diagnosticAt } from './helpers.js';

// ============================================================
// SYNTAX_ERROR RULE
// ============================================================

/**
 * One diagnostic per Junk entry, positioned at the first annotation
 * (where the parser gave up) and using its message.
 */
export const SYNTAX_ERROR: ValidationRule = {
  code: 'syntax-error',
  category: 'syntax',
  severity: 'error',
  description: 'Entry could not be parsed',
  nodeTypes: ['Junk'],

  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[] {
    if (node.type !== 'Junk') return [];

    const annotation = node.annotations[0];
    const offset = annotation ? annotation.span.start : node.span.start;
    const message = annotation ? annotation.message : 'Unparsed content';
    return [diagnosticAt(context, offset, this.code, this.severity, message)];
  },
};
