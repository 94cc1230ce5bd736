/**
 * Entry Rules
 * Duplicate definitions and unused terms.
 */

import type { ASTNode } from '../../ast-nodes.js';
import type {
  CheckDiagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { diagnosticAt } from './helpers.js';

// ============================================================
// DUPLICATE_ID RULE
// ============================================================

/**
 * Flags the second and later definitions of an id.
 * Messages and terms live in separate namespaces: `a` and `-a` never clash.
 */
export const DUPLICATE_ID: ValidationRule = {
  code: 'duplicate-id',
  category: 'usage',
  severity: 'warning',
  description: 'Message or term defined more than once',
  nodeTypes: ['Message', 'Term'],

  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[] {
    if (node.type !== 'Message' && node.type !== 'Term') return [];

    const key = node.type === 'Term' ? `-${node.id.name}` : node.id.name;
    if (!context.seenIds.has(key)) return [];

    const kind = node.type === 'Term' ? 'Term' : 'Message';
    return [
      diagnosticAt(
        context,
        node.span.start,
        this.code,
        this.severity,
        `${kind} '${key}' is already defined; this definition overrides it`
      ),
    ];
  },
};

// ============================================================
// UNUSED_TERM RULE
// ============================================================

export const UNUSED_TERM: ValidationRule = {
  code: 'unused-term',
  category: 'usage',
  severity: 'info',
  description: 'Term is never referenced',
  nodeTypes: ['Term'],

  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[] {
    if (node.type !== 'Term') return [];
    if (context.referencedTerms.has(node.id.name)) return [];

    return [
      diagnosticAt(
        context,
        node.span.start,
        this.code,
        this.severity,
        `Term '-${node.id.name}' is never used`
      ),
    ];
  },
};
