/**
 * Check Types
 * Type definitions for the ftl-check static analysis tool.
 */

import type { ASTNode, NodeType, ResourceNode } from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration ('warn' downgrades errors to warnings) */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/**
 * A single issue found during validation.
 * Distinct from the runtime Diagnostic: this one is positional and carries
 * the source line for display.
 */
export interface CheckDiagnostic {
  readonly location: SourceLocation;
  readonly severity: Severity;
  /** Rule code (e.g., duplicate-id) */
  readonly code: string;
  readonly message: string;
  /** Source line containing the issue */
  readonly context: string;
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/**
 * Configuration for check rules and severity overrides.
 * Controls which rules are active and at what severity level.
 */
export interface CheckConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Record<string, RuleState>;
  /** Severity overrides by rule code */
  readonly severity: Record<string, Severity>;
}

// ============================================================
// VALIDATION CONTEXT
// ============================================================

/**
 * Context for validation passes.
 * Resource-wide indexes are computed once before traversal; seenIds is
 * filled in as entries are visited.
 */
export interface ValidationContext {
  readonly source: string;
  readonly resource: ResourceNode;
  readonly config: CheckConfig;
  /** Message ids defined anywhere in the resource */
  readonly messageIds: ReadonlySet<string>;
  /** Term ids (without '-') defined anywhere in the resource */
  readonly termIds: ReadonlySet<string>;
  /** Term ids referenced from any message or term */
  readonly referencedTerms: ReadonlySet<string>;
  /** Entry keys ('id' or '-id') already visited, for duplicate detection */
  readonly seenIds: Set<string>;
}

// ============================================================
// VALIDATION RULES
// ============================================================

/** Rule category for grouping and organization */
export type RuleCategory = 'syntax' | 'references' | 'usage';

/**
 * Validation rule interface.
 * Rules are stateless - all context passed via ValidationContext.
 * Rules return diagnostics, never throw.
 */
export interface ValidationRule {
  /** Unique rule code (e.g., undefined-term-reference) */
  readonly code: string;
  readonly category: RuleCategory;
  /** Default severity level */
  readonly severity: Severity;
  readonly description: string;
  /** Node types this rule applies to */
  readonly nodeTypes: NodeType[];

  /**
   * Validate a node, returning diagnostics for violations.
   * Called for each node matching nodeTypes. The severity on returned
   * diagnostics is replaced by the configured one.
   */
  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[];
}
