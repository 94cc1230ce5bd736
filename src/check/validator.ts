/**
 * Resource Validator
 * Orchestrates validation by traversing the AST and invoking enabled rules.
 */

import type { ASTNode, ResourceNode } from '../ast-nodes.js';
import type {
  CheckConfig,
  CheckDiagnostic,
  Severity,
  ValidationContext,
  ValidationRule,
} from './types.js';
import { collectReferences } from './references.js';
import { visitNode, type NodeVisitor } from './visitor.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Validate a parsed resource against all enabled rules.
 * Returns diagnostics sorted by line number, then column.
 *
 * @param source - Original source text for locations and context lines
 * @param config - Configuration determining which rules are active
 */
export function validateResource(
  resource: ResourceNode,
  source: string,
  config: CheckConfig
): CheckDiagnostic[] {
  const messageIds = new Set<string>();
  const termIds = new Set<string>();
  for (const entry of resource.body) {
    if (entry.type === 'Message') messageIds.add(entry.id.name);
    if (entry.type === 'Term') termIds.add(entry.id.name);
  }

  const context: ValidationContext = {
    source,
    resource,
    config,
    messageIds,
    termIds,
    referencedTerms: collectReferences(resource).terms,
    seenIds: new Set(),
  };
  const diagnostics: CheckDiagnostic[] = [];

  const visitor: NodeVisitor<ValidationContext> = {
    enter(node: ASTNode, ctx: ValidationContext): void {
      for (const rule of VALIDATION_RULES) {
        if (!isRuleEnabled(rule.code, ctx.config)) {
          continue;
        }
        if (!rule.nodeTypes.includes(node.type)) {
          continue;
        }

        const severity = effectiveSeverity(rule, ctx.config);
        for (const diagnostic of rule.validate(node, ctx)) {
          diagnostics.push({ ...diagnostic, severity });
        }
      }

      // Track definitions AFTER rules check (for duplicate detection)
      if (node.type === 'Message') {
        ctx.seenIds.add(node.id.name);
      } else if (node.type === 'Term') {
        ctx.seenIds.add(`-${node.id.name}`);
      }
    },
  };

  visitNode(resource, context, visitor);

  return sortDiagnostics(diagnostics);
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Check if a rule is enabled based on configuration.
 * Rules are enabled if state is 'on' or 'warn'.
 */
export function isRuleEnabled(ruleCode: string, config: CheckConfig): boolean {
  const state = config.rules[ruleCode];
  return state === 'on' || state === 'warn';
}

/**
 * Configured severity for a rule, falling back to the rule's default.
 * State 'warn' caps the severity at 'warning'.
 */
function effectiveSeverity(rule: ValidationRule, config: CheckConfig): Severity {
  const severity = config.severity[rule.code] ?? rule.severity;
  if (config.rules[rule.code] === 'warn' && severity === 'error') {
    return 'warning';
  }
  return severity;
}

/**
 * Sort diagnostics by line number first, then column number.
 * Stable sort preserves original order for diagnostics at same location.
 */
function sortDiagnostics(diagnostics: CheckDiagnostic[]): CheckDiagnostic[] {
  return [...diagnostics].sort((a, b) => {
    if (a.location.line !== b.location.line) {
      return a.location.line - b.location.line;
    }
    return a.location.column - b.location.column;
  });
}
