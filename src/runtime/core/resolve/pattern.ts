/**
 * Resolver Extension: Patterns
 * Pattern assembly, expression dispatch and fallback text
 */

import {
  FSI,
  PDI,
  Resolver,
  type ResolutionState,
  type Resolved,
  failed,
  resolved,
} from './resolver.js';
import type { ExpressionNode, PatternNode } from '../../../ast-nodes.js';
import { createDiagnostic } from '../../../diagnostics.js';
import { formatValue, isInvalidDate, type FluentValue } from '../values.js';

// Declaration merging to add methods to Resolver interface
declare module './resolver.js' {
  interface Resolver {
    resolvePattern(pattern: PatternNode, state: ResolutionState): string;
    resolveExpression(expr: ExpressionNode, state: ResolutionState): Resolved;
    formatPlaceable(
      value: FluentValue,
      expr: ExpressionNode,
      state: ResolutionState
    ): string;
    stringify(value: FluentValue): string;
  }
}

// ============================================================
// PATTERN
// ============================================================

/**
 * Concatenate text elements and resolved placeables.
 * Successful placeables are isolated when enabled; fallbacks never are.
 */
Resolver.prototype.resolvePattern = function (
  this: Resolver,
  pattern: PatternNode,
  state: ResolutionState
): string {
  let result = '';

  for (const element of pattern.elements) {
    if (element.type === 'TextElement') {
      result += element.value;
      continue;
    }

    const value = this.resolveExpression(element.expression, state);
    if (!value.ok) {
      result += value.fallback;
      continue;
    }
    result += this.formatPlaceable(value.value, element.expression, state);
  }

  return result;
};

/**
 * Display text for one placeable value. A value that cannot be formatted
 * (an invalid date, a wrapper with bad Intl options) gets the same
 * fallback as a failed expression.
 */
Resolver.prototype.formatPlaceable = function (
  this: Resolver,
  value: FluentValue,
  expr: ExpressionNode,
  state: ResolutionState
): string {
  if (isInvalidDate(value)) {
    return formatFailed(expr, 'Invalid time value', state);
  }
  let text: string;
  try {
    text = this.stringify(value);
  } catch (err) {
    return formatFailed(
      expr,
      err instanceof Error ? err.message : String(err),
      state
    );
  }
  return this.useIsolating ? `${FSI}${text}${PDI}` : text;
};

function formatFailed(
  expr: ExpressionNode,
  reason: string,
  state: ResolutionState
): string {
  const fallback = fallbackFor(expr);
  state.diagnostics.push(
    createDiagnostic('FORMAT_FAILED', { id: fallback.slice(1, -1), reason })
  );
  return fallback;
}

/** Readable stand-in text derived from the shape of an expression */
function fallbackFor(expr: ExpressionNode): string {
  switch (expr.type) {
    case 'VariableReference':
      return `{$${expr.id.name}}`;
    case 'MessageReference':
      return expr.attribute
        ? `{${expr.id.name}.${expr.attribute.name}}`
        : `{${expr.id.name}}`;
    case 'TermReference':
      return expr.attribute
        ? `{-${expr.id.name}.${expr.attribute.name}}`
        : `{-${expr.id.name}}`;
    case 'FunctionReference':
      return `{${expr.id.name}(...)}`;
    case 'Placeable':
      return fallbackFor(expr.expression);
    default:
      return '{???}';
  }
}

Resolver.prototype.stringify = function (
  this: Resolver,
  value: FluentValue
): string {
  return formatValue(value, this.locale);
};

// ============================================================
// EXPRESSION DISPATCH
// ============================================================

Resolver.prototype.resolveExpression = function (
  this: Resolver,
  expr: ExpressionNode,
  state: ResolutionState
): Resolved {
  switch (expr.type) {
    case 'StringLiteral':
      return resolved(expr.value);
    case 'NumberLiteral':
      return resolved(expr.value);
    case 'VariableReference':
      return this.resolveVariable(expr, state);
    case 'MessageReference':
      return this.resolveMessageReference(expr, state);
    case 'TermReference':
      return this.resolveTermReference(expr, state);
    case 'FunctionReference':
      return this.resolveFunctionCall(expr, state);
    case 'SelectExpression':
      return this.resolveSelectExpression(expr, state);
    case 'Placeable':
      return this.resolveExpression(expr.expression, state);
    default: {
      // Only reachable with hand-built trees
      const _exhaustive: never = expr;
      state.diagnostics.push(
        createDiagnostic('UNKNOWN_EXPRESSION', { kind: describeNode(_exhaustive) })
      );
      return failed('{???}');
    }
  }
};

function describeNode(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return typeof value;
}
