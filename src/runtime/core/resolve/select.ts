/**
 * Resolver Extension: Select Expressions
 */

import {
  Resolver,
  type ResolutionState,
  type Resolved,
  failed,
  resolved,
} from './resolver.js';
import type { SelectExpressionNode, VariantNode } from '../../../ast-nodes.js';
import { createDiagnostic } from '../../../diagnostics.js';
import {
  numericValue,
  pluralTypeOf,
  selectorText,
  type FluentValue,
} from '../values.js';

// Declaration merging to add methods to Resolver interface
declare module './resolver.js' {
  interface Resolver {
    resolveSelectExpression(
      expr: SelectExpressionNode,
      state: ResolutionState
    ): Resolved;
    selectVariant(
      variants: readonly VariantNode[],
      value: FluentValue
    ): VariantNode | undefined;
  }
}

/**
 * Pick a variant and resolve its pattern.
 * A selector that fails to resolve keeps its diagnostic and selects the
 * default variant.
 */
Resolver.prototype.resolveSelectExpression = function (
  this: Resolver,
  expr: SelectExpressionNode,
  state: ResolutionState
): Resolved {
  if (expr.variants.length === 0) {
    state.diagnostics.push(createDiagnostic('NO_VARIANTS'));
    return failed('{???}');
  }

  const selector = this.resolveExpression(expr.selector, state);
  const variant = selector.ok
    ? this.selectVariant(expr.variants, selector.value)
    : defaultVariant(expr.variants);

  if (!variant) {
    state.diagnostics.push(createDiagnostic('NO_VARIANTS'));
    return failed('{???}');
  }
  return resolved(this.resolvePattern(variant.value, state));
};

/**
 * Matching order:
 * 1. exact key: identifier keys against the value's text, number keys
 *    numerically against numeric values
 * 2. plural category, for numeric values
 * 3. the default variant
 * 4. the first variant
 */
Resolver.prototype.selectVariant = function (
  this: Resolver,
  variants: readonly VariantNode[],
  value: FluentValue
): VariantNode | undefined {
  const numeric = numericValue(value);
  const text = selectorText(value);

  const exact = variants.find((variant) =>
    variant.key.type === 'Identifier'
      ? variant.key.name === text
      : numeric !== null && variant.key.value === numeric
  );
  if (exact) return exact;

  if (numeric !== null) {
    const category = this.pluralCategory(
      numeric,
      this.locale,
      pluralTypeOf(value)
    );
    const plural = variants.find(
      (variant) =>
        variant.key.type === 'Identifier' && variant.key.name === category
    );
    if (plural) return plural;
  }

  return defaultVariant(variants);
};

function defaultVariant(
  variants: readonly VariantNode[]
): VariantNode | undefined {
  return variants.find((variant) => variant.isDefault) ?? variants[0];
}
