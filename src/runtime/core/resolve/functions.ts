/**
 * Resolver Extension: Function Calls
 */

import {
  Resolver,
  type ResolutionState,
  type Resolved,
  failed,
  resolved,
} from './resolver.js';
import type { FunctionReferenceNode } from '../../../ast-nodes.js';
import { createDiagnostic } from '../../../diagnostics.js';
import type { FluentValue } from '../values.js';

// Declaration merging to add methods to Resolver interface
declare module './resolver.js' {
  interface Resolver {
    resolveFunctionCall(
      expr: FunctionReferenceNode,
      state: ResolutionState
    ): Resolved;
  }
}

/**
 * Evaluate arguments, then call through the registry.
 *
 * Only the registry's own built-ins receive the locale: a custom function
 * registered under a built-in name is called with its arguments alone.
 * An argument that fails, a missing function, or a thrown error all
 * produce the `{NAME(...)}` fallback.
 */
Resolver.prototype.resolveFunctionCall = function (
  this: Resolver,
  expr: FunctionReferenceNode,
  state: ResolutionState
): Resolved {
  const name = expr.id.name;
  const fallback = `{${name}(...)}`;

  const positional: FluentValue[] = [];
  for (const arg of expr.arguments.positional) {
    const value = this.resolveExpression(arg, state);
    if (!value.ok) return failed(fallback);
    positional.push(value.value);
  }

  const named: Record<string, FluentValue> = {};
  for (const arg of expr.arguments.named) {
    named[arg.name.name] = arg.value.value;
  }

  if (!this.functions.hasFunction(name)) {
    state.diagnostics.push(
      createDiagnostic('FUNCTION_NOT_FOUND', {
        name,
        builtins: this.functions.names(),
      })
    );
    return failed(fallback);
  }

  this.onFunctionCall?.({ name, positional, named });

  const locale = this.functions.isBuiltin(name) ? this.locale : undefined;
  try {
    return resolved(this.functions.call(name, positional, named, locale));
  } catch (err) {
    state.diagnostics.push(
      createDiagnostic('FUNCTION_FAILED', {
        name,
        reason: err instanceof Error ? err.message : String(err),
      })
    );
    return failed(fallback);
  }
};
