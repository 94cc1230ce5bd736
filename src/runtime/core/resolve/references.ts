/**
 * Resolver Extension: References
 * Variables, message and term references, and the cycle check
 */

import {
  Resolver,
  type ResolutionState,
  type Resolved,
  failed,
  resolved,
} from './resolver.js';
import type {
  MessageReferenceNode,
  PatternNode,
  TermReferenceNode,
  VariableReferenceNode,
} from '../../../ast-nodes.js';
import { createDiagnostic } from '../../../diagnostics.js';
import type { FluentValue } from '../values.js';

// Declaration merging to add methods to Resolver interface
declare module './resolver.js' {
  interface Resolver {
    resolveVariable(
      expr: VariableReferenceNode,
      state: ResolutionState
    ): Resolved;
    resolveMessageReference(
      expr: MessageReferenceNode,
      state: ResolutionState
    ): Resolved;
    resolveTermReference(
      expr: TermReferenceNode,
      state: ResolutionState
    ): Resolved;
    resolveReferencedPattern(
      pattern: PatternNode,
      key: string,
      state: ResolutionState
    ): Resolved;
  }
}

// ============================================================
// CYCLE CHECK
// ============================================================

/**
 * Resolve a message or term pattern under its reference key
 * (`id`, `id.attr`, `-id`, `-id.attr`). A key already on the stack is a
 * cycle: reported once, with the whole path, and replaced by `{key}`.
 */
Resolver.prototype.resolveReferencedPattern = function (
  this: Resolver,
  pattern: PatternNode,
  key: string,
  state: ResolutionState
): Resolved {
  if (state.stack.includes(key)) {
    state.diagnostics.push(
      createDiagnostic('CYCLIC_REFERENCE', {
        path: [...state.stack, key].join(' -> '),
      })
    );
    return failed(`{${key}}`);
  }

  state.stack.push(key);
  try {
    return resolved(this.resolvePattern(pattern, state));
  } finally {
    state.stack.pop();
  }
};

// ============================================================
// VARIABLES
// ============================================================

Resolver.prototype.resolveVariable = function (
  this: Resolver,
  expr: VariableReferenceNode,
  state: ResolutionState
): Resolved {
  const name = expr.id.name;
  if (!Object.hasOwn(state.args, name)) {
    state.diagnostics.push(createDiagnostic('VARIABLE_NOT_PROVIDED', { name }));
    return failed(`{$${name}}`);
  }
  return resolved(state.args[name]);
};

// ============================================================
// MESSAGE REFERENCES
// ============================================================

Resolver.prototype.resolveMessageReference = function (
  this: Resolver,
  expr: MessageReferenceNode,
  state: ResolutionState
): Resolved {
  const id = expr.id.name;
  const attribute = expr.attribute?.name;
  const key = attribute !== undefined ? `${id}.${attribute}` : id;

  const message = this.messages.get(id);
  if (!message) {
    state.diagnostics.push(createDiagnostic('MESSAGE_NOT_FOUND', { id }));
    return failed(`{${key}}`);
  }

  if (attribute !== undefined) {
    const attr = message.attributes.find((a) => a.id.name === attribute);
    if (!attr) {
      state.diagnostics.push(
        createDiagnostic('ATTRIBUTE_NOT_FOUND', { id, attribute })
      );
      return failed(`{${key}}`);
    }
    return this.resolveReferencedPattern(attr.value, key, state);
  }

  if (message.value === null) {
    state.diagnostics.push(createDiagnostic('MESSAGE_NO_VALUE', { id }));
    return failed(`{${id}}`);
  }
  return this.resolveReferencedPattern(message.value, key, state);
};

// ============================================================
// TERM REFERENCES
// ============================================================

/**
 * Terms see the caller's arguments, unless the reference passes named
 * arguments (`-brand(case: "genitive")`): those replace the argument map
 * while the term resolves. Positional arguments are ignored.
 */
Resolver.prototype.resolveTermReference = function (
  this: Resolver,
  expr: TermReferenceNode,
  state: ResolutionState
): Resolved {
  const id = expr.id.name;
  const attribute = expr.attribute?.name;
  const key = attribute !== undefined ? `-${id}.${attribute}` : `-${id}`;

  const term = this.terms.get(id);
  if (!term) {
    state.diagnostics.push(createDiagnostic('TERM_NOT_FOUND', { id }));
    return failed(`{${key}}`);
  }

  let pattern = term.value;
  if (attribute !== undefined) {
    const attr = term.attributes.find((a) => a.id.name === attribute);
    if (!attr) {
      state.diagnostics.push(
        createDiagnostic('TERM_ATTRIBUTE_NOT_FOUND', { id, attribute })
      );
      return failed(`{${key}}`);
    }
    pattern = attr.value;
  }

  let termState = state;
  if (expr.arguments && expr.arguments.named.length > 0) {
    const args: Record<string, FluentValue> = {};
    for (const arg of expr.arguments.named) {
      args[arg.name.name] = arg.value.value;
    }
    termState = { ...state, args };
  }

  return this.resolveReferencedPattern(pattern, key, termState);
};
