/**
 * Resolver Class - Core
 *
 * Defines the Resolver class structure. Resolution steps are added via
 * prototype extension from separate modules, using TypeScript declaration
 * merging for type safety.
 *
 * The resolver holds only read-only collaborators. Everything that changes
 * during a call (the reference stack, diagnostics, current arguments) lives
 * in a ResolutionState created per call and passed down, so one instance
 * can serve concurrent and reentrant calls.
 */

import type { MessageNode, PatternNode, TermNode } from '../../../ast-nodes.js';
import { createDiagnostic, type Diagnostic } from '../../../diagnostics.js';
import type { FunctionRegistry } from '../functions.js';
import { selectPluralCategory } from '../plural-rules.js';
import type { FunctionCallEvent } from '../types.js';
import type { FluentArgs, FluentValue } from '../values.js';

// ============================================================
// TYPES
// ============================================================

export type PluralCategorySelector = (
  value: number,
  locale: string,
  type: Intl.PluralRuleType
) => string;

export interface ResolverOptions {
  readonly locale: string;
  readonly messages: ReadonlyMap<string, MessageNode>;
  readonly terms: ReadonlyMap<string, TermNode>;
  readonly functions: FunctionRegistry;
  /** Wrap placeables in FSI/PDI marks (default: true) */
  readonly useIsolating?: boolean | undefined;
  readonly pluralCategory?: PluralCategorySelector | undefined;
  readonly onFunctionCall?: ((event: FunctionCallEvent) => void) | undefined;
}

export interface ResolveResult {
  readonly value: string;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Per-call state. stack and diagnostics are shared by every nested
 * reference in the call; args is replaced while a parameterized term
 * resolves.
 */
export interface ResolutionState {
  readonly stack: string[];
  readonly diagnostics: Diagnostic[];
  readonly args: FluentArgs;
}

/** Outcome of resolving one expression */
export type Resolved =
  | { readonly ok: true; readonly value: FluentValue }
  | { readonly ok: false; readonly fallback: string };

export function resolved(value: FluentValue): Resolved {
  return { ok: true, value };
}

export function failed(fallback: string): Resolved {
  return { ok: false, fallback };
}

/** U+2068 FIRST STRONG ISOLATE */
export const FSI = '\u2068';
/** U+2069 POP DIRECTIONAL ISOLATE */
export const PDI = '\u2069';

// ============================================================
// RESOLVER
// ============================================================

/**
 * Resolves messages to text.
 *
 * Steps are organized across multiple files:
 * - pattern.ts: Patterns, expression dispatch, fallbacks
 * - references.ts: Variables, message and term references, cycle checks
 * - functions.ts: Function calls
 * - select.ts: Select expressions and variant matching
 *
 * Never throws for bad data: every problem becomes a diagnostic plus
 * fallback text in the result.
 */
export class Resolver {
  readonly locale: string;
  readonly messages: ReadonlyMap<string, MessageNode>;
  readonly terms: ReadonlyMap<string, TermNode>;
  readonly functions: FunctionRegistry;
  readonly useIsolating: boolean;
  readonly pluralCategory: PluralCategorySelector;
  readonly onFunctionCall: ((event: FunctionCallEvent) => void) | undefined;

  constructor(options: ResolverOptions) {
    this.locale = options.locale;
    this.messages = options.messages;
    this.terms = options.terms;
    this.functions = options.functions;
    this.useIsolating = options.useIsolating ?? true;
    this.pluralCategory = options.pluralCategory ?? selectPluralCategory;
    this.onFunctionCall = options.onFunctionCall;
  }

  /**
   * Resolve a message value, or one of its attributes, to text.
   *
   * @example
   * ```typescript
   * const { value, diagnostics } = resolver.resolve(message, { n: 5 });
   * ```
   */
  resolve(
    message: MessageNode,
    args: FluentArgs = {},
    attribute?: string
  ): ResolveResult {
    const state: ResolutionState = { stack: [], diagnostics: [], args };
    const id = message.id.name;

    let pattern: PatternNode;
    if (attribute !== undefined) {
      const attr = message.attributes.find((a) => a.id.name === attribute);
      if (!attr) {
        state.diagnostics.push(
          createDiagnostic('ATTRIBUTE_NOT_FOUND', { id, attribute })
        );
        return { value: `{${id}.${attribute}}`, diagnostics: state.diagnostics };
      }
      pattern = attr.value;
    } else {
      if (message.value === null) {
        state.diagnostics.push(createDiagnostic('MESSAGE_NO_VALUE', { id }));
        return { value: `{${id}}`, diagnostics: state.diagnostics };
      }
      pattern = message.value;
    }

    const key = attribute !== undefined ? `${id}.${attribute}` : id;
    const result = this.resolveReferencedPattern(pattern, key, state);
    return {
      value: result.ok ? this.stringify(result.value) : result.fallback,
      diagnostics: state.diagnostics,
    };
  }
}
