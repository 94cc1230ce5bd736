/**
 * Fluent Bundle
 *
 * Messages and terms of one locale, the function registry they call into,
 * and the formatting entry points built on the resolver.
 */

import type {
  JunkNode,
  MessageNode,
  ResourceNode,
  TermNode,
} from '../../ast-nodes.js';
import { createDefaultConfig } from '../../check/config.js';
import { validateResource as runChecks } from '../../check/validator.js';
import { createDiagnostic, type Diagnostic } from '../../diagnostics.js';
import {
  extractVariables,
  introspectMessage,
  type MessageIntrospection,
} from '../../introspection.js';
import { parse } from '../../parser/index.js';
import { createDefaultRegistry, type FunctionRegistry } from './functions.js';
import { Resolver } from './resolve/index.js';
import type {
  AddResourceOptions,
  FluentFunction,
  FormatOptions,
  FormatResult,
  ObservabilityCallbacks,
  ValidationResult,
} from './types.js';
import type { FluentArgs } from './values.js';

export interface BundleOptions {
  /** Wrap placeables in Unicode isolation marks (default: true) */
  useIsolating?: boolean | undefined;
  /** Custom functions, registered over the built-ins */
  functions?: Readonly<Record<string, FluentFunction>> | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

/**
 * @example
 * ```typescript
 * const bundle = new FluentBundle('en-US');
 * bundle.addResource('hello = Hello, { $name }!');
 * bundle.formatValue('hello', { name: 'Ada' });
 * ```
 */
export class FluentBundle {
  readonly locale: string;
  readonly useIsolating: boolean;

  private readonly messages = new Map<string, MessageNode>();
  private readonly terms = new Map<string, TermNode>();
  private readonly functions: FunctionRegistry;
  private readonly observability: ObservabilityCallbacks;
  private readonly resolver: Resolver;

  constructor(locale: string, options: BundleOptions = {}) {
    this.locale = locale;
    this.useIsolating = options.useIsolating ?? true;
    this.observability = options.observability ?? {};
    this.functions = createDefaultRegistry();
    for (const [name, fn] of Object.entries(options.functions ?? {})) {
      this.functions.register(name, fn);
    }

    this.resolver = new Resolver({
      locale,
      messages: this.messages,
      terms: this.terms,
      functions: this.functions,
      useIsolating: this.useIsolating,
      onFunctionCall: this.observability.onFunctionCall,
    });
  }

  // ============================================================
  // RESOURCES
  // ============================================================

  /**
   * Parse FTL source and register its messages and terms.
   * Later definitions replace earlier ones unless allowOverrides is false.
   *
   * @returns Junk entries found in the source
   * @throws Error if allowOverrides is false and an id is already defined;
   *   nothing is registered in that case
   */
  addResource(source: string, options: AddResourceOptions = {}): JunkNode[] {
    const resource = parse(source);
    if (options.allowOverrides === false) {
      this.assertNoDuplicates(resource);
    }

    const junk: JunkNode[] = [];
    let messages = 0;
    let terms = 0;

    for (const entry of resource.body) {
      switch (entry.type) {
        case 'Message':
          this.messages.set(entry.id.name, entry);
          messages++;
          break;
        case 'Term':
          this.terms.set(entry.id.name, entry);
          terms++;
          break;
        case 'Junk':
          junk.push(entry);
          this.observability.onJunk?.({
            content: entry.content,
            annotations: entry.annotations,
            sourcePath: options.sourcePath,
          });
          break;
        case 'Comment':
          break;
      }
    }

    this.observability.onResourceAdded?.({
      messages,
      terms,
      junk: junk.length,
      sourcePath: options.sourcePath,
    });
    return junk;
  }

  private assertNoDuplicates(resource: ResourceNode): void {
    const messages = new Set(this.messages.keys());
    const terms = new Set(this.terms.keys());

    for (const entry of resource.body) {
      if (entry.type === 'Message') {
        if (messages.has(entry.id.name)) {
          throw new Error(`Message '${entry.id.name}' already exists`);
        }
        messages.add(entry.id.name);
      } else if (entry.type === 'Term') {
        if (terms.has(entry.id.name)) {
          throw new Error(`Term '-${entry.id.name}' already exists`);
        }
        terms.add(entry.id.name);
      }
    }
  }

  /**
   * Parse and check source without adding it.
   * Junk entries are errors; findings of the check rules are warnings.
   */
  validateResource(source: string): ValidationResult {
    const resource = parse(source);
    const errors = resource.body.filter(
      (entry): entry is JunkNode => entry.type === 'Junk'
    );
    const warnings = runChecks(resource, source, createDefaultConfig()).filter(
      (diagnostic) => diagnostic.code !== 'syntax-error'
    );
    return { errors, warnings, isValid: errors.length === 0 };
  }

  // ============================================================
  // FORMATTING
  // ============================================================

  /**
   * Format a message (or one of its attributes). Never throws.
   *
   * @example
   * ```typescript
   * const { value, diagnostics } = bundle.formatPattern('count', { n: 5 });
   * ```
   */
  formatPattern(
    id: string,
    args: FluentArgs = {},
    options: FormatOptions = {}
  ): FormatResult {
    const startTime = performance.now();
    const result = this.resolveMessage(id, args, options.attribute);

    for (const diagnostic of result.diagnostics) {
      this.observability.onDiagnostic?.({ id, diagnostic });
    }
    this.observability.onFormat?.({
      id,
      attribute: options.attribute,
      result: result.value,
      diagnostics: result.diagnostics,
      durationMs: performance.now() - startTime,
    });
    return result;
  }

  /** Text of a message value; diagnostics are dropped */
  formatValue(id: string, args: FluentArgs = {}): string {
    return this.formatPattern(id, args).value;
  }

  private resolveMessage(
    id: string,
    args: FluentArgs,
    attribute: string | undefined
  ): FormatResult {
    if (id === '') {
      return notFound('{???}', id);
    }
    const message = this.messages.get(id);
    if (!message) {
      return notFound(`{${id}}`, id);
    }

    try {
      return this.resolver.resolve(message, args, attribute);
    } catch (err) {
      return {
        value: `{${id}}`,
        diagnostics: [
          createDiagnostic('FORMAT_FAILED', {
            id,
            reason: err instanceof Error ? err.message : String(err),
          }),
        ],
      };
    }
  }

  // ============================================================
  // LOOKUP AND INTROSPECTION
  // ============================================================

  hasMessage(id: string): boolean {
    return this.messages.has(id);
  }

  getMessage(id: string): MessageNode | undefined {
    return this.messages.get(id);
  }

  /** Message ids in definition order */
  getMessageIds(): string[] {
    return [...this.messages.keys()];
  }

  /**
   * Variables a message uses, including those in attributes and selectors.
   *
   * @throws RangeError if the message does not exist
   */
  getMessageVariables(id: string): ReadonlySet<string> {
    return extractVariables(this.requireMessage(id));
  }

  getAllMessageVariables(): Map<string, ReadonlySet<string>> {
    const result = new Map<string, ReadonlySet<string>>();
    for (const [id, message] of this.messages) {
      result.set(id, extractVariables(message));
    }
    return result;
  }

  /** @throws RangeError if the message does not exist */
  introspectMessage(id: string): MessageIntrospection {
    return introspectMessage(this.requireMessage(id));
  }

  /**
   * Register a custom function. Replacing a built-in this way means the
   * function no longer receives the locale.
   */
  addFunction(name: string, fn: FluentFunction): void {
    this.functions.register(name, fn);
  }

  private requireMessage(id: string): MessageNode {
    const message = this.messages.get(id);
    if (!message) {
      throw new RangeError(`Message '${id}' not found`);
    }
    return message;
  }
}

function notFound(value: string, id: string): FormatResult {
  const diagnostics: Diagnostic[] = [
    createDiagnostic('MESSAGE_NOT_FOUND', { id }),
  ];
  return { value, diagnostics };
}
