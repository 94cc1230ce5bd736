/**
 * Message Introspection
 * What a message needs from its caller: variables, functions, references.
 */

import type {
  FunctionReferenceNode,
  MessageNode,
  MessageReferenceNode,
  SelectExpressionNode,
  TermNode,
  TermReferenceNode,
  VariableReferenceNode,
} from './ast-nodes.js';
import { Visitor } from './check/visitor.js';

// ============================================================
// RESULT TYPES
// ============================================================

/** Where a variable appears */
export type VariableContext = 'pattern' | 'selector' | 'function-arg' | 'term-arg';

export interface VariableInfo {
  readonly name: string;
  readonly context: VariableContext;
}

export interface FunctionCallInfo {
  readonly name: string;
  /** Variables passed positionally, in order */
  readonly positionalVariables: readonly string[];
  readonly namedArguments: readonly string[];
}

export interface ReferenceInfo {
  readonly kind: 'message' | 'term';
  readonly id: string;
  readonly attribute: string | null;
}

export class MessageIntrospection {
  constructor(
    readonly id: string,
    /** Unique by name and context, in first-seen order */
    readonly variables: readonly VariableInfo[],
    readonly functions: readonly FunctionCallInfo[],
    readonly references: readonly ReferenceInfo[],
    readonly hasSelectors: boolean
  ) {}

  getVariableNames(): Set<string> {
    return new Set(this.variables.map((v) => v.name));
  }

  getFunctionNames(): Set<string> {
    return new Set(this.functions.map((f) => f.name));
  }
}

// ============================================================
// COLLECTOR
// ============================================================

class IntrospectionVisitor extends Visitor {
  readonly variables: VariableInfo[] = [];
  readonly functions: FunctionCallInfo[] = [];
  readonly references: ReferenceInfo[] = [];
  hasSelectors = false;

  private context: VariableContext = 'pattern';
  private readonly seenVariables = new Set<string>();
  private readonly seenReferences = new Set<string>();

  private within(context: VariableContext, visit: () => void): void {
    const previous = this.context;
    this.context = context;
    try {
      visit();
    } finally {
      this.context = previous;
    }
  }

  override visitVariableReference(node: VariableReferenceNode): void {
    const key = `${node.id.name}\u0000${this.context}`;
    if (this.seenVariables.has(key)) return;
    this.seenVariables.add(key);
    this.variables.push({ name: node.id.name, context: this.context });
  }

  override visitSelectExpression(node: SelectExpressionNode): void {
    this.hasSelectors = true;
    this.within('selector', () => this.visit(node.selector));
    for (const variant of node.variants) {
      this.visit(variant);
    }
  }

  override visitFunctionReference(node: FunctionReferenceNode): void {
    this.functions.push({
      name: node.id.name,
      positionalVariables: node.arguments.positional.flatMap((arg) =>
        arg.type === 'VariableReference' ? [arg.id.name] : []
      ),
      namedArguments: node.arguments.named.map((arg) => arg.name.name),
    });
    this.within('function-arg', () => this.visit(node.arguments));
  }

  override visitMessageReference(node: MessageReferenceNode): void {
    this.addReference('message', node.id.name, node.attribute?.name ?? null);
  }

  override visitTermReference(node: TermReferenceNode): void {
    this.addReference('term', node.id.name, node.attribute?.name ?? null);
    const args = node.arguments;
    if (args) {
      this.within('term-arg', () => this.visit(args));
    }
  }

  private addReference(
    kind: ReferenceInfo['kind'],
    id: string,
    attribute: string | null
  ): void {
    const key = `${kind}\u0000${id}\u0000${attribute ?? ''}`;
    if (this.seenReferences.has(key)) return;
    this.seenReferences.add(key);
    this.references.push({ kind, id, attribute });
  }
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Introspect a message or term, value and attributes together.
 *
 * @example
 * ```typescript
 * const info = introspectMessage(message);
 * info.getVariableNames(); // Set { 'count', 'name' }
 * ```
 */
export function introspectMessage(
  message: MessageNode | TermNode
): MessageIntrospection {
  const visitor = new IntrospectionVisitor();
  if (message.value) visitor.visit(message.value);
  for (const attribute of message.attributes) {
    visitor.visit(attribute);
  }
  return new MessageIntrospection(
    message.id.name,
    visitor.variables,
    visitor.functions,
    visitor.references,
    visitor.hasSelectors
  );
}

/** Names of all variables a message or term uses */
export function extractVariables(
  message: MessageNode | TermNode
): ReadonlySet<string> {
  return introspectMessage(message).getVariableNames();
}
