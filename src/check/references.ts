/**
 * Reference Collection
 * Gathers every message, term, variable and function a subtree mentions.
 */

import type {
  ASTNode,
  FunctionReferenceNode,
  MessageReferenceNode,
  TermReferenceNode,
  VariableReferenceNode,
} from '../ast-nodes.js';
import { Visitor } from './visitor.js';

export interface References {
  /** Referenced message ids, without attribute suffix */
  readonly messages: Set<string>;
  /** Referenced term ids, without the leading '-' */
  readonly terms: Set<string>;
  readonly variables: Set<string>;
  readonly functions: Set<string>;
}

class ReferenceCollector extends Visitor {
  readonly refs: References = {
    messages: new Set(),
    terms: new Set(),
    variables: new Set(),
    functions: new Set(),
  };

  override visitMessageReference(node: MessageReferenceNode): void {
    this.refs.messages.add(node.id.name);
  }

  override visitTermReference(node: TermReferenceNode): void {
    this.refs.terms.add(node.id.name);
    if (node.arguments) this.visit(node.arguments);
  }

  override visitVariableReference(node: VariableReferenceNode): void {
    this.refs.variables.add(node.id.name);
  }

  override visitFunctionReference(node: FunctionReferenceNode): void {
    this.refs.functions.add(node.id.name);
    this.visit(node.arguments);
  }
}

/**
 * Collect references under a node.
 * Named argument names are not variables and are not reported.
 */
export function collectReferences(node: ASTNode): References {
  const collector = new ReferenceCollector();
  collector.visit(node);
  return collector.refs;
}
