/**
 * AST Visitor
 * Child enumeration, enter/exit traversal, and a double-dispatch Visitor base class.
 */

import type {
  ASTNode,
  AnnotationNode,
  AttributeNode,
  CallArgumentsNode,
  CommentNode,
  FunctionReferenceNode,
  IdentifierNode,
  JunkNode,
  MessageNode,
  MessageReferenceNode,
  NamedArgumentNode,
  NumberLiteralNode,
  PatternNode,
  PlaceableNode,
  ResourceNode,
  SelectExpressionNode,
  StringLiteralNode,
  TermNode,
  TermReferenceNode,
  TextElementNode,
  VariableReferenceNode,
  VariantNode,
} from '../ast-nodes.js';

// ============================================================
// CHILD ENUMERATION
// ============================================================

/**
 * Direct children of a node, in source order.
 * Exhaustive over the ASTNode union.
 */
export function childrenOf(node: ASTNode): ASTNode[] {
  switch (node.type) {
    case 'Resource':
      return [...node.body];

    case 'Message':
    case 'Term': {
      const children: ASTNode[] = [];
      if (node.comment) children.push(node.comment);
      children.push(node.id);
      if (node.value) children.push(node.value);
      children.push(...node.attributes);
      return children;
    }

    case 'Attribute':
      return [node.id, node.value];

    case 'Junk':
      return [...node.annotations];

    case 'Pattern':
      return [...node.elements];

    case 'Placeable':
      return [node.expression];

    case 'VariableReference':
      return [node.id];

    case 'MessageReference':
      return node.attribute ? [node.id, node.attribute] : [node.id];

    case 'TermReference': {
      const children: ASTNode[] = [node.id];
      if (node.attribute) children.push(node.attribute);
      if (node.arguments) children.push(node.arguments);
      return children;
    }

    case 'FunctionReference':
      return [node.id, node.arguments];

    case 'SelectExpression':
      return [node.selector, ...node.variants];

    case 'Variant':
      return [node.key, node.value];

    case 'CallArguments':
      return [...node.positional, ...node.named];

    case 'NamedArgument':
      return [node.name, node.value];

    case 'Comment':
    case 'Annotation':
    case 'Identifier':
    case 'TextElement':
    case 'StringLiteral':
    case 'NumberLiteral':
      return [];

    default: {
      // Exhaustive check: if we reach here, a node type is missing
      const _exhaustive: never = node;
      throw new Error(`Unhandled node type in visitor: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================
// ENTER/EXIT TRAVERSAL
// ============================================================

/**
 * Visitor pattern interface for AST traversal.
 * Provides enter/exit callbacks invoked before and after visiting children.
 */
export interface NodeVisitor<C> {
  enter(node: ASTNode, context: C): void;
  exit?(node: ASTNode, context: C): void;
}

/**
 * Recursively visit AST nodes with enter/exit callbacks.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode<C>(
  node: ASTNode,
  context: C,
  visitor: NodeVisitor<C>
): void {
  visitor.enter(node, context);
  for (const child of childrenOf(node)) {
    visitNode(child, context, visitor);
  }
  visitor.exit?.(node, context);
}

// ============================================================
// DOUBLE-DISPATCH VISITOR
// ============================================================

/**
 * Base class for read-only passes over the tree.
 *
 * `visit` dispatches on the node type to one method per kind. Every method
 * defaults to visiting the node's children, so subclasses override only the
 * kinds they care about and call `visitChildren` to keep descending.
 *
 * @example
 * ```typescript
 * class VariableNames extends Visitor {
 *   readonly names: string[] = [];
 *   override visitVariableReference(node: VariableReferenceNode): void {
 *     this.names.push(node.id.name);
 *   }
 * }
 * ```
 */
export class Visitor {
  visit(node: ASTNode): void {
    switch (node.type) {
      case 'Resource':
        return this.visitResource(node);
      case 'Message':
        return this.visitMessage(node);
      case 'Term':
        return this.visitTerm(node);
      case 'Attribute':
        return this.visitAttribute(node);
      case 'Comment':
        return this.visitComment(node);
      case 'Junk':
        return this.visitJunk(node);
      case 'Annotation':
        return this.visitAnnotation(node);
      case 'Identifier':
        return this.visitIdentifier(node);
      case 'Pattern':
        return this.visitPattern(node);
      case 'TextElement':
        return this.visitTextElement(node);
      case 'Placeable':
        return this.visitPlaceable(node);
      case 'StringLiteral':
        return this.visitStringLiteral(node);
      case 'NumberLiteral':
        return this.visitNumberLiteral(node);
      case 'VariableReference':
        return this.visitVariableReference(node);
      case 'MessageReference':
        return this.visitMessageReference(node);
      case 'TermReference':
        return this.visitTermReference(node);
      case 'FunctionReference':
        return this.visitFunctionReference(node);
      case 'SelectExpression':
        return this.visitSelectExpression(node);
      case 'Variant':
        return this.visitVariant(node);
      case 'CallArguments':
        return this.visitCallArguments(node);
      case 'NamedArgument':
        return this.visitNamedArgument(node);
      default: {
        const _exhaustive: never = node;
        throw new Error(`Unhandled node type in visitor: ${String(_exhaustive)}`);
      }
    }
  }

  visitChildren(node: ASTNode): void {
    for (const child of childrenOf(node)) {
      this.visit(child);
    }
  }

  visitResource(node: ResourceNode): void {
    this.visitChildren(node);
  }
  visitMessage(node: MessageNode): void {
    this.visitChildren(node);
  }
  visitTerm(node: TermNode): void {
    this.visitChildren(node);
  }
  visitAttribute(node: AttributeNode): void {
    this.visitChildren(node);
  }
  visitComment(node: CommentNode): void {
    this.visitChildren(node);
  }
  visitJunk(node: JunkNode): void {
    this.visitChildren(node);
  }
  visitAnnotation(node: AnnotationNode): void {
    this.visitChildren(node);
  }
  visitIdentifier(node: IdentifierNode): void {
    this.visitChildren(node);
  }
  visitPattern(node: PatternNode): void {
    this.visitChildren(node);
  }
  visitTextElement(node: TextElementNode): void {
    this.visitChildren(node);
  }
  visitPlaceable(node: PlaceableNode): void {
    this.visitChildren(node);
  }
  visitStringLiteral(node: StringLiteralNode): void {
    this.visitChildren(node);
  }
  visitNumberLiteral(node: NumberLiteralNode): void {
    this.visitChildren(node);
  }
  visitVariableReference(node: VariableReferenceNode): void {
    this.visitChildren(node);
  }
  visitMessageReference(node: MessageReferenceNode): void {
    this.visitChildren(node);
  }
  visitTermReference(node: TermReferenceNode): void {
    this.visitChildren(node);
  }
  visitFunctionReference(node: FunctionReferenceNode): void {
    this.visitChildren(node);
  }
  visitSelectExpression(node: SelectExpressionNode): void {
    this.visitChildren(node);
  }
  visitVariant(node: VariantNode): void {
    this.visitChildren(node);
  }
  visitCallArguments(node: CallArgumentsNode): void {
    this.visitChildren(node);
  }
  visitNamedArgument(node: NamedArgumentNode): void {
    this.visitChildren(node);
  }
}
