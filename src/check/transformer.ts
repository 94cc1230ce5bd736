/**
 * AST Transformer
 * Builds new trees from old ones; nodes are never edited in place.
 */

import type {
  ASTNode,
  AnnotationNode,
  AttributeNode,
  CallArgumentsNode,
  CommentNode,
  EntryNode,
  ExpressionNode,
  FunctionReferenceNode,
  IdentifierNode,
  InlineExpressionNode,
  JunkNode,
  LiteralNode,
  MessageNode,
  MessageReferenceNode,
  NamedArgumentNode,
  NumberLiteralNode,
  PatternElementNode,
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
// RESULTS
// ============================================================

/** Returned from a hook to delete the node from its parent */
export const REMOVE: unique symbol = Symbol('ftl.transform.remove');

/**
 * A hook's result: a replacement node, REMOVE, or several nodes that take
 * the original's place in a list.
 */
export type TransformOutput = ASTNode | ASTNode[] | typeof REMOVE;

// ============================================================
// SLOT GUARDS
// ============================================================

type Guard<T extends ASTNode> = (node: ASTNode) => node is T;

const isEntry: Guard<EntryNode> = (n): n is EntryNode =>
  n.type === 'Message' ||
  n.type === 'Term' ||
  n.type === 'Comment' ||
  n.type === 'Junk';

const isInlineExpression: Guard<InlineExpressionNode> = (
  n
): n is InlineExpressionNode =>
  n.type === 'StringLiteral' ||
  n.type === 'NumberLiteral' ||
  n.type === 'VariableReference' ||
  n.type === 'MessageReference' ||
  n.type === 'TermReference' ||
  n.type === 'FunctionReference' ||
  n.type === 'Placeable';

const isExpression: Guard<ExpressionNode> = (n): n is ExpressionNode =>
  isInlineExpression(n) || n.type === 'SelectExpression';

const isPatternElement: Guard<PatternElementNode> = (
  n
): n is PatternElementNode =>
  n.type === 'TextElement' || n.type === 'Placeable';

const isLiteral: Guard<LiteralNode> = (n): n is LiteralNode =>
  n.type === 'StringLiteral' || n.type === 'NumberLiteral';

const isVariantKey: Guard<IdentifierNode | NumberLiteralNode> = (
  n
): n is IdentifierNode | NumberLiteralNode =>
  n.type === 'Identifier' || n.type === 'NumberLiteral';

function ofType<T extends ASTNode['type']>(
  type: T
): Guard<Extract<ASTNode, { type: T }>> {
  return (n): n is Extract<ASTNode, { type: T }> => n.type === type;
}

const isIdentifier = ofType('Identifier');
const isPattern = ofType('Pattern');
const isAttribute = ofType('Attribute');
const isComment = ofType('Comment');
const isAnnotation = ofType('Annotation');
const isVariant = ofType('Variant');
const isCallArguments = ofType('CallArguments');
const isNamedArgument = ofType('NamedArgument');

// ============================================================
// TRANSFORMER
// ============================================================

/**
 * Base class for tree rewrites.
 *
 * Children are transformed first, then the rebuilt node is passed to the
 * hook for its kind. Hooks default to returning the node unchanged.
 * Inside lists (entries, pattern elements, variants, arguments) a hook may
 * return REMOVE or an array; in single-node slots it must return one node
 * of a kind the slot accepts, otherwise a TypeError is thrown. Optional
 * slots (message value, comment, attribute accessor, term arguments)
 * accept REMOVE and become null.
 *
 * @example
 * ```typescript
 * class StripComments extends Transformer {
 *   override transformComment(): TransformOutput {
 *     return REMOVE;
 *   }
 * }
 * const clean = new StripComments().transformRoot(resource);
 * ```
 */
export class Transformer {
  /** Transform a resource, which must stay a single Resource */
  transformRoot(resource: ResourceNode): ResourceNode {
    return this.single(resource, ofType('Resource'), 'resource');
  }

  transform(node: ASTNode): TransformOutput {
    switch (node.type) {
      case 'Resource':
        return this.transformResource({
          ...node,
          body: this.list(node.body, isEntry),
        });
      case 'Message':
        return this.transformMessage({
          ...node,
          comment: this.optional(node.comment, isComment),
          id: this.single(node.id, isIdentifier, 'message id'),
          value: this.optional(node.value, isPattern),
          attributes: this.list(node.attributes, isAttribute),
        });
      case 'Term':
        return this.transformTerm({
          ...node,
          comment: this.optional(node.comment, isComment),
          id: this.single(node.id, isIdentifier, 'term id'),
          value: this.single(node.value, isPattern, 'term value'),
          attributes: this.list(node.attributes, isAttribute),
        });
      case 'Attribute':
        return this.transformAttribute({
          ...node,
          id: this.single(node.id, isIdentifier, 'attribute id'),
          value: this.single(node.value, isPattern, 'attribute value'),
        });
      case 'Comment':
        return this.transformComment(node);
      case 'Junk':
        return this.transformJunk({
          ...node,
          annotations: this.list(node.annotations, isAnnotation),
        });
      case 'Annotation':
        return this.transformAnnotation(node);
      case 'Identifier':
        return this.transformIdentifier(node);
      case 'Pattern':
        return this.transformPattern({
          ...node,
          elements: this.list(node.elements, isPatternElement),
        });
      case 'TextElement':
        return this.transformTextElement(node);
      case 'Placeable':
        return this.transformPlaceable({
          ...node,
          expression: this.single(node.expression, isExpression, 'placeable'),
        });
      case 'StringLiteral':
        return this.transformStringLiteral(node);
      case 'NumberLiteral':
        return this.transformNumberLiteral(node);
      case 'VariableReference':
        return this.transformVariableReference({
          ...node,
          id: this.single(node.id, isIdentifier, 'variable id'),
        });
      case 'MessageReference':
        return this.transformMessageReference({
          ...node,
          id: this.single(node.id, isIdentifier, 'message reference id'),
          attribute: this.optional(node.attribute, isIdentifier),
        });
      case 'TermReference':
        return this.transformTermReference({
          ...node,
          id: this.single(node.id, isIdentifier, 'term reference id'),
          attribute: this.optional(node.attribute, isIdentifier),
          arguments: this.optional(node.arguments, isCallArguments),
        });
      case 'FunctionReference':
        return this.transformFunctionReference({
          ...node,
          id: this.single(node.id, isIdentifier, 'function id'),
          arguments: this.single(
            node.arguments,
            isCallArguments,
            'function arguments'
          ),
        });
      case 'SelectExpression':
        return this.transformSelectExpression({
          ...node,
          selector: this.single(node.selector, isInlineExpression, 'selector'),
          variants: this.list(node.variants, isVariant),
        });
      case 'Variant':
        return this.transformVariant({
          ...node,
          key: this.single(node.key, isVariantKey, 'variant key'),
          value: this.single(node.value, isPattern, 'variant value'),
        });
      case 'CallArguments':
        return this.transformCallArguments({
          ...node,
          positional: this.list(node.positional, isInlineExpression),
          named: this.list(node.named, isNamedArgument),
        });
      case 'NamedArgument':
        return this.transformNamedArgument({
          ...node,
          name: this.single(node.name, isIdentifier, 'argument name'),
          value: this.single(node.value, isLiteral, 'argument value'),
        });
      default: {
        const _exhaustive: never = node;
        throw new Error(
          `Unhandled node type in transformer: ${String(_exhaustive)}`
        );
      }
    }
  }

  // ============================================================
  // SLOT HELPERS
  // ============================================================

  private list<T extends ASTNode>(items: readonly T[], guard: Guard<T>): T[] {
    const result: T[] = [];
    for (const item of items) {
      const output = this.transform(item);
      if (output === REMOVE) continue;
      const nodes = Array.isArray(output) ? output : [output];
      for (const node of nodes) {
        if (!guard(node)) {
          throw new TypeError(
            `Transform produced ${node.type} where ${item.type} was expected`
          );
        }
        result.push(node);
      }
    }
    return result;
  }

  private single<T extends ASTNode>(item: T, guard: Guard<T>, slot: string): T {
    const output = this.transform(item);
    if (output === REMOVE || Array.isArray(output)) {
      throw new TypeError(`The ${slot} slot requires exactly one node`);
    }
    if (!guard(output)) {
      throw new TypeError(
        `Transform produced ${output.type} for the ${slot} slot`
      );
    }
    return output;
  }

  private optional<T extends ASTNode>(item: T | null, guard: Guard<T>): T | null {
    if (item === null) return null;
    const output = this.transform(item);
    if (output === REMOVE) return null;
    if (Array.isArray(output) || !guard(output)) {
      throw new TypeError(
        `Transform produced an unexpected value for ${item.type}`
      );
    }
    return output;
  }

  // ============================================================
  // HOOKS
  // ============================================================

  transformResource(node: ResourceNode): TransformOutput {
    return node;
  }
  transformMessage(node: MessageNode): TransformOutput {
    return node;
  }
  transformTerm(node: TermNode): TransformOutput {
    return node;
  }
  transformAttribute(node: AttributeNode): TransformOutput {
    return node;
  }
  transformComment(node: CommentNode): TransformOutput {
    return node;
  }
  transformJunk(node: JunkNode): TransformOutput {
    return node;
  }
  transformAnnotation(node: AnnotationNode): TransformOutput {
    return node;
  }
  transformIdentifier(node: IdentifierNode): TransformOutput {
    return node;
  }
  transformPattern(node: PatternNode): TransformOutput {
    return node;
  }
  transformTextElement(node: TextElementNode): TransformOutput {
    return node;
  }
  transformPlaceable(node: PlaceableNode): TransformOutput {
    return node;
  }
  transformStringLiteral(node: StringLiteralNode): TransformOutput {
    return node;
  }
  transformNumberLiteral(node: NumberLiteralNode): TransformOutput {
    return node;
  }
  transformVariableReference(node: VariableReferenceNode): TransformOutput {
    return node;
  }
  transformMessageReference(node: MessageReferenceNode): TransformOutput {
    return node;
  }
  transformTermReference(node: TermReferenceNode): TransformOutput {
    return node;
  }
  transformFunctionReference(node: FunctionReferenceNode): TransformOutput {
    return node;
  }
  transformSelectExpression(node: SelectExpressionNode): TransformOutput {
    return node;
  }
  transformVariant(node: VariantNode): TransformOutput {
    return node;
  }
  transformCallArguments(node: CallArgumentsNode): TransformOutput {
    return node;
  }
  transformNamedArgument(node: NamedArgumentNode): TransformOutput {
    return node;
  }
}
