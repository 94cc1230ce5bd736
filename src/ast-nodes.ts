import type { Span } from './source-location.js';

interface BaseNode {
  readonly span: Span;
}

// ============================================================
// RESOURCE STRUCTURE
// ============================================================

/** Parsed FTL file: entries in source order */
export interface ResourceNode extends BaseNode {
  readonly type: 'Resource';
  readonly body: EntryNode[];
}

export type EntryNode = MessageNode | TermNode | CommentNode | JunkNode;

/**
 * Message: id = pattern, followed by attributes.
 * Either value is non-null or attributes is non-empty.
 */
export interface MessageNode extends BaseNode {
  readonly type: 'Message';
  readonly id: IdentifierNode;
  readonly value: PatternNode | null;
  readonly attributes: AttributeNode[];
  /** Line comment directly preceding the message */
  readonly comment: CommentNode | null;
}

/** Term: -id = pattern. Always carries a value. */
export interface TermNode extends BaseNode {
  readonly type: 'Term';
  readonly id: IdentifierNode;
  readonly value: PatternNode;
  readonly attributes: AttributeNode[];
  readonly comment: CommentNode | null;
}

export interface AttributeNode extends BaseNode {
  readonly type: 'Attribute';
  readonly id: IdentifierNode;
  readonly value: PatternNode;
}

/** # comment, ## group comment, ### resource comment */
export type CommentKind = 'comment' | 'group' | 'resource';

export interface CommentNode extends BaseNode {
  readonly type: 'Comment';
  readonly kind: CommentKind;
  readonly content: string;
}

/**
 * Unparseable source kept as data.
 * Produced by the top-level loop instead of aborting the parse.
 */
export interface JunkNode extends BaseNode {
  readonly type: 'Junk';
  readonly content: string;
  readonly annotations: AnnotationNode[];
}

export interface AnnotationNode extends BaseNode {
  readonly type: 'Annotation';
  readonly code: string;
  readonly message: string;
  readonly arguments: string[];
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

// ============================================================
// PATTERNS
// ============================================================

export interface PatternNode extends BaseNode {
  readonly type: 'Pattern';
  readonly elements: PatternElementNode[];
}

export type PatternElementNode = TextElementNode | PlaceableNode;

export interface TextElementNode extends BaseNode {
  readonly type: 'TextElement';
  readonly value: string;
}

/** { expression } */
export interface PlaceableNode extends BaseNode {
  readonly type: 'Placeable';
  readonly expression: ExpressionNode;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type InlineExpressionNode =
  | StringLiteralNode
  | NumberLiteralNode
  | VariableReferenceNode
  | MessageReferenceNode
  | TermReferenceNode
  | FunctionReferenceNode
  | PlaceableNode;

export type ExpressionNode = InlineExpressionNode | SelectExpressionNode;

export type LiteralNode = StringLiteralNode | NumberLiteralNode;

/** "text" with escapes already decoded */
export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

/**
 * Number literal. raw keeps the source text (leading zeros, precision)
 * for exact round-tripping; value is the parsed number.
 */
export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly raw: string;
  readonly value: number;
}

/** $name */
export interface VariableReferenceNode extends BaseNode {
  readonly type: 'VariableReference';
  readonly id: IdentifierNode;
}

/** name or name.attr */
export interface MessageReferenceNode extends BaseNode {
  readonly type: 'MessageReference';
  readonly id: IdentifierNode;
  readonly attribute: IdentifierNode | null;
}

/** -name, -name.attr, -name(args) */
export interface TermReferenceNode extends BaseNode {
  readonly type: 'TermReference';
  readonly id: IdentifierNode;
  readonly attribute: IdentifierNode | null;
  readonly arguments: CallArgumentsNode | null;
}

/** NAME(args) */
export interface FunctionReferenceNode extends BaseNode {
  readonly type: 'FunctionReference';
  readonly id: IdentifierNode;
  readonly arguments: CallArgumentsNode;
}

/**
 * selector -> [key] pattern *[default] pattern
 * Exactly one variant has isDefault set.
 */
export interface SelectExpressionNode extends BaseNode {
  readonly type: 'SelectExpression';
  readonly selector: InlineExpressionNode;
  readonly variants: VariantNode[];
}

export interface VariantNode extends BaseNode {
  readonly type: 'Variant';
  readonly key: IdentifierNode | NumberLiteralNode;
  readonly value: PatternNode;
  readonly isDefault: boolean;
}

export interface CallArgumentsNode extends BaseNode {
  readonly type: 'CallArguments';
  readonly positional: InlineExpressionNode[];
  readonly named: NamedArgumentNode[];
}

/** name: "literal" or name: 42 */
export interface NamedArgumentNode extends BaseNode {
  readonly type: 'NamedArgument';
  readonly name: IdentifierNode;
  readonly value: LiteralNode;
}

// ============================================================
// UNIONS
// ============================================================

export type ASTNode =
  | ResourceNode
  | MessageNode
  | TermNode
  | AttributeNode
  | CommentNode
  | JunkNode
  | AnnotationNode
  | IdentifierNode
  | PatternNode
  | TextElementNode
  | PlaceableNode
  | StringLiteralNode
  | NumberLiteralNode
  | VariableReferenceNode
  | MessageReferenceNode
  | TermReferenceNode
  | FunctionReferenceNode
  | SelectExpressionNode
  | VariantNode
  | CallArgumentsNode
  | NamedArgumentNode;

export type NodeType = ASTNode['type'];

/** Narrow an AST union member by its type tag */
export type NodeOfType<T extends NodeType> = Extract<ASTNode, { type: T }>;
