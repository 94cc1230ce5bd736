/**
 * FTL Serializer
 * Writes a Resource back out as canonical FTL source.
 */

import type {
  AttributeNode,
  CallArgumentsNode,
  CommentNode,
  EntryNode,
  ExpressionNode,
  JunkNode,
  MessageNode,
  PatternNode,
  ResourceNode,
  SelectExpressionNode,
  TermNode,
} from './ast-nodes.js';

export interface SerializeOptions {
  /** Keep Junk entries verbatim (default: true) */
  readonly withJunk?: boolean | undefined;
}

const INDENT = '    ';

const COMMENT_PREFIX: Record<CommentNode['kind'], string> = {
  comment: '#',
  group: '##',
  resource: '###',
};

// ============================================================
// ENTRIES
// ============================================================

function serializeEntry(entry: EntryNode): string {
  switch (entry.type) {
    case 'Message':
      return serializeMessage(entry);
    case 'Term':
      return serializeTerm(entry);
    case 'Comment':
      return serializeComment(entry);
    case 'Junk':
      return serializeJunk(entry);
  }
}

function serializeComment(comment: CommentNode): string {
  const prefix = COMMENT_PREFIX[comment.kind];
  return comment.content
    .split('\n')
    .map((line) => (line === '' ? `${prefix}\n` : `${prefix} ${line}\n`))
    .join('');
}

function serializeJunk(junk: JunkNode): string {
  return `${junk.content.replace(/[\r\n]+$/, '')}\n`;
}

function serializeMessage(message: MessageNode): string {
  let result = message.comment ? serializeComment(message.comment) : '';
  result += message.id.name;
  result += message.value ? ` = ${serializePattern(message.value, 0)}` : ' =';
  result += serializeAttributes(message.attributes);
  return `${result}\n`;
}

function serializeTerm(term: TermNode): string {
  let result = term.comment ? serializeComment(term.comment) : '';
  result += `-${term.id.name} = ${serializePattern(term.value, 0)}`;
  result += serializeAttributes(term.attributes);
  return `${result}\n`;
}

function serializeAttributes(attributes: readonly AttributeNode[]): string {
  return attributes
    .map(
      (attribute) =>
        `\n${INDENT}.${attribute.id.name} = ${serializePattern(attribute.value, 0)}`
    )
    .join('');
}

// ============================================================
// PATTERNS
// ============================================================

/** A character as a string-literal placeable */
function literalPlaceable(char: string): string {
  return `{ ${serializeString(char)} }`;
}

/**
 * Text of one element. Braces always become literal placeables; inside
 * variants `[` does too, since it would start the next variant. Embedded
 * newlines become indented continuation lines.
 */
function serializeText(value: string, depth: number, inVariant: boolean): string {
  const special = inVariant ? /[{}[]/g : /[{}]/g;
  const escaped = value.replace(special, literalPlaceable);
  return escaped
    .split('\n')
    .map((line, index) => {
      if (index === 0) return line;
      // A continuation line must not begin like a variant or attribute
      const first = line.charAt(0);
      const safe =
        first !== '' && '[*.'.includes(first)
          ? literalPlaceable(first) + line.slice(1)
          : line;
      return `\n${INDENT.repeat(depth + 1)}${safe}`;
    })
    .join('');
}

function serializePattern(pattern: PatternNode, depth: number, inVariant = false): string {
  return pattern.elements
    .map((element) =>
      element.type === 'TextElement'
        ? serializeText(element.value, depth, inVariant)
        : serializePlaceable(element.expression, depth)
    )
    .join('');
}

function serializePlaceable(expression: ExpressionNode, depth: number): string {
  if (expression.type === 'SelectExpression') {
    return `{ ${serializeSelect(expression, depth)}\n${INDENT.repeat(depth)}}`;
  }
  return `{ ${serializeExpression(expression, depth)} }`;
}

function serializeSelect(select: SelectExpressionNode, depth: number): string {
  const pad = INDENT.repeat(depth);
  const variants = select.variants
    .map((variant) => {
      const key =
        variant.key.type === 'Identifier' ? variant.key.name : variant.key.raw;
      const marker = variant.isDefault ? '  *' : '   ';
      const value = serializePattern(variant.value, depth + 1, true);
      return `\n${pad}${marker}[${key}] ${value}`;
    })
    .join('');
  return `${serializeExpression(select.selector, depth)} ->${variants}`;
}

// ============================================================
// EXPRESSIONS
// ============================================================

function serializeString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

function serializeExpression(expression: ExpressionNode, depth: number): string {
  switch (expression.type) {
    case 'StringLiteral':
      return serializeString(expression.value);
    case 'NumberLiteral':
      return expression.raw;
    case 'VariableReference':
      return `$${expression.id.name}`;
    case 'MessageReference':
      return expression.attribute
        ? `${expression.id.name}.${expression.attribute.name}`
        : expression.id.name;
    case 'TermReference': {
      let result = `-${expression.id.name}`;
      if (expression.attribute) result += `.${expression.attribute.name}`;
      if (expression.arguments) {
        result += serializeCallArguments(expression.arguments, depth);
      }
      return result;
    }
    case 'FunctionReference':
      return `${expression.id.name}${serializeCallArguments(expression.arguments, depth)}`;
    case 'SelectExpression':
      return serializePlaceable(expression, depth);
    case 'Placeable':
      return serializePlaceable(expression.expression, depth);
  }
}

function serializeCallArguments(args: CallArgumentsNode, depth: number): string {
  const parts = [
    ...args.positional.map((arg) => serializeExpression(arg, depth)),
    ...args.named.map(
      (arg) => `${arg.name.name}: ${serializeExpression(arg.value, depth)}`
    ),
  ];
  return `(${parts.join(', ')})`;
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Serialize a resource to FTL. Entries are separated by a blank line;
 * attached comments stay directly above their entry.
 *
 * Parsing the output and serializing again yields the same text.
 *
 * @example
 * ```typescript
 * serialize(parse('hello   =   Hello'));
 * // 'hello = Hello\n'
 * ```
 */
export function serialize(
  resource: ResourceNode,
  options: SerializeOptions = {}
): string {
  const withJunk = options.withJunk ?? true;
  return resource.body
    .filter((entry) => withJunk || entry.type !== 'Junk')
    .map(serializeEntry)
    .join('\n');
}
