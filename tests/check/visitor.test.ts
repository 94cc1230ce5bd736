/**
 * Visitor, Transformer and reference collection
 */

import { describe, it, expect } from 'vitest';
import {
  REMOVE,
  Transformer,
  Visitor,
  childrenOf,
  collectReferences,
  parse,
  serialize,
  visitNode,
  type ASTNode,
  type TextElementNode,
  type TransformOutput,
  type VariableReferenceNode,
} from '../../src/index.js';

describe('childrenOf', () => {
  it('lists children in source order', () => {
    const [message] = parse('a = { $x }\n    .title = T').body;
    if (!message) throw new Error('no entry');

    expect(childrenOf(message).map((child) => child.type)).toEqual([
      'Identifier',
      'Pattern',
      'Attribute',
    ]);
  });

  it('has no children for leaves', () => {
    const resource = parse('a = text');
    const leaves: ASTNode[] = [];
    visitNode(resource, leaves, {
      enter(node, acc) {
        if (childrenOf(node).length === 0) acc.push(node);
      },
    });

    expect(leaves.map((node) => node.type)).toEqual(['Identifier', 'TextElement']);
  });
});

describe('visitNode', () => {
  it('calls enter before and exit after the children', () => {
    const events: string[] = [];
    visitNode(parse('a = { $x }'), events, {
      enter(node, acc) {
        acc.push(`+${node.type}`);
      },
      exit(node, acc) {
        acc.push(`-${node.type}`);
      },
    });

    expect(events).toEqual([
      '+Resource',
      '+Message',
      '+Identifier',
      '-Identifier',
      '+Pattern',
      '+Placeable',
      '+VariableReference',
      '+Identifier',
      '-Identifier',
      '-VariableReference',
      '-Placeable',
      '-Pattern',
      '-Message',
      '-Resource',
    ]);
  });
});

describe('Visitor', () => {
  class VariableNames extends Visitor {
    readonly names: string[] = [];

    override visitVariableReference(node: VariableReferenceNode): void {
      this.names.push(node.id.name);
    }
  }

  it('dispatches to overridden methods and descends elsewhere', () => {
    const visitor = new VariableNames();
    visitor.visit(
      parse('a = { $n ->\n    [one] { $x }\n   *[other] { NUMBER($y) }\n}')
    );

    expect(visitor.names).toEqual(['n', 'x', 'y']);
  });
});

describe('Transformer', () => {
  it('rebuilds the tree without touching the original', () => {
    class Rename extends Transformer {
      override transformVariableReference(
        node: VariableReferenceNode
      ): TransformOutput {
        return { ...node, id: { ...node.id, name: 'renamed' } };
      }
    }
    const original = parse('a = { $x }');
    const result = new Rename().transformRoot(original);

    expect(serialize(result)).toBe('a = { $renamed }\n');
    expect(serialize(original)).toBe('a = { $x }\n');
  });

  it('removes nodes from lists and optional slots', () => {
    class StripComments extends Transformer {
      override transformComment(): TransformOutput {
        return REMOVE;
      }
    }
    const result = new StripComments().transformRoot(
      parse('# About a\na = A\n\n## Group\n')
    );

    expect(serialize(result)).toBe('a = A\n');
  });

  it('splices arrays into lists', () => {
    class Exclaim extends Transformer {
      override transformTextElement(node: TextElementNode): TransformOutput {
        return [node, { ...node, value: '!' }];
      }
    }
    const result = new Exclaim().transformRoot(parse('a = Hi'));

    expect(serialize(result)).toBe('a = Hi!\n');
  });

  it('rejects removal from a required slot', () => {
    class DropIds extends Transformer {
      override transformIdentifier(): TransformOutput {
        return REMOVE;
      }
    }

    expect(() => new DropIds().transformRoot(parse('a = A'))).toThrow(
      'The message id slot requires exactly one node'
    );
  });

  it('rejects a node of the wrong kind in a list', () => {
    class Wrong extends Transformer {
      override transformTextElement(node: TextElementNode): TransformOutput {
        return { type: 'Identifier', name: 'x', span: node.span };
      }
    }

    expect(() => new Wrong().transformRoot(parse('a = A'))).toThrow(
      'Transform produced Identifier where TextElement was expected'
    );
  });
});

describe('collectReferences', () => {
  it('gathers messages, terms, variables and functions', () => {
    const refs = collectReferences(
      parse('m = { a.b } { -t(x: 1) } { $v } { F($w, k: "s") }')
    );

    expect([...refs.messages]).toEqual(['a']);
    expect([...refs.terms]).toEqual(['t']);
    expect([...refs.variables]).toEqual(['v', 'w']);
    expect([...refs.functions]).toEqual(['F']);
  });
});
