/**
 * Reference Rules
 * Undefined message and term references, and reference cycles.
 */

import type {
  ASTNode,
  MessageReferenceNode,
  PatternNode,
  ResourceNode,
  TermReferenceNode,
} from '../../ast-nodes.js';
import type {
  CheckDiagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { Visitor } from '../visitor.js';
import { diagnosticAt } from './helpers.js';

// ============================================================
// UNDEFINED REFERENCE RULES
// ============================================================

export const UNDEFINED_MESSAGE_REFERENCE: ValidationRule = {
  code: 'undefined-message-reference',
  category: 'references',
  severity: 'warning',
  description: 'Reference to a message not defined in the resource',
  nodeTypes: ['MessageReference'],

  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[] {
    if (node.type !== 'MessageReference') return [];
    if (context.messageIds.has(node.id.name)) return [];

    return [
      diagnosticAt(
        context,
        node.span.start,
        this.code,
        this.severity,
        `Message '${node.id.name}' is not defined`
      ),
    ];
  },
};

export const UNDEFINED_TERM_REFERENCE: ValidationRule = {
  code: 'undefined-term-reference',
  category: 'references',
  severity: 'warning',
  description: 'Reference to a term not defined in the resource',
  nodeTypes: ['TermReference'],

  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[] {
    if (node.type !== 'TermReference') return [];
    if (context.termIds.has(node.id.name)) return [];

    return [
      diagnosticAt(
        context,
        node.span.start,
        this.code,
        this.severity,
        `Term '-${node.id.name}' is not defined`
      ),
    ];
  },
};

// ============================================================
// REFERENCE GRAPH
// ============================================================

/**
 * Keys match the resolver's cycle keys: `id`, `id.attr`, `-id`, `-id.attr`.
 * A message value and each of its attributes are separate vertices, so
 * `{ foo.title }` inside `foo` is not a cycle.
 */
interface GraphVertex {
  readonly offset: number;
  readonly edges: string[];
}

class EdgeCollector extends Visitor {
  readonly keys: string[] = [];

  override visitMessageReference(node: MessageReferenceNode): void {
    this.keys.push(
      node.attribute ? `${node.id.name}.${node.attribute.name}` : node.id.name
    );
  }

  override visitTermReference(node: TermReferenceNode): void {
    this.keys.push(
      node.attribute
        ? `-${node.id.name}.${node.attribute.name}`
        : `-${node.id.name}`
    );
    if (node.arguments) this.visit(node.arguments);
  }
}

function edgesOf(pattern: PatternNode): string[] {
  const collector = new EdgeCollector();
  collector.visit(pattern);
  return collector.keys;
}

/** Later definitions replace earlier ones, as they do at runtime */
function buildGraph(resource: ResourceNode): Map<string, GraphVertex> {
  const graph = new Map<string, GraphVertex>();

  for (const entry of resource.body) {
    if (entry.type !== 'Message' && entry.type !== 'Term') continue;

    const base = entry.type === 'Term' ? `-${entry.id.name}` : entry.id.name;
    if (entry.value) {
      graph.set(base, { offset: entry.span.start, edges: edgesOf(entry.value) });
    }
    for (const attribute of entry.attributes) {
      graph.set(`${base}.${attribute.id.name}`, {
        offset: attribute.span.start,
        edges: edgesOf(attribute.value),
      });
    }
  }

  return graph;
}

/**
 * Cycles found by depth-first search, each reported once.
 * A cycle is identified by its sorted member set, so `a -> b -> a` and
 * `b -> a -> b` count as the same cycle.
 */
function findCycles(graph: ReadonlyMap<string, GraphVertex>): string[][] {
  const cycles: string[][] = [];
  const reported = new Set<string>();
  const done = new Set<string>();

  const walk = (key: string, stack: string[]): void => {
    const index = stack.indexOf(key);
    if (index !== -1) {
      const members = stack.slice(index);
      const identity = [...members].sort().join('\u0000');
      if (!reported.has(identity)) {
        reported.add(identity);
        cycles.push([...members, key]);
      }
      return;
    }
    if (done.has(key)) return;

    const vertex = graph.get(key);
    if (!vertex) return;

    stack.push(key);
    for (const edge of vertex.edges) {
      walk(edge, stack);
    }
    stack.pop();
    done.add(key);
  };

  for (const key of graph.keys()) {
    walk(key, []);
  }
  return cycles;
}

// ============================================================
// CIRCULAR_REFERENCE RULE
// ============================================================

/**
 * Cycles among message and term references. Any of them would resolve to
 * a fallback at runtime with a cyclic reference diagnostic.
 */
export const CIRCULAR_REFERENCE: ValidationRule = {
  code: 'circular-reference',
  category: 'references',
  severity: 'warning',
  description: 'Messages or terms that reference each other in a cycle',
  nodeTypes: ['Resource'],

  validate(node: ASTNode, context: ValidationContext): CheckDiagnostic[] {
    if (node.type !== 'Resource') return [];

    const graph = buildGraph(node);
    return findCycles(graph).map((cycle) => {
      const offset = graph.get(cycle[0] ?? '')?.offset ?? node.span.start;
      return diagnosticAt(
        context,
        offset,
        this.code,
        this.severity,
        `Circular reference: ${cycle.join(' -> ')}`
      );
    });
  },
};
