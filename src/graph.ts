/**
 * Graph - immutable registry of nodes and their adjacency
 *
 * Only the nodes a caller names carry labels. Their sources are pulled in
 * transitively as hidden nodes, deduplicated by identity. Every add() returns
 * a new graph and leaves the old one usable.
 */

import type { Node, NodeId } from './core.js';
import { debug } from './debug.js';
import { ConfigurationError, StructuralError } from './errors.js';

export interface Graph {
  /** Caller-chosen names, in registration order */
  readonly labels: ReadonlyMap<string, NodeId>;
  /** Every node reachable from a labelled node */
  readonly nodes: ReadonlyMap<NodeId, Node>;
  /** Node id to the ids of its sources */
  readonly sources: ReadonlyMap<NodeId, ReadonlySet<NodeId>>;
  /** Node id to the ids of the nodes using it as a source, in insertion order */
  readonly dependants: ReadonlyMap<NodeId, ReadonlySet<NodeId>>;
}

const EMPTY: Graph = {
  labels: new Map(),
  nodes: new Map(),
  sources: new Map(),
  dependants: new Map()
};

/**
 * Build a graph from labelled nodes
 *
 * @example
 * const input = inputNode<number>();
 * const sum = computeNode({ source: input }, (prev: number | undefined, { source }) =>
 *   (prev ?? 0) + (source ?? 0)
 * );
 * const g = graph({ input, sum });
 */
export function graph(nodes: Readonly<Record<string, Node>> = {}): Graph {
  return Object.entries(nodes).reduce((g, [label, node]) => add(g, label, node), EMPTY);
}

/**
 * Register `node` under `label`, adding its sources as hidden nodes
 */
export function add(g: Graph, label: string, node: Node): Graph {
  if (g.labels.has(label)) {
    throw new ConfigurationError(`Label "${label}" is already registered`);
  }

  const nodes = new Map(g.nodes);
  const sources = new Map(g.sources);
  const dependants = new Map<NodeId, ReadonlySet<NodeId>>(g.dependants);

  // Pre-order walk with an explicit stack, sources visited in declaration
  // order. A node is registered before its sources, so reaching it again
  // through a cycle finds it present and the walk stops.
  const stack: Node[] = [node];
  let n = stack.pop();
  while (n !== undefined) {
    const existing = nodes.get(n.id);
    if (existing !== undefined) {
      if (existing !== n) {
        throw new StructuralError(`Two different nodes share the id "${n.id}"`, n.id);
      }
    } else {
      nodes.set(n.id, n);
      if (n.kind === 'input') {
        sources.set(n.id, new Set());
      } else {
        const ids = new Set<NodeId>();
        const ordered = Object.values(n.sources);
        for (const source of ordered) {
          ids.add(source.id);
          dependants.set(source.id, new Set(dependants.get(source.id)).add(n.id));
        }
        sources.set(n.id, ids);
        for (let i = ordered.length - 1; i >= 0; i--) stack.push(ordered[i]);
      }
    }
    n = stack.pop();
  }

  const cycle = findCycle(node.id, sources);
  if (cycle.length > 0) {
    debug.graph('cycle', { label, cycle });
    throw new StructuralError(`Adding "${label}" would create a cycle: ${cycle.join(' -> ')}`, node.id, cycle);
  }

  const labels = new Map(g.labels).set(label, node.id);
  debug.graph('add', { label, id: node.id, nodes: nodes.size });
  return { labels, nodes, sources, dependants };
}

/**
 * Depth-first walk along source edges. Returns the cycle as a list of ids
 * (first id repeated at the end), or an empty list.
 */
function findCycle(start: NodeId, sources: ReadonlyMap<NodeId, ReadonlySet<NodeId>>): NodeId[] {
  const onPath = new Set<NodeId>();
  const path: NodeId[] = [];
  const done = new Set<NodeId>();
  // One source iterator per id on the current path
  const frames: Iterator<NodeId>[] = [];

  function enter(id: NodeId): void {
    onPath.add(id);
    path.push(id);
    frames.push((sources.get(id) ?? new Set<NodeId>()).values());
  }

  enter(start);
  while (frames.length > 0) {
    const step = frames[frames.length - 1].next();
    if (step.done) {
      frames.pop();
      const id = path.pop();
      if (id !== undefined) {
        onPath.delete(id);
        done.add(id);
      }
      continue;
    }
    const next = step.value;
    if (onPath.has(next)) {
      return [...path.slice(path.indexOf(next)), next];
    }
    if (!done.has(next)) enter(next);
  }
  return [];
}

/**
 * Labels registered for a node id
 */
export function labelsOf(g: Graph, id: NodeId): string[] {
  const labels: string[] = [];
  for (const [label, labelled] of g.labels) {
    if (labelled === id) labels.push(label);
  }
  return labels;
}

/**
 * Resolve a label, failing on unknown ones
 */
export function resolve(g: Graph, label: string): Node {
  const id = g.labels.get(label);
  const node = id === undefined ? undefined : g.nodes.get(id);
  if (node === undefined) {
    throw new ConfigurationError(`Unknown label "${label}"`);
  }
  return node;
}

/**
 * Get DAG structure for visualization
 *
 * Returns `[source, dependant]` pairs, naming labelled nodes by their first
 * label and hidden nodes by id.
 *
 * @example
 * const pairs = edges(graph({ input, sum }));
 * // [['input', 'sum']]
 */
export function edges(g: Graph): Array<[string, string]> {
  const name = (id: NodeId): string => labelsOf(g, id)[0] ?? id;
  const pairs: Array<[string, string]> = [];
  for (const [id, ids] of g.sources) {
    for (const source of ids) {
      pairs.push([name(source), name(id)]);
    }
  }
  return pairs;
}
