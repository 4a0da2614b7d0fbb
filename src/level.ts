/**
 * Topological leveling
 *
 * Splits everything downstream of a set of input nodes into levels. Level 0
 * holds the inputs; every other node sits one level past the deepest of its
 * sources that is itself reachable from the inputs. Sources outside that
 * reachable set are ignored here and read from stale values at run time.
 */

import { isInput, type NodeId } from './core.js';
import type { Graph } from './graph.js';

export type Levels = NodeId[][];

/**
 * Compute execution levels for `inputs` (default: every input node)
 *
 * Nodes within a level follow graph insertion order, so the result is stable
 * for a given graph and input set.
 *
 * @example
 * //   a
 * //  / \
 * // b   c
 * //  \ /
 * //   d
 * levels(g, ['a']); // [['a'], ['b', 'c'], ['d']]
 */
export function levels(g: Graph, inputs?: Iterable<NodeId>): Levels {
  const roots = new Set(inputs ?? defaultInputs(g));
  const reachable = downstream(g, roots);
  const depth = new Map<NodeId, number>();
  for (const root of roots) depth.set(root, 0);

  // Kahn's algorithm over the reachable subgraph: a node is leveled once
  // every reachable source has been
  const pending = new Map<NodeId, number>();
  const ready: NodeId[] = [];
  for (const id of reachable) {
    let count = 0;
    for (const source of g.sources.get(id) ?? []) {
      if (reachable.has(source)) count++;
    }
    pending.set(id, count);
    if (count === 0) ready.push(id);
  }

  let current = ready.pop();
  while (current !== undefined) {
    let deepest = 0;
    for (const source of g.sources.get(current) ?? []) {
      deepest = Math.max(deepest, depth.get(source) ?? 0);
    }
    depth.set(current, deepest + 1);

    for (const next of g.dependants.get(current) ?? []) {
      const left = pending.get(next);
      if (left === undefined) continue;
      pending.set(next, left - 1);
      if (left === 1) ready.push(next);
    }
    current = ready.pop();
  }

  const result: Levels = [[...roots]];
  for (const id of g.nodes.keys()) {
    if (!reachable.has(id)) continue;
    const level = depth.get(id) ?? 1;
    while (result.length <= level) result.push([]);
    result[level].push(id);
  }
  return result;
}

/**
 * Ids of every input node in the graph
 */
export function defaultInputs(g: Graph): NodeId[] {
  const ids: NodeId[] = [];
  for (const [id, node] of g.nodes) {
    if (isInput(node)) ids.push(id);
  }
  return ids;
}

/**
 * Every node reachable from `roots` along dependant edges, roots excluded
 */
function downstream(g: Graph, roots: ReadonlySet<NodeId>): Set<NodeId> {
  const seen = new Set<NodeId>();
  const stack = [...roots];
  let id = stack.pop();
  while (id !== undefined) {
    for (const next of g.dependants.get(id) ?? []) {
      if (!seen.has(next) && !roots.has(next)) {
        seen.add(next);
        stack.push(next);
      }
    }
    id = stack.pop();
  }
  return seen;
}
