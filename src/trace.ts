/**
 * Failure attribution
 *
 * Maps an internal node id back to names a reader of the graph definition
 * recognises: a label at the top, then the source labels used on each hop
 * down to the node.
 */

import type { NodeId } from './core.js';
import { labelsOf, type Graph } from './graph.js';

/**
 * Get every label-rooted path leading to a node
 *
 * Walks dependants upwards until each branch reaches a labelled node. A node
 * shared by several dependants yields one path per route. Each node's paths
 * are built once and reused by every route that passes through it.
 *
 * @example
 * // c3 = all({ c1, c2 }), c1 and c2 both use hidden node c as `source`
 * errorPaths(g, c.id);
 * // [['c3', 'c1', 'source'], ['c3', 'c2', 'source']]
 */
export function errorPaths(g: Graph, id: NodeId): string[][] {
  const memo = new Map<NodeId, string[][]>();

  // Explicit stack: a node is resolved once all of its dependants are
  const stack: NodeId[] = [id];
  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    if (memo.has(current)) {
      stack.pop();
      continue;
    }

    const labels = labelsOf(g, current);
    if (labels.length > 0) {
      memo.set(current, labels.map((label) => [label]));
      stack.pop();
      continue;
    }

    const dependants = [...(g.dependants.get(current) ?? [])];
    const unresolved = dependants.filter((dependant) => !memo.has(dependant));
    if (unresolved.length > 0) {
      stack.push(...unresolved);
      continue;
    }

    const paths: string[][] = [];
    for (const dependant of dependants) {
      const hops = sourceLabels(g, dependant, current);
      for (const prefix of memo.get(dependant) ?? []) {
        for (const hop of hops) {
          paths.push([...prefix, hop]);
        }
      }
    }
    memo.set(current, paths);
    stack.pop();
  }

  return memo.get(id) ?? [];
}

/**
 * Labels under which `dependant` refers to `source`
 */
function sourceLabels(g: Graph, dependant: NodeId, source: NodeId): string[] {
  const node = g.nodes.get(dependant);
  if (node === undefined || node.kind !== 'compute') return [];
  return Object.entries(node.sources)
    .filter(([, n]) => n.id === source)
    .map(([label]) => label);
}
