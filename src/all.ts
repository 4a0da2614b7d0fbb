/**
 * Combine several nodes into one whose value is the record of their current
 * values.
 *
 * This is the graph equivalent of Promise.all(): downstream nodes can take a
 * single source instead of wiring each one.
 */

import { computeNode } from './core.js';
import type { ComputeNode, SourceValues, Sources } from './core.js';

/**
 * @example
 * const pair = all({ bid, ask });
 * const spread = computeNode({ pair }, (_prev: number | undefined, { pair }) =>
 *   (pair?.ask ?? 0) - (pair?.bid ?? 0)
 * );
 */
export function all<const S extends Sources>(sources: S): ComputeNode<SourceValues<S>, S> {
  return computeNode(sources, (_previous: SourceValues<S> | undefined, values) => values);
}
