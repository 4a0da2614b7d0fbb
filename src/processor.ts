/**
 * Processors - strategies for compiling and executing a schedule
 *
 * Both built-in processors work on a copy of the value map, so a failed call
 * leaves the caller's values untouched.
 */

import type { NodeId } from './core.js';
import { ComputationError, ConfigurationError } from './errors.js';
import type { Graph } from './graph.js';
import { levels } from './level.js';
import { errorPaths } from './trace.js';

export type Values = ReadonlyMap<NodeId, unknown>;

/**
 * Pluggable execution strategy
 *
 * @template S - Schedule produced by compile() and consumed by execute()
 */
export interface Processor<S> {
  compile(graph: Graph, inputs: ReadonlySet<NodeId>): S;
  /**
   * Returns the new value map for every compute node, carrying forward the
   * values of nodes outside the schedule
   */
  execute(graph: Graph, schedule: S, values: Values, inputs: Values): Promise<Map<NodeId, unknown>>;
}

/**
 * Run one compute node against `values`, falling back to `inputs` for
 * sources that hold no stored value
 *
 * Handler faults are rethrown as ComputationError with label-rooted paths.
 */
export async function evaluate(graph: Graph, id: NodeId, values: Values, inputs: Values): Promise<unknown> {
  const node = graph.nodes.get(id);
  if (node === undefined || node.kind !== 'compute') {
    throw new ConfigurationError(`Node "${id}" is not a compute node of this graph`);
  }

  // Own properties only, so a label such as __proto__ stays a plain key
  const args = Object.fromEntries(
    Object.entries(node.sources).map(([label, source]): [string, unknown] => [
      label,
      values.has(source.id) ? values.get(source.id) : inputs.get(source.id)
    ])
  );

  try {
    return await node.compute(values.get(id), args);
  } catch (error) {
    throw new ComputationError(id, errorPaths(graph, id), error);
  }
}

/**
 * Runs nodes one at a time, each seeing every value computed before it
 */
export function sequential(): Processor<NodeId[]> {
  return {
    compile(graph, inputs) {
      return levels(graph, inputs).slice(1).flat();
    },
    async execute(graph, schedule, values, inputs) {
      const next = new Map(values);
      for (const id of schedule) {
        next.set(id, await evaluate(graph, id, next, inputs));
      }
      return next;
    }
  };
}

export interface ParallelOptions {
  /** Most handlers running at once within a level (default: no limit) */
  concurrency?: number;
}

/**
 * Runs each level concurrently against a snapshot taken before the level
 * started, then merges the results before moving to the next level
 */
export function parallel(options: ParallelOptions = {}): Processor<NodeId[][]> {
  const concurrency = options.concurrency ?? Infinity;
  if (concurrency !== Infinity && (!Number.isInteger(concurrency) || concurrency < 1)) {
    throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  return {
    compile(graph, inputs) {
      return levels(graph, inputs).slice(1);
    },
    async execute(graph, schedule, values, inputs) {
      let current: Values = values;
      for (const level of schedule) {
        const snapshot = current;
        const results = await mapLimit(level, concurrency, (id) => evaluate(graph, id, snapshot, inputs));
        const next = new Map(snapshot);
        level.forEach((id, i) => next.set(id, results[i]));
        current = next;
      }
      return new Map(current);
    }
  };
}

/**
 * Map with at most `limit` calls in flight. The first failure rejects the
 * whole call and stops workers from picking up further items.
 */
async function mapLimit<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index]);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const workers = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
