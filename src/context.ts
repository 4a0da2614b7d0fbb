/**
 * Context - a graph bound to a processor, its accumulated values and its
 * cached schedules
 *
 * Contexts are never mutated. process() and precompile() return new contexts,
 * so earlier ones stay valid and can be branched from independently.
 */

import type { NodeId, Result } from './core.js';
import { err, isInput, ok } from './core.js';
import { debug } from './debug.js';
import { ComputationError, ConfigurationError } from './errors.js';
import { resolve, type Graph } from './graph.js';
import { sequential, type Processor } from './processor.js';

export interface Context<S = unknown> {
  readonly graph: Graph;
  readonly processor: Processor<S>;
  /** Latest value of each compute node that has run. Inputs never appear. */
  readonly values: ReadonlyMap<NodeId, unknown>;
  /** Schedules keyed by the sorted set of input labels */
  readonly compilations: ReadonlyMap<string, S>;
}

export function context(graph: Graph): Context<NodeId[]>;
export function context<S>(graph: Graph, processor: Processor<S>): Context<S>;
export function context<S>(graph: Graph, processor?: Processor<S>): Context<S> | Context<NodeId[]> {
  if (processor === undefined) {
    return { graph, processor: sequential(), values: new Map(), compilations: new Map() };
  }
  return { graph, processor, values: new Map(), compilations: new Map() };
}

/**
 * Compile the schedule for a set of input labels ahead of the first process()
 * call that uses it
 */
export function precompile<S>(ctx: Context<S>, labels: Iterable<string>): Context<S> {
  return compilation(ctx, labels).ctx;
}

/**
 * Feed one batch of input values through the graph
 *
 * @example
 * let ctx = context(graph({ input, sum }));
 * ctx = await process(ctx, { input: 10 });
 * ctx = await process(ctx, { input: 10 });
 * value(ctx, 'sum'); // 20
 */
export async function process<S>(ctx: Context<S>, inputs: Readonly<Record<string, unknown>>): Promise<Context<S>> {
  const labels = Object.keys(inputs);
  const { ctx: compiled, schedule } = compilation(ctx, labels);

  const batch = new Map<NodeId, unknown>();
  for (const label of labels) {
    batch.set(resolve(ctx.graph, label).id, inputs[label]);
  }

  debug.process('start', { inputs: labels });
  const started = Date.now();
  try {
    const values = await ctx.processor.execute(ctx.graph, schedule, ctx.values, batch);
    debug.process('done', { inputs: labels, values: values.size, ms: Date.now() - started });
    return { ...compiled, values };
  } catch (error) {
    if (error instanceof ComputationError) {
      debug.process('failed', { node: error.nodeId, paths: error.paths });
    }
    throw error;
  }
}

/**
 * Like process(), but handler failures come back as a Result
 *
 * @example
 * const result = await attempt(ctx, { input: 1 });
 * if (result.ok) {
 *   ctx = result.value;
 * } else {
 *   console.error(result.error.paths);
 * }
 */
export async function attempt<S>(
  ctx: Context<S>,
  inputs: Readonly<Record<string, unknown>>
): Promise<Result<Context<S>, ComputationError>> {
  try {
    return ok(await process(ctx, inputs));
  } catch (error) {
    if (error instanceof ComputationError) return err(error);
    throw error;
  }
}

/**
 * Current value of a labelled node. Input labels always read as undefined.
 */
export function value<S>(ctx: Context<S>, label: string): unknown {
  return ctx.values.get(resolve(ctx.graph, label).id);
}

/**
 * Current values of every labelled node
 */
export function values<S>(ctx: Context<S>): Record<string, unknown> {
  // Own properties only, so a label such as __proto__ stays a plain key
  return Object.fromEntries(
    [...ctx.graph.labels].map(([label, id]): [string, unknown] => [label, ctx.values.get(id)])
  );
}

function compilation<S>(ctx: Context<S>, labels: Iterable<string>): { ctx: Context<S>; schedule: S } {
  const sorted = [...new Set(labels)].sort();
  const key = JSON.stringify(sorted);

  const cached = ctx.compilations.get(key);
  if (cached !== undefined) {
    debug.compile('hit', { key });
    return { ctx, schedule: cached };
  }

  const ids = new Set<NodeId>();
  for (const label of sorted) {
    const node = resolve(ctx.graph, label);
    if (!isInput(node)) {
      throw new ConfigurationError(`Label "${label}" names a compute node and cannot take input`);
    }
    ids.add(node.id);
  }

  const schedule = ctx.processor.compile(ctx.graph, ids);
  debug.compile('miss', { key, inputs: ids.size });
  const compilations = new Map(ctx.compilations).set(key, schedule);
  return { ctx: { ...ctx, compilations }, schedule };
}
