/**
 * dagflow - incremental computation DAG
 *
 * Build a graph of input and compute nodes, then feed batches of input values
 * through it. Each compute node derives its new value from its previous one
 * and the current values of its sources.
 *
 * @example
 * import { inputNode, computeNode, graph, context, process, value } from 'dagflow';
 *
 * const input = inputNode<number>();
 * const sum = computeNode({ source: input }, (prev: number | undefined, { source }) =>
 *   (prev ?? 0) + (source ?? 0)
 * );
 *
 * let ctx = context(graph({ input, sum }));
 * ctx = await process(ctx, { input: 10 });
 * ctx = await process(ctx, { input: 10 });
 * value(ctx, 'sum'); // 20
 */

export type {
  ComputeNode,
  Err,
  Handler,
  IdGenerator,
  InputNode,
  Node,
  NodeFactory,
  NodeId,
  NodeValue,
  Ok,
  Result,
  SourceValues,
  Sources
} from './core.js';
export { computeNode, createNodeFactory, err, inputNode, isInput, ok, sequentialIds } from './core.js';
export type { Graph } from './graph.js';
export { add, edges, graph, labelsOf, resolve } from './graph.js';
export type { Levels } from './level.js';
export { defaultInputs, levels } from './level.js';
export type { ParallelOptions, Processor, Values } from './processor.js';
export { evaluate, parallel, sequential } from './processor.js';
export { errorPaths } from './trace.js';
export type { Context } from './context.js';
export { attempt, context, precompile, process, value, values } from './context.js';
export { ComputationError, ConfigurationError, DagflowError, StructuralError } from './errors.js';
export type { ChannelName, DebugChannel, DebugConfig, DebugData } from './debug.js';
export { configureDebug, debug, refreshDebugChannels, resetDebugConfig } from './debug.js';
export { all } from './all.js';
