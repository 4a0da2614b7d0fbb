/**
 * Node - unit of an incremental computation DAG
 *
 * Input nodes are roots whose value only exists for the processing call that
 * supplies it. Compute nodes derive a new value from their previous value and
 * the current values of their sources.
 */

import { ConfigurationError } from './errors.js';

/**
 * Result of an operation that can succeed or fail
 */
export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Opaque, process-unique node identity */
export type NodeId = string;

export type IdGenerator = () => NodeId;

/**
 * Root node. Values are supplied per call and never stored.
 *
 * @template T - Value type supplied for this input
 */
export interface InputNode<T = unknown> {
  readonly kind: 'input';
  readonly id: NodeId;
  // Type-only marker, never set at runtime
  readonly _value?: T;
}

/**
 * Derived node.
 *
 * @template T - Value type produced by this node
 * @template S - Record of source label to source node
 */
export interface ComputeNode<T = unknown, S extends Sources = Sources> {
  readonly kind: 'compute';
  readonly id: NodeId;
  readonly sources: S;
  readonly _value?: T;
  compute(previous: T | undefined, sources: SourceValues<S>): T | PromiseLike<T>;
}

export type Node<T = unknown> = InputNode<T> | ComputeNode<T, Sources>;

export type Sources = { readonly [label: string]: Node };

export type NodeValue<N> = N extends { readonly _value?: infer V } ? V : never;

/**
 * Values handed to a handler. A source is undefined when it is an input that
 * was not supplied on this call, or a compute node that never ran.
 */
export type SourceValues<S extends Sources> = {
  [K in keyof S]: NodeValue<S[K]> | undefined;
};

export type Handler<T, S extends Sources> = (
  previous: T | undefined,
  sources: SourceValues<S>
) => T | PromiseLike<T>;

/**
 * Counter-backed id generator. Deterministic, so tests can predict ids.
 *
 * @example
 * const ids = sequentialIds('n');
 * ids(); // 'n1'
 * ids(); // 'n2'
 */
export function sequentialIds(prefix = 'node-'): IdGenerator {
  let next = 0;
  return () => `${prefix}${++next}`;
}

// Shared by every factory without an injected generator
const processIds = sequentialIds();

export interface NodeFactory {
  input<T = unknown>(): InputNode<T>;
  compute<const S extends Sources, T>(sources: S, handler: Handler<T, S>): ComputeNode<T, S>;
}

/**
 * Create node constructors bound to one id generator
 *
 * @example
 * const nodes = createNodeFactory(sequentialIds('n'));
 * const price = nodes.input<number>();
 * const total = nodes.compute({ price }, (prev: number | undefined, { price }) =>
 *   (prev ?? 0) + (price ?? 0)
 * );
 */
export function createNodeFactory(ids: IdGenerator = processIds): NodeFactory {
  return {
    input<T = unknown>(): InputNode<T> {
      return { kind: 'input', id: ids() };
    },
    compute<const S extends Sources, T>(sources: S, handler: Handler<T, S>): ComputeNode<T, S> {
      if (Object.keys(sources).length === 0) {
        throw new ConfigurationError('A compute node needs at least one source');
      }
      return {
        kind: 'compute',
        id: ids(),
        sources: { ...sources },
        compute: handler
      };
    }
  };
}

const defaultFactory = createNodeFactory();

/**
 * Create an input node with a fresh identity
 */
export function inputNode<T = unknown>(): InputNode<T> {
  return defaultFactory.input<T>();
}

/**
 * Create a compute node with a fresh identity
 *
 * @example
 * const input = inputNode<number>();
 * const sum = computeNode({ source: input }, (prev: number | undefined, { source }) =>
 *   (prev ?? 0) + (source ?? 0)
 * );
 */
export function computeNode<const S extends Sources, T>(
  sources: S,
  handler: Handler<T, S>
): ComputeNode<T, S> {
  return defaultFactory.compute(sources, handler);
}

export function isInput(node: Node): node is InputNode {
  return node.kind === 'input';
}
