/**
 * Error taxonomy
 *
 * Every failure raised by the engine is one of three kinds:
 * - ConfigurationError: caller misuse found before any handler runs
 * - StructuralError: graph assembly that would break the DAG
 * - ComputationError: a node handler threw during process()
 */

import type { NodeId } from './core.js';

export class DagflowError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends DagflowError {}

export class StructuralError extends DagflowError {
  /** Ids forming the cycle, first id repeated at the end */
  readonly cycle: readonly NodeId[];
  readonly nodeId: NodeId;

  constructor(message: string, nodeId: NodeId, cycle: readonly NodeId[] = []) {
    super(message);
    this.nodeId = nodeId;
    this.cycle = cycle;
  }
}

/**
 * A node handler failed.
 *
 * `paths` lists every route from a labelled node down to the failing one,
 * each hop named by the label the dependant uses for its source.
 */
export class ComputationError extends DagflowError {
  readonly nodeId: NodeId;
  readonly paths: readonly (readonly string[])[];

  constructor(nodeId: NodeId, paths: readonly (readonly string[])[], cause: unknown) {
    const where = paths.length > 0 ? paths.map((p) => p.join(' > ')).join(', ') : nodeId;
    super(`Node failed at ${where}: ${describe(cause)}`, { cause });
    this.nodeId = nodeId;
    this.paths = paths;
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
