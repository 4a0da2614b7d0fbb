/**
 * Tests for failure attribution paths
 */

import { describe, it, expect } from 'vitest';
import { computeNode, errorPaths, graph, inputNode } from '../src/index.js';

const pass = (_prev: number | undefined, values: Record<string, number | undefined>) =>
  Object.values(values).reduce<number>((acc, v) => acc + (v ?? 0), 0);

describe('Trace - Error Paths', () => {
  it('should name a labelled node by its label', () => {
    const input = inputNode<number>();
    const sum = computeNode({ input }, pass);

    expect(errorPaths(graph({ input, sum }), sum.id)).toEqual([['sum']]);
  });

  it('should report one path per label of the same node', () => {
    const input = inputNode<number>();
    const sum = computeNode({ input }, pass);

    expect(errorPaths(graph({ sum, total: sum }), sum.id)).toEqual([['sum'], ['total']]);
  });

  it('should follow source labels down through hidden nodes', () => {
    const input = inputNode<number>();
    const inner = computeNode({ input }, pass);
    const middle = computeNode({ feed: inner }, pass);
    const outer = computeNode({ stage: middle }, pass);

    expect(errorPaths(graph({ outer }), inner.id)).toEqual([['outer', 'stage', 'feed']]);
  });

  it('should stop at the nearest labelled ancestor', () => {
    const input = inputNode<number>();
    const inner = computeNode({ input }, pass);
    const middle = computeNode({ feed: inner }, pass);
    const outer = computeNode({ stage: middle }, pass);

    expect(errorPaths(graph({ middle, outer }), inner.id)).toEqual([['middle', 'feed']]);
  });

  it('should report every route through a shared node', () => {
    const input = inputNode<number>();
    const c = computeNode({ input }, pass);
    const c1 = computeNode({ source: c }, pass);
    const c2 = computeNode({ source: c }, pass);
    const c3 = computeNode({ c1, c2 }, pass);

    expect(errorPaths(graph({ input, c3 }), c.id)).toEqual([
      ['c3', 'c1', 'source'],
      ['c3', 'c2', 'source']
    ]);
  });

  it('should report each label a dependant uses for the same source', () => {
    const input = inputNode<number>();
    const shared = computeNode({ input }, pass);
    const pair = computeNode({ left: shared, right: shared }, pass);

    expect(errorPaths(graph({ pair }), shared.id)).toEqual([
      ['pair', 'left'],
      ['pair', 'right']
    ]);
  });

  it('should multiply paths across stacked diamonds', () => {
    const input = inputNode<number>();
    const root = computeNode({ input }, pass);
    const l1 = computeNode({ up: root }, pass);
    const r1 = computeNode({ up: root }, pass);
    const join = computeNode({ l: l1, r: r1 }, pass);
    const l2 = computeNode({ up: join }, pass);
    const r2 = computeNode({ up: join }, pass);
    const top = computeNode({ l: l2, r: r2 }, pass);

    expect(errorPaths(graph({ top }), root.id)).toEqual([
      ['top', 'l', 'up', 'l', 'up'],
      ['top', 'r', 'up', 'l', 'up'],
      ['top', 'l', 'up', 'r', 'up'],
      ['top', 'r', 'up', 'r', 'up']
    ]);
  });
});
