import { describe, it, expect } from 'vitest';
import { compareSortKeys, connectedPortYs, sortColumnsVertically } from '../../src/layout/vertical-sort';
import { assignColumns } from '../../src/layout/column-assignment';
import { findAllChains } from '../../src/layout/chains';
import { DEFAULT_LAYOUT_CONFIG } from '../../src/layout/config';
import { buildNodeGraph } from '../../src/layout/graph-builder';
import type { NodeId, Position, WorkflowGraph } from '../../src/layout/types';
import { link, node } from '../helpers';

function sorted(g: WorkflowGraph) {
  const graph = buildNodeGraph(g.nodes, g.links);
  const layout = assignColumns(graph, findAllChains(graph), DEFAULT_LAYOUT_CONFIG);
  return Object.fromEntries(sortColumnsVertically(graph, layout, DEFAULT_LAYOUT_CONFIG));
}

describe('compareSortKeys', () => {
  it('compares element-wise', () => {
    expect(compareSortKeys([5], [3])).toBe(1);
    expect(compareSortKeys([1, 2], [1, 3])).toBe(-1);
    expect(compareSortKeys([], [])).toBe(0);
  });

  it('sorts a longer key first when the shorter one runs out', () => {
    expect(compareSortKeys([1, 2], [1])).toBe(-1);
    expect(compareSortKeys([], [0])).toBe(1);
  });
});

describe('connectedPortYs', () => {
  it('estimates port Y from slot index on placed neighbours only', () => {
    const g = buildNodeGraph(
      [node('a'), node('b'), node('c')],
      [link('a', 'c', { originSlot: 2 }), link('c', 'b', { targetSlot: 1 })]
    );
    const placed = new Map<NodeId, Position>([['a', [100, 10]]]);
    expect(connectedPortYs(g, 'c', placed, DEFAULT_LAYOUT_CONFIG)).toEqual([80]);
    placed.set('b', [300, 0]);
    expect(connectedPortYs(g, 'c', placed, DEFAULT_LAYOUT_CONFIG)).toEqual([50, 80]);
  });
});

describe('sortColumnsVertically', () => {
  it('stacks a column top to bottom with node spacing, ties in member order', () => {
    const g = {
      nodes: [node('A'), node('B'), node('C'), node('D')],
      links: [link('A', 'B'), link('A', 'C'), link('B', 'D'), link('C', 'D')],
    };
    expect(sorted(g)).toEqual({
      A: [100, 0],
      B: [300, 0],
      C: [300, 110],
      D: [500, 0],
    });
  });

  it('follows the vertical order of the previous column', () => {
    const g = {
      nodes: [node('A'), node('B'), node('X'), node('Y')],
      links: [link('A', 'Y'), link('B', 'X')],
    };
    expect(sorted(g)).toEqual({
      A: [100, 0],
      B: [100, 110],
      Y: [300, 0],
      X: [300, 110],
    });
  });

  it('re-sorts the first column by the input ports it feeds', () => {
    const g = {
      nodes: [node('P'), node('Q'), node('M')],
      links: [link('P', 'M', { targetSlot: 1 }), link('Q', 'M', { targetSlot: 0 })],
    };
    expect(sorted(g)).toEqual({
      Q: [100, 0],
      P: [100, 110],
      M: [300, 0],
    });
  });

  it('uses each node height for the stacking step', () => {
    const g = {
      nodes: [node('A'), node('B', { height: 200 }), node('C')],
      links: [link('A', 'B'), link('A', 'C')],
    };
    expect(sorted(g)).toEqual({
      A: [100, 0],
      B: [300, 0],
      C: [300, 260],
    });
  });
});
