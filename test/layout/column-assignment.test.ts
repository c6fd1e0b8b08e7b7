import { describe, it, expect } from 'vitest';
import {
  anchorLongestChains,
  assignColumns,
  compactColumns,
  createWorkspace,
  findLeftwardLinks,
  placeColumns,
  placeRemainingNodes,
} from '../../src/layout/column-assignment';
import { findAllChains } from '../../src/layout/chains';
import { DEFAULT_LAYOUT_CONFIG } from '../../src/layout/config';
import { buildNodeGraph } from '../../src/layout/graph-builder';
import type { NodeId } from '../../src/layout/types';
import { graphOf, link, node } from '../helpers';

function build(ids: NodeId[], edges: Array<[NodeId, NodeId]>) {
  const g = graphOf(ids, edges);
  return buildNodeGraph(g.nodes, g.links);
}

function columnXs(ids: NodeId[], edges: Array<[NodeId, NodeId]>) {
  const graph = build(ids, edges);
  const layout = assignColumns(graph, findAllChains(graph), DEFAULT_LAYOUT_CONFIG);
  const xs: Record<string, number> = {};
  for (const column of layout.columns) {
    for (const id of column.members) xs[String(id)] = column.x;
  }
  return { layout, xs };
}

describe('anchorLongestChains', () => {
  it('uses the chain position as column index, first chain wins', () => {
    const graph = build(['A', 'B', 'C', 'D'], [['A', 'B'], ['A', 'C'], ['B', 'D'], ['C', 'D']]);
    const ws = createWorkspace();
    anchorLongestChains(graph, findAllChains(graph), ws);
    expect(Object.fromEntries(ws.nodeColumns)).toEqual({ A: 0, B: 1, C: 1, D: 2 });
    expect([...ws.columns.keys()]).toEqual([0, 1, 2]);
  });
});

describe('placeColumns', () => {
  it('accumulates widths and spacing from startX', () => {
    const graph = buildNodeGraph(
      [node('A', { width: 80 }), node('B', { width: 200 }), node('C', { width: 50 })],
      [link('A', 'B'), link('B', 'C')]
    );
    const ws = createWorkspace();
    anchorLongestChains(graph, findAllChains(graph), ws);
    placeColumns(ws, DEFAULT_LAYOUT_CONFIG);
    expect([...ws.columns.values()].map((c) => c.x)).toEqual([100, 280, 580]);
  });
});

describe('placeRemainingNodes', () => {
  it('puts a node right of its rightmost positioned parent', () => {
    // Longest chain A→B→C→D; E hangs off B.
    const graph = build(
      ['A', 'B', 'C', 'D', 'E'],
      [['A', 'B'], ['B', 'C'], ['C', 'D'], ['B', 'E']]
    );
    const ws = createWorkspace();
    anchorLongestChains(graph, findAllChains(graph), ws);
    placeColumns(ws, DEFAULT_LAYOUT_CONFIG);
    expect(placeRemainingNodes(graph, ws, DEFAULT_LAYOUT_CONFIG)).toBe(1);
    expect(ws.nodeColumns.get('E')).toBe(2);
  });

  it('clamps a parentless node feeding column 0 to column 0', () => {
    const graph = build(['R', 'K'], [['R', 'K']]);
    const ws = createWorkspace();
    ws.nodeColumns.set('K', 0);
    ws.columns.set(0, { x: 100, width: 100 });
    placeRemainingNodes(graph, ws, DEFAULT_LAYOUT_CONFIG);
    expect(ws.nodeColumns.get('R')).toBe(0);
  });

  it('opens a new column after the last one when no neighbour is placed', () => {
    const graph = build(['A', 'B'], [['A', 'B'], ['B', 'A']]);
    const ws = createWorkspace();
    placeRemainingNodes(graph, ws, DEFAULT_LAYOUT_CONFIG);
    expect(Object.fromEntries(ws.nodeColumns)).toEqual({ A: 0, B: 1 });
    expect(ws.columns.get(0)).toEqual({ x: 100, width: 100 });
    expect(ws.columns.get(1)).toEqual({ x: 300, width: 100 });
  });
});

describe('findLeftwardLinks', () => {
  it('flags links whose target starts before the origin ends', () => {
    const graph = build(['A', 'B'], [['A', 'B']]);
    const ws = createWorkspace();
    ws.nodeColumns.set('A', 1);
    ws.nodeColumns.set('B', 0);
    ws.columns.set(0, { x: 100, width: 100 });
    ws.columns.set(1, { x: 300, width: 100 });
    expect(findLeftwardLinks(graph, ws).map((l) => l.id)).toEqual([1]);
  });
});

describe('compactColumns', () => {
  it('drops empty columns and renumbers densely', () => {
    const graph = build(['A', 'B'], [['A', 'B']]);
    const ws = createWorkspace();
    ws.nodeColumns.set('A', 0);
    ws.nodeColumns.set('B', 3);
    ws.columns.set(0, { x: 100, width: 100 });
    ws.columns.set(1, { x: 300, width: 0 });
    ws.columns.set(3, { x: 600, width: 100 });
    const { columns, nodeColumns } = compactColumns(graph, ws, DEFAULT_LAYOUT_CONFIG);
    expect(columns).toEqual([
      { index: 0, x: 100, width: 100, members: ['A'] },
      { index: 1, x: 300, width: 100, members: ['B'] },
    ]);
    expect(nodeColumns.get('B')).toBe(1);
  });
});

describe('assignColumns', () => {
  it('lays a two-node chain out in two columns', () => {
    const { layout, xs } = columnXs([1, 2], [[1, 2]]);
    expect(xs).toEqual({ 1: 100, 2: 300 });
    expect(layout.converged).toBe(true);
    expect(layout.iterations).toBe(0);
  });

  it('moves the target of a leftward link into a new column', () => {
    const { layout, xs } = columnXs(
      ['A', 'B', 'C', 'D', 'N', 'P', 'X'],
      [['A', 'B'], ['B', 'C'], ['C', 'D'], ['X', 'P'], ['P', 'N']]
    );
    expect(layout.converged).toBe(true);
    expect(layout.iterations).toBe(1);
    expect(xs).toEqual({ A: 100, B: 300, C: 500, D: 700, X: 900, P: 1100, N: 1300 });
  });

  it('reports non-convergence for a cycle and keeps a best-effort layout', () => {
    const { layout, xs } = columnXs(['A', 'B'], [['A', 'B'], ['B', 'A']]);
    expect(layout.converged).toBe(false);
    expect(layout.iterations).toBe(DEFAULT_LAYOUT_CONFIG.maxLeftwardIterations);
    expect(xs).toEqual({ A: 100, B: 300 });
  });

  it('moves a leftward-link target into an existing column when one fits', () => {
    // D lands right of everything in the fallback pass; A and F then both
    // need a column after D.  A opens it, F joins it.
    const { layout, xs } = columnXs(
      ['A', 'B', 'C', 'D', 'E', 'F', 'G'],
      [
        ['C', 'B'],
        ['C', 'A'],
        ['C', 'F'],
        ['B', 'E'],
        ['E', 'F'],
        ['G', 'D'],
        ['D', 'A'],
        ['D', 'F'],
      ]
    );
    expect(layout.converged).toBe(true);
    expect(layout.iterations).toBe(1);
    expect(layout.columns).toHaveLength(6);
    expect(layout.columns[5].members).toEqual(['A', 'F']);
    expect(xs).toEqual({ C: 100, B: 300, E: 500, G: 700, D: 900, A: 1100, F: 1100 });
  });

  it('respects the iteration cap', () => {
    const graph = build(['A', 'B'], [['A', 'B'], ['B', 'A']]);
    const layout = assignColumns(graph, [], { ...DEFAULT_LAYOUT_CONFIG, maxLeftwardIterations: 3 });
    expect(layout.iterations).toBe(3);
    expect(layout.converged).toBe(false);
  });

  it('keeps every link pointing right on an acyclic graph', () => {
    const ids = ['s', 'a', 'b', 'c', 'd', 'e', 't'];
    const edges: Array<[NodeId, NodeId]> = [
      ['s', 'a'],
      ['a', 'b'],
      ['b', 'c'],
      ['c', 't'],
      ['s', 'd'],
      ['d', 't'],
      ['e', 'c'],
    ];
    const graph = build(ids, edges);
    const layout = assignColumns(graph, findAllChains(graph), DEFAULT_LAYOUT_CONFIG);
    expect(layout.converged).toBe(true);
    for (const [origin, target] of edges) {
      expect(layout.nodeColumns.get(origin)).toBeLessThan(layout.nodeColumns.get(target) ?? -1);
    }
  });
});
