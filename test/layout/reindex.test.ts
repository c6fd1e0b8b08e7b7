import { describe, it, expect } from 'vitest';
import { compareIds, planReindex } from '../../src/layout/reindex';
import type { NodeId, Position, WorkflowGraph } from '../../src/layout/types';
import { link, node } from '../helpers';

function sampleGraph(): WorkflowGraph {
  return {
    nodes: [
      node(7, { x: 300, y: 0 }),
      node(3, { x: 100, y: 110 }),
      node(9, { x: 105, y: 0 }),
      node(5, { x: 100, y: 50 }),
    ],
    links: [link(3, 7, { id: 100 }), link(9, 3, { id: 300 }), link(9, 5, { id: 200 })],
  };
}

describe('compareIds', () => {
  it('compares numbers by value and everything else as strings', () => {
    expect(compareIds(2, 10)).toBeLessThan(0);
    expect(compareIds('10', '2')).toBeLessThan(0);
    expect(compareIds('a', 'a')).toBe(0);
  });
});

describe('planReindex', () => {
  it('numbers nodes by column, then top to bottom inside a column', () => {
    const plan = planReindex(sampleGraph());
    expect(Object.fromEntries(plan.nodeIds)).toEqual({ 9: 1, 5: 2, 3: 3, 7: 4 });
  });

  it('numbers links by renumbered origin, then target', () => {
    const plan = planReindex(sampleGraph());
    expect(Object.fromEntries(plan.linkIds)).toEqual({ 200: 1, 300: 2, 100: 3 });
  });

  it('limits the plan to the given positions', () => {
    const positions = new Map<NodeId, Position>([
      [3, [0, 0]],
      [7, [200, 0]],
    ]);
    const plan = planReindex(sampleGraph(), positions);
    expect(Object.fromEntries(plan.nodeIds)).toEqual({ 3: 1, 7: 2 });
    expect(Object.fromEntries(plan.linkIds)).toEqual({ 100: 1, 300: 2, 200: 3 });
  });

  it('skips unconnected nodes', () => {
    const graph = sampleGraph();
    graph.nodes.push(node(1, { x: 0, y: 0 }));
    expect(planReindex(graph).nodeIds.has(1)).toBe(false);
  });
});
