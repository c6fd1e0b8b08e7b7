import { describe, it, expect } from 'vitest';
import { findConnectedComponents } from '../../src/layout/components';
import { link, node } from '../helpers';

describe('findConnectedComponents', () => {
  it('treats links as undirected', () => {
    const nodes = [node(1), node(2), node(3)];
    const components = findConnectedComponents(nodes, [link(2, 1), link(2, 3)]);
    expect(components).toHaveLength(1);
    expect([...components[0]].sort()).toEqual([1, 2, 3]);
  });

  it('returns components in order of their first node', () => {
    const nodes = [node('x'), node('a'), node('y'), node('b')];
    const components = findConnectedComponents(nodes, [link('a', 'b'), link('x', 'y')]);
    expect(components.map((c) => [...c].sort())).toEqual([
      ['x', 'y'],
      ['a', 'b'],
    ]);
  });

  it('gives isolated nodes their own component', () => {
    const components = findConnectedComponents([node(1), node(2)], []);
    expect(components).toEqual([[1], [2]]);
  });

  it('handles long chains without recursion', () => {
    const count = 20_000;
    const nodes = Array.from({ length: count }, (_, i) => node(i));
    const links = Array.from({ length: count - 1 }, (_, i) => link(i, i + 1, { id: i }));
    const components = findConnectedComponents(nodes, links);
    expect(components).toHaveLength(1);
    expect(components[0]).toHaveLength(count);
  });

  it('ignores links to unknown nodes', () => {
    const components = findConnectedComponents([node(1), node(2)], [link(1, 42)]);
    expect(components).toEqual([[1], [2]]);
  });
});
