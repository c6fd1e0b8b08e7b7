/**
 * Root-to-leaf path enumeration.
 *
 * Every path from a node without inputs to a node without outputs is
 * listed; shared prefixes are not merged.  The count grows exponentially
 * with fan-out, which is acceptable for editor workflows of a few dozen
 * nodes and bounded by `maxChains` otherwise.
 */

import { MAX_CHAINS } from '../constants';
import type { Chain, NodeGraph, NodeId } from './types';

/** Raised when path enumeration would exceed the configured chain budget. */
export class ChainLimitError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Workflow has more than ${limit} root-to-leaf chains; too branched to organize`);
    this.name = 'ChainLimitError';
    this.limit = limit;
  }
}

export interface ChainOptions {
  maxChains?: number;
}

/** Nodes with no parents, in node-map order. */
export function findRootNodes(graph: NodeGraph): NodeId[] {
  const roots: NodeId[] = [];
  for (const [id, parents] of graph.parents) {
    if (parents.length === 0) roots.push(id);
  }
  return roots;
}

/**
 * Enumerate all chains from root nodes to leaf nodes.
 *
 * Children are expanded in adjacency order, so chains come out in the same
 * order a recursive depth-first walk would produce.  A child that is
 * already on the current path closes a cycle and is not followed.
 * A graph without roots yields no chains.
 */
export function findAllChains(graph: NodeGraph, options: ChainOptions = {}): Chain[] {
  const maxChains = options.maxChains ?? MAX_CHAINS;
  const chains: Chain[] = [];

  for (const root of findRootNodes(graph)) {
    const stack: Chain[] = [[root]];

    while (stack.length > 0) {
      const path = stack.pop();
      if (!path) break;
      const current = path[path.length - 1];
      const next = (graph.children.get(current) ?? []).filter((c) => !path.includes(c));

      if (next.length === 0) {
        if (chains.length >= maxChains) throw new ChainLimitError(maxChains);
        chains.push(path);
        continue;
      }

      for (let i = next.length - 1; i >= 0; i--) {
        stack.push([...path, next[i]]);
      }
    }
  }

  return chains;
}

/** All chains tied for the maximum length. */
export function longestChains(chains: Chain[]): Chain[] {
  if (chains.length === 0) return [];
  const max = chains.reduce((m, c) => Math.max(m, c.length), 0);
  return chains.filter((c) => c.length === max);
}
