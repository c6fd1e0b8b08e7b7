/**
 * Connected-component split: disjoint workflows are laid out independently
 * and stacked afterwards.
 */

import type { NodeId, WorkflowLink, WorkflowNode } from './types';

/**
 * Find maximal sets of nodes reachable from one another when links are
 * treated as undirected edges.
 *
 * Uses an explicit stack so deep chains cannot exhaust the call stack.
 * Components come out in discovery order (input order of their first node);
 * nodes without links form singleton components.
 */
export function findConnectedComponents(
  nodes: WorkflowNode[],
  links: WorkflowLink[]
): NodeId[][] {
  const adjacency = new Map<NodeId, Set<NodeId>>();
  for (const node of nodes) adjacency.set(node.id, new Set());

  for (const link of links) {
    const a = adjacency.get(link.originId);
    const b = adjacency.get(link.targetId);
    if (!a || !b) continue;
    a.add(link.targetId);
    b.add(link.originId);
  }

  const visited = new Set<NodeId>();
  const components: NodeId[][] = [];

  for (const node of nodes) {
    if (visited.has(node.id)) continue;

    const component: NodeId[] = [];
    const stack: NodeId[] = [node.id];
    visited.add(node.id);

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      component.push(current);
      for (const neighbor of adjacency.get(current) ?? []) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        stack.push(neighbor);
      }
    }

    components.push(component);
  }

  return components;
}
