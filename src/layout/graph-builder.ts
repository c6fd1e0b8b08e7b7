/**
 * Adjacency construction from the flat node/link lists an editor sends.
 */

import type { NodeGraph, NodeId, WorkflowLink, WorkflowNode } from './types';

/**
 * Keep only nodes that are the origin or target of at least one link.
 *
 * Notes, groups and other free-standing elements have no links and are
 * excluded from layout entirely.  Input order is preserved.
 */
export function filterConnectedNodes(
  nodes: WorkflowNode[],
  links: WorkflowLink[]
): WorkflowNode[] {
  const connected = new Set<NodeId>();
  for (const link of links) {
    connected.add(link.originId);
    connected.add(link.targetId);
  }
  return nodes.filter((n) => connected.has(n.id));
}

/**
 * Build the node lookup plus children/parents adjacency.
 *
 * Every node gets an (initially empty) entry in both maps.  Links that
 * reference an unknown node id are dropped.
 */
export function buildNodeGraph(nodes: WorkflowNode[], links: WorkflowLink[]): NodeGraph {
  const nodeMap = new Map<NodeId, WorkflowNode>();
  const children = new Map<NodeId, NodeId[]>();
  const parents = new Map<NodeId, NodeId[]>();

  for (const node of nodes) {
    nodeMap.set(node.id, node);
    children.set(node.id, []);
    parents.set(node.id, []);
  }

  const kept: WorkflowLink[] = [];
  for (const link of links) {
    const out = children.get(link.originId);
    const inc = parents.get(link.targetId);
    if (!out || !inc) continue;
    out.push(link.targetId);
    inc.push(link.originId);
    kept.push(link);
  }

  return { nodeMap, children, parents, links: kept };
}

/** Links whose origin and target both belong to `ids`. */
export function linksWithin(links: WorkflowLink[], ids: ReadonlySet<NodeId>): WorkflowLink[] {
  return links.filter((l) => ids.has(l.originId) && ids.has(l.targetId));
}
