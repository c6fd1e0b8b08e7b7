import type { ToolResult } from '../src/types';
import type { NodeId, WorkflowGraph, WorkflowLink, WorkflowNode } from '../src/layout/types';

export function parseResult(result: ToolResult) {
  return JSON.parse(result.content[0].text);
}

/** Build a node; size defaults to 100×50 at the origin. */
export function node(
  id: NodeId,
  opts: Partial<Omit<WorkflowNode, 'id'>> = {}
): WorkflowNode {
  return { id, type: opts.type ?? `T${id}`, x: 0, y: 0, width: 100, height: 50, ...opts };
}

let nextLinkId = 1;

/** Build a link origin → target (slots default to 0). */
export function link(
  originId: NodeId,
  targetId: NodeId,
  opts: Partial<Omit<WorkflowLink, 'originId' | 'targetId'>> = {}
): WorkflowLink {
  return { id: opts.id ?? nextLinkId++, originId, targetId, originSlot: 0, targetSlot: 0, ...opts };
}

/** Graph whose nodes are 100×50 and linked along `edges` ([origin, target] pairs). */
export function graphOf(ids: NodeId[], edges: Array<[NodeId, NodeId]>): WorkflowGraph {
  return {
    nodes: ids.map((id) => node(id)),
    links: edges.map(([a, b], i) => link(a, b, { id: i + 1 })),
  };
}

/** Wire-format snapshot (pos/size arrays, snake_case links) as editors send it. */
export function wireGraph(graph: WorkflowGraph) {
  return {
    nodes: graph.nodes.map((n) => ({
      id: n.id,
      type: n.type,
      pos: [n.x, n.y],
      size: [n.width, n.height],
    })),
    links: graph.links.map((l) => ({
      id: l.id,
      origin_id: l.originId,
      origin_slot: l.originSlot,
      target_id: l.targetId,
      target_slot: l.targetSlot,
    })),
  };
}

/** Collects logger output lines in memory. */
export function captureSink() {
  const lines: string[] = [];
  return { lines, sink: (line: string) => lines.push(line) };
}
