/**
 * Sequential id renumbering plan.
 *
 * After a layout, editors can renumber nodes so ids read left to right,
 * top to bottom, and renumber links by origin then target.  This module
 * only computes the mapping; applying it is the editor's job.
 */

import { REINDEX_COLUMN_TOLERANCE } from '../constants';
import type { LinkId, NodeId, Position, WorkflowGraph } from './types';
import { filterConnectedNodes } from './graph-builder';

export interface ReindexPlan {
  /** Old node id → new id (1-based). */
  nodeIds: Map<NodeId, number>;
  /** Old link id → new id (1-based). */
  linkIds: Map<LinkId, number>;
}

/** Numeric ids compare by value; anything else by string. */
export function compareIds(a: NodeId, b: NodeId): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/**
 * Plan node and link renumbering.
 *
 * Nodes are ordered by X; nodes less than the column tolerance apart
 * compare by Y.  `positions` (typically an organize result) takes
 * precedence over the graph's own node positions and limits the plan to
 * the nodes it contains.
 */
export function planReindex(
  graph: WorkflowGraph,
  positions?: ReadonlyMap<NodeId, Position>,
  tolerance: number = REINDEX_COLUMN_TOLERANCE
): ReindexPlan {
  const known = new Set(graph.nodes.map((n) => n.id));
  const entries: Array<{ id: NodeId; x: number; y: number }> = positions
    ? [...positions]
        .filter(([id]) => known.has(id))
        .map(([id, [x, y]]) => ({ id, x, y }))
    : filterConnectedNodes(graph.nodes, graph.links).map((n) => ({ id: n.id, x: n.x, y: n.y }));

  entries.sort((a, b) => (Math.abs(a.x - b.x) < tolerance ? a.y - b.y : a.x - b.x));

  const nodeIds = new Map<NodeId, number>();
  entries.forEach((e, i) => nodeIds.set(e.id, i + 1));

  const renumbered = (id: NodeId): NodeId => nodeIds.get(id) ?? id;
  const links = [...graph.links].sort(
    (a, b) =>
      compareIds(renumbered(a.originId), renumbered(b.originId)) ||
      a.originSlot - b.originSlot ||
      compareIds(renumbered(a.targetId), renumbered(b.targetId)) ||
      a.targetSlot - b.targetSlot
  );

  const linkIds = new Map<LinkId, number>();
  links.forEach((l, i) => linkIds.set(l.id, i + 1));

  return { nodeIds, linkIds };
}
