/**
 * Vertical ordering inside finalized columns.
 *
 * Columns are swept left to right.  A node's sort key is the list of
 * estimated Y positions of the ports it connects to on nodes that have
 * already been stacked, so each column follows the column before it.
 * Column 0 has nothing to follow on the first sweep and is re-sorted
 * afterwards by the input ports it feeds.
 */

import type { LayoutLogger } from './layout-logger';
import type { ColumnLayout, ColumnState, LayoutConfig, NodeGraph, NodeId, Position } from './types';
import { portY } from './config';

type SortConfig = Pick<LayoutConfig, 'startY' | 'nodeSpacing' | 'portOffset' | 'portSpacing'>;

/**
 * Compare two ascending port-Y lists element-wise, padding the shorter
 * one with `Infinity`.  A node with more known ports sorts before one whose
 * list ran out at the first difference.
 */
export function compareSortKeys(a: number[], b: number[]): number {
  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? Infinity;
    const bv = b[i] ?? Infinity;
    if (av !== bv) return av < bv ? -1 : 1;
  }
  return 0;
}

/** Ports on placed neighbours that a node connects to, ascending. */
export function connectedPortYs(
  graph: NodeGraph,
  id: NodeId,
  placed: ReadonlyMap<NodeId, Position>,
  config: SortConfig
): number[] {
  const ys: number[] = [];
  for (const link of graph.links) {
    if (link.targetId === id) {
      const origin = placed.get(link.originId);
      if (origin) ys.push(portY(origin[1], link.originSlot, config));
    }
  }
  for (const link of graph.links) {
    if (link.originId === id) {
      const target = placed.get(link.targetId);
      if (target) ys.push(portY(target[1], link.targetSlot, config));
    }
  }
  return ys.sort((a, b) => a - b);
}

/** Input ports on placed children that a node feeds, ascending. */
export function childInputPortYs(
  graph: NodeGraph,
  id: NodeId,
  placed: ReadonlyMap<NodeId, Position>,
  config: SortConfig
): number[] {
  const ys: number[] = [];
  for (const link of graph.links) {
    if (link.originId !== id) continue;
    const target = placed.get(link.targetId);
    if (target) ys.push(portY(target[1], link.targetSlot, config));
  }
  return ys.sort((a, b) => a - b);
}

function stackColumn(
  graph: NodeGraph,
  column: ColumnState,
  order: NodeId[],
  positions: Map<NodeId, Position>,
  config: SortConfig
): void {
  let y = config.startY;
  for (const id of order) {
    positions.set(id, [column.x, y]);
    y += (graph.nodeMap.get(id)?.height ?? 0) + config.nodeSpacing;
  }
}

function sortBy(ids: NodeId[], key: (id: NodeId) => number[]): NodeId[] {
  const keys = new Map(ids.map((id) => [id, key(id)] as const));
  return [...ids].sort((a, b) => compareSortKeys(keys.get(a) ?? [], keys.get(b) ?? []));
}

/**
 * Stack every column's members top to bottom and return final positions.
 * Ties keep the column's member order.
 */
export function sortColumnsVertically(
  graph: NodeGraph,
  layout: ColumnLayout,
  config: SortConfig,
  logger?: LayoutLogger
): Map<NodeId, Position> {
  const positions = new Map<NodeId, Position>();

  for (const column of layout.columns) {
    const order = sortBy(column.members, (id) => connectedPortYs(graph, id, positions, config));
    stackColumn(graph, column, order, positions, config);
    logger?.trace(`column ${column.index} (x=${column.x}): ${order.join(', ')}`);
  }

  const first = layout.columns[0];
  if (first && layout.columns.length > 1) {
    const order = sortBy(first.members, (id) => childInputPortYs(graph, id, positions, config));
    stackColumn(graph, first, order, positions, config);
    logger?.trace(`column 0 re-sorted by child ports: ${order.join(', ')}`);
  }

  return positions;
}
