/**
 * Column assignment for one connected component.
 *
 * Pipeline:
 * A. Anchor the longest chain(s): chain position = column index.
 * B. Give every column an X from the cumulative column widths.
 * C. Place the remaining nodes next to their positioned neighbours.
 * D. Iteratively move targets of leftward links to the right.
 * E. Drop empty columns and space the survivors uniformly.
 */

import type { LayoutLogger } from './layout-logger';
import type {
  Chain,
  ColumnLayout,
  ColumnState,
  LayoutConfig,
  NodeGraph,
  NodeId,
  WorkflowLink,
} from './types';
import { longestChains } from './chains';

type SpacingConfig = Pick<LayoutConfig, 'startX' | 'columnSpacing'>;

interface WorkingColumn {
  x: number;
  width: number;
}

/** Mutable state shared by phases A–D. */
export interface ColumnWorkspace {
  columns: Map<number, WorkingColumn>;
  nodeColumns: Map<NodeId, number>;
}

export function createWorkspace(): ColumnWorkspace {
  return { columns: new Map(), nodeColumns: new Map() };
}

function nodeWidth(graph: NodeGraph, id: NodeId): number {
  return graph.nodeMap.get(id)?.width ?? 0;
}

function sortedIndices(ws: ColumnWorkspace): number[] {
  return [...ws.columns.keys()].sort((a, b) => a - b);
}

function lastColumnIndex(ws: ColumnWorkspace): number | undefined {
  const indices = sortedIndices(ws);
  return indices.length > 0 ? indices[indices.length - 1] : undefined;
}

function widenColumn(ws: ColumnWorkspace, index: number, width: number): void {
  const column = ws.columns.get(index);
  if (column) {
    column.width = Math.max(column.width, width);
  } else {
    ws.columns.set(index, { x: 0, width });
  }
}

// ── Phase A ────────────────────────────────────────────────────────────────

/**
 * Assign every node of the longest chain(s) its position in the chain as
 * column index.  The first chain to reach a node wins.
 */
export function anchorLongestChains(
  graph: NodeGraph,
  chains: Chain[],
  ws: ColumnWorkspace,
  logger?: LayoutLogger
): void {
  const longest = longestChains(chains);
  for (const chain of longest) {
    chain.forEach((id, index) => {
      if (ws.nodeColumns.has(id)) return;
      ws.nodeColumns.set(id, index);
      widenColumn(ws, index, nodeWidth(graph, id));
    });
  }
  logger?.note(
    'columns',
    `${longest.length} longest chain(s) of ${longest[0]?.length ?? 0} nodes anchor ${ws.nodeColumns.size} nodes`
  );
}

// ── Phase B ────────────────────────────────────────────────────────────────

/** Lay columns out left to right in index order from `startX`. */
export function placeColumns(ws: ColumnWorkspace, config: SpacingConfig): void {
  let x = config.startX;
  for (const index of sortedIndices(ws)) {
    const column = ws.columns.get(index);
    if (!column) continue;
    column.x = x;
    x += column.width + config.columnSpacing;
  }
}

// ── Phase C ────────────────────────────────────────────────────────────────

/**
 * Ensure `index` exists.  A new column continues the cumulative-width
 * chain after the current last column; an existing one widens if needed.
 */
function ensureColumn(
  ws: ColumnWorkspace,
  index: number,
  width: number,
  config: SpacingConfig
): void {
  if (ws.columns.has(index)) {
    widenColumn(ws, index, width);
    return;
  }
  const lastIndex = lastColumnIndex(ws);
  const last = lastIndex === undefined ? undefined : ws.columns.get(lastIndex);
  const x = last ? last.x + last.width + config.columnSpacing : config.startX;
  ws.columns.set(index, { x, width });
}

/**
 * Pick a column for every node the longest chains did not reach, in
 * node-map order.
 *
 * - positioned parents → right of the rightmost parent
 * - positioned children and no parents at all → left of the leftmost child
 *   (clamped to column 0)
 * - otherwise → a new column at the end
 *
 * A node whose parents exist but are not placed yet is never placed by
 * child adjacency alone.
 */
export function placeRemainingNodes(
  graph: NodeGraph,
  ws: ColumnWorkspace,
  config: SpacingConfig,
  logger?: LayoutLogger
): number {
  let placed = 0;

  for (const node of graph.nodeMap.values()) {
    if (ws.nodeColumns.has(node.id)) continue;

    const parents = graph.parents.get(node.id) ?? [];
    const parentCols = columnsOf(ws, parents);
    const childCols = columnsOf(ws, graph.children.get(node.id) ?? []);

    let target: number;
    let reason: string;
    if (parentCols.length > 0) {
      target = Math.max(...parentCols) + 1;
      reason = `parents in columns [${parentCols.join(', ')}]`;
    } else if (childCols.length > 0 && parents.length === 0) {
      target = Math.max(0, Math.min(...childCols) - 1);
      reason = `children in columns [${childCols.join(', ')}]`;
    } else {
      const lastIndex = lastColumnIndex(ws);
      target = lastIndex === undefined ? 0 : lastIndex + 1;
      reason = 'no positioned neighbours';
    }

    ensureColumn(ws, target, node.width, config);
    ws.nodeColumns.set(node.id, target);
    placed++;
    logger?.trace(`${node.type}(${node.id}): ${reason} -> column ${target}`);
  }

  return placed;
}

function columnsOf(ws: ColumnWorkspace, ids: NodeId[]): number[] {
  const cols: number[] = [];
  for (const id of ids) {
    const col = ws.nodeColumns.get(id);
    if (col !== undefined) cols.push(col);
  }
  return cols;
}

// ── Phase D ────────────────────────────────────────────────────────────────

/** Reset every column's width to its widest current member (0 when empty). */
export function recomputeWidths(graph: NodeGraph, ws: ColumnWorkspace): void {
  for (const column of ws.columns.values()) column.width = 0;
  for (const [id, index] of ws.nodeColumns) {
    widenColumn(ws, index, nodeWidth(graph, id));
  }
}

/** Links whose target column starts before the origin column's right edge. */
export function findLeftwardLinks(graph: NodeGraph, ws: ColumnWorkspace): WorkflowLink[] {
  return graph.links.filter((link) => {
    const originIndex = ws.nodeColumns.get(link.originId);
    const targetIndex = ws.nodeColumns.get(link.targetId);
    if (originIndex === undefined || targetIndex === undefined) return false;
    const origin = ws.columns.get(originIndex);
    const target = ws.columns.get(targetIndex);
    if (!origin || !target) return false;
    return target.x < origin.x + origin.width;
  });
}

/**
 * Open a column at `index`.  When the index is taken, that column and
 * every column after it shift one index to the right, members included.
 */
function insertColumn(ws: ColumnWorkspace, index: number, column: WorkingColumn): void {
  if (ws.columns.has(index)) {
    const shifted = new Map<number, WorkingColumn>();
    for (const [i, col] of ws.columns) shifted.set(i >= index ? i + 1 : i, col);
    ws.columns = shifted;
    for (const [id, i] of ws.nodeColumns) {
      if (i >= index) ws.nodeColumns.set(id, i + 1);
    }
  }
  ws.columns.set(index, column);
}

/**
 * Move one leftward-link target to the first column that suits it: an
 * existing column at or after the column following its rightmost parent and
 * before its leftmost child.  Without one, a column is inserted at that
 * minimum index (not appended after it), shifting later columns right.
 */
function relocateTarget(
  graph: NodeGraph,
  ws: ColumnWorkspace,
  targetId: NodeId,
  config: SpacingConfig,
  logger?: LayoutLogger
): void {
  const parents = graph.parents.get(targetId) ?? [];
  const parentCols = columnsOf(ws, parents);
  if (parentCols.length === 0) return;

  const minCol = Math.max(...parentCols) + 1;
  const childCols = columnsOf(ws, graph.children.get(targetId) ?? []);
  const limit = childCols.length > 0 ? Math.min(...childCols) : Infinity;

  let chosen = sortedIndices(ws).find((i) => i >= minCol && i < limit);
  if (chosen === undefined) {
    let rightEdge = config.startX;
    for (const parent of parents) {
      const col = ws.columns.get(ws.nodeColumns.get(parent) ?? -1);
      if (col) rightEdge = Math.max(rightEdge, col.x + col.width);
    }
    insertColumn(ws, minCol, {
      x: rightEdge + config.columnSpacing,
      width: nodeWidth(graph, targetId),
    });
    chosen = minCol;
  }

  const node = graph.nodeMap.get(targetId);
  logger?.trace(
    `${node?.type ?? '?'}(${targetId}): column ${ws.nodeColumns.get(targetId)} -> ${chosen}`
  );
  ws.nodeColumns.set(targetId, chosen);
}

/**
 * Repeatedly move targets of leftward links right until none remain or
 * `maxIterations` correction passes have run.
 */
export function fixLeftwardLinks(
  graph: NodeGraph,
  ws: ColumnWorkspace,
  config: SpacingConfig & Pick<LayoutConfig, 'maxLeftwardIterations'>,
  logger?: LayoutLogger
): { converged: boolean; iterations: number } {
  let iterations = 0;

  for (;;) {
    recomputeWidths(graph, ws);
    placeColumns(ws, config);

    const leftward = findLeftwardLinks(graph, ws);
    if (leftward.length === 0) {
      logger?.note('columns', `no leftward links after ${iterations} correction pass(es)`);
      return { converged: true, iterations };
    }
    if (iterations >= config.maxLeftwardIterations) {
      logger?.note(
        'columns',
        `${leftward.length} leftward link(s) remain after ${iterations} passes; keeping best effort`
      );
      return { converged: false, iterations };
    }

    iterations++;
    const targets = [...new Set(leftward.map((l) => l.targetId))];
    logger?.trace(`pass ${iterations}: ${leftward.length} leftward link(s), ${targets.length} target(s)`);
    for (const targetId of targets) {
      relocateTarget(graph, ws, targetId, config, logger);
    }
  }
}

// ── Phase E ────────────────────────────────────────────────────────────────

/**
 * Remove empty columns, renumber the rest densely and space them
 * uniformly from `startX`.  Members keep node-map order.
 */
export function compactColumns(
  graph: NodeGraph,
  ws: ColumnWorkspace,
  config: SpacingConfig
): { columns: ColumnState[]; nodeColumns: Map<NodeId, number> } {
  const members = new Map<number, NodeId[]>();
  for (const id of graph.nodeMap.keys()) {
    const index = ws.nodeColumns.get(id);
    if (index === undefined) continue;
    const list = members.get(index);
    if (list) list.push(id);
    else members.set(index, [id]);
  }

  const columns: ColumnState[] = [];
  const nodeColumns = new Map<NodeId, number>();
  let x = config.startX;

  [...members.keys()]
    .sort((a, b) => a - b)
    .forEach((oldIndex, index) => {
      const ids = members.get(oldIndex) ?? [];
      const width = ids.reduce<number>((w, id) => Math.max(w, nodeWidth(graph, id)), 0);
      columns.push({ index, x, width, members: ids });
      for (const id of ids) nodeColumns.set(id, index);
      x += width + config.columnSpacing;
    });

  return { columns, nodeColumns };
}

// ── Pipeline ───────────────────────────────────────────────────────────────

/** Run phases A–E for one component. */
export function assignColumns(
  graph: NodeGraph,
  chains: Chain[],
  config: LayoutConfig,
  logger?: LayoutLogger
): ColumnLayout {
  const ws = createWorkspace();

  anchorLongestChains(graph, chains, ws, logger);
  placeColumns(ws, config);

  const placed = placeRemainingNodes(graph, ws, config, logger);
  if (placed > 0) logger?.note('columns', `${placed} node(s) placed by neighbour columns`);

  const { converged, iterations } = fixLeftwardLinks(graph, ws, config, logger);
  const { columns, nodeColumns } = compactColumns(graph, ws, config);

  return { nodeColumns, columns, converged, iterations };
}
