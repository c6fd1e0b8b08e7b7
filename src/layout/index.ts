/**
 * Column layout engine for node-graph workflows.
 *
 * Pipeline per request:
 * 1. Drop nodes without links → filterConnectedNodes()
 * 2. Split disjoint workflows → findConnectedComponents()
 * 3. Per component:
 *    3.1 Adjacency → buildNodeGraph()
 *    3.2 Root-to-leaf paths → findAllChains()
 *    3.3 Columns (anchor, fallback placement, leftward fix-up, compaction) → assignColumns()
 *    3.4 Vertical order inside columns → sortColumnsVertically()
 * 4. Stack components by ascending height.
 *
 * The engine is pure: it never mutates the input graph and returns plain
 * maps keyed by node id.  Diagnostics go to the injected LayoutLogger.
 */

import type {
  LayoutConfig,
  NodeId,
  OrganizeOptions,
  OrganizeResult,
  Position,
  Size,
  WorkflowGraph,
  WorkflowLink,
  WorkflowNode,
} from './types';
import { buildNodeGraph, filterConnectedNodes, linksWithin } from './graph-builder';
import { findConnectedComponents } from './components';
import { findAllChains } from './chains';
import { assignColumns } from './column-assignment';
import { sortColumnsVertically } from './vertical-sort';
import { DEFAULT_LAYOUT_CONFIG, resolveConfig } from './config';
import { silentLogger, type LayoutLogger } from './layout-logger';

export interface ComponentLayout {
  positions: Map<NodeId, Position>;
  sizes: Map<NodeId, Size>;
  converged: boolean;
}

/** Lay out one connected component from (startX, startY). */
export function layoutComponent(
  nodes: WorkflowNode[],
  links: WorkflowLink[],
  config: LayoutConfig,
  logger: LayoutLogger
): ComponentLayout {
  const graph = logger.step('buildNodeGraph', () => buildNodeGraph(nodes, links));
  const chains = logger.step('findAllChains', () =>
    findAllChains(graph, { maxChains: config.maxChains })
  );
  if (chains.length === 0) {
    logger.note('chains', 'no root-to-leaf chains (cyclic component); placing by neighbour columns');
  } else {
    logger.note('chains', `${chains.length} chain(s) from start to end`);
  }

  const layout = logger.step('assignColumns', () => assignColumns(graph, chains, config, logger));
  const positions = logger.step('sortColumnsVertically', () =>
    sortColumnsVertically(graph, layout, config, logger)
  );

  const sizes = new Map<NodeId, Size>();
  for (const column of layout.columns) {
    for (const id of column.members) {
      sizes.set(id, [column.width, graph.nodeMap.get(id)?.height ?? 0]);
    }
  }

  return { positions, sizes, converged: layout.converged };
}

/** Vertical extent of a laid-out component. */
export function componentBounds(
  positions: ReadonlyMap<NodeId, Position>,
  sizes: ReadonlyMap<NodeId, Size>
): { minY: number; height: number } {
  let minY = Infinity;
  let maxY = -Infinity;
  for (const [id, [, y]] of positions) {
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y + (sizes.get(id)?.[1] ?? 0));
  }
  if (minY === Infinity) return { minY: 0, height: 0 };
  return { minY, height: maxY - minY };
}

/**
 * Organize a workflow graph into columns.
 *
 * Only nodes with at least one link are positioned; everything else is
 * absent from the result and must be left untouched by the caller.
 */
export function organizeWorkflow(graph: WorkflowGraph, options: OrganizeOptions = {}): OrganizeResult {
  const config = resolveConfig(DEFAULT_LAYOUT_CONFIG, options.config);
  const logger = options.logger ?? silentLogger('organize');

  logger.note('organize', `received ${graph.nodes.length} nodes and ${graph.links.length} links`);
  const nodes = filterConnectedNodes(graph.nodes, graph.links);
  const excluded = graph.nodes.length - nodes.length;
  if (excluded > 0) logger.note('organize', `${excluded} unconnected element(s) excluded`);

  if (nodes.length === 0) {
    logger.finish();
    return {
      status: 'success',
      message: 'No workflow nodes to organize',
      positions: new Map(),
      sizes: new Map(),
      componentCount: 0,
      converged: true,
    };
  }

  const components = logger.step('findConnectedComponents', () =>
    findConnectedComponents(nodes, graph.links)
  );

  if (components.length === 1) {
    const { positions, sizes, converged } = layoutComponent(nodes, graph.links, config, logger);
    logger.finish();
    return {
      status: 'success',
      message: `Complete - positioned ${positions.size} nodes`,
      positions,
      sizes,
      componentCount: 1,
      converged,
    };
  }

  const laidOut = components.map((ids, i) => {
    const idSet = new Set(ids);
    logger.note('organize', `component ${i + 1}/${components.length} with ${ids.length} nodes`);
    const layout = layoutComponent(
      nodes.filter((n) => idSet.has(n.id)),
      linksWithin(graph.links, idSet),
      config,
      logger
    );
    return { ...layout, ...componentBounds(layout.positions, layout.sizes) };
  });

  // Array.prototype.sort is stable: equal heights keep discovery order.
  laidOut.sort((a, b) => a.height - b.height);

  const positions = new Map<NodeId, Position>();
  const sizes = new Map<NodeId, Size>();
  let offset = 0;
  for (const component of laidOut) {
    for (const [id, [x, y]] of component.positions) {
      positions.set(id, [x, y - component.minY + offset]);
    }
    for (const [id, size] of component.sizes) sizes.set(id, size);
    offset += component.height + config.componentSpacing;
  }

  logger.note('organize', `stacked ${laidOut.length} components (shortest first)`);
  logger.finish();

  return {
    status: 'success',
    message: `Complete - positioned ${positions.size} nodes in ${laidOut.length} components`,
    positions,
    sizes,
    componentCount: laidOut.length,
    converged: laidOut.every((c) => c.converged),
  };
}

export { detectLinkOverlaps } from './overlap-detection';
export { planReindex } from './reindex';
export { ChainLimitError } from './chains';
export { createLayoutLogger, LayoutLogger } from './layout-logger';
export type * from './types';
