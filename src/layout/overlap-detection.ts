/**
 * Detection of links drawn behind other nodes, and reroute planning.
 *
 * A link is approximated as a straight segment from its origin's output
 * port (right edge) to its target's input port (left edge).  Every other
 * node inside the segment's horizontal span is tested for intersection.
 *
 * Overlapping links are then routed above or below the nodes they span.
 * Reroutes in the same direction share a "lane" (a distance from the
 * obstructing nodes) as long as the columns they pass over do not collide;
 * otherwise a new, farther lane is opened.  Links are planned shortest
 * first so local detours claim the near lanes.
 */

import { distance, segmentIntersectsRect, type Point } from '../geometry';
import type { LayoutLogger } from './layout-logger';
import type {
  NodeId,
  OverlapConfig,
  OverlapOptions,
  OverlapRecord,
  OverlapResult,
  OverlappingNode,
  RerouteDirection,
  WorkflowGraph,
  WorkflowLink,
  WorkflowNode,
} from './types';
import { filterConnectedNodes } from './graph-builder';
import { DEFAULT_OVERLAP_CONFIG, portY, resolveConfig } from './config';
import { silentLogger } from './layout-logger';

/** Straight-line approximation of a link. */
export interface LinkSegment {
  link: WorkflowLink;
  origin: WorkflowNode;
  target: WorkflowNode;
  start: Point;
  end: Point;
}

/** A reroute lane: an offset plus the columns already routed through it. */
interface Lane {
  offset: number;
  claimed: Set<number>;
}

/** Lanes for one direction; offsets grow by `laneStep` from `laneStart`. */
export class LaneAllocator {
  private readonly lanes: Lane[] = [];

  constructor(
    private readonly laneStart: number,
    private readonly laneStep: number
  ) {}

  /** Offset of the first lane free over `columns`, or of the lane that would be opened. */
  peek(columns: ReadonlySet<number>): number {
    const lane = this.findFree(columns);
    return lane ? lane.offset : this.laneStart + this.lanes.length * this.laneStep;
  }

  /** Reserve `columns` on the first free lane (opening one if needed). */
  claim(columns: ReadonlySet<number>): number {
    let lane = this.findFree(columns);
    if (!lane) {
      lane = { offset: this.laneStart + this.lanes.length * this.laneStep, claimed: new Set() };
      this.lanes.push(lane);
    }
    for (const c of columns) lane.claimed.add(c);
    return lane.offset;
  }

  get size(): number {
    return this.lanes.length;
  }

  private findFree(columns: ReadonlySet<number>): Lane | undefined {
    return this.lanes.find((lane) => ![...columns].some((c) => lane.claimed.has(c)));
  }
}

/** Port-to-port segment of a link, or undefined when an endpoint is unknown. */
export function linkSegment(
  link: WorkflowLink,
  nodeMap: ReadonlyMap<NodeId, WorkflowNode>,
  config: Pick<OverlapConfig, 'portOffset' | 'portSpacing'>
): LinkSegment | undefined {
  const origin = nodeMap.get(link.originId);
  const target = nodeMap.get(link.targetId);
  if (!origin || !target) return undefined;
  return {
    link,
    origin,
    target,
    start: { x: origin.x + origin.width, y: portY(origin.y, link.originSlot, config) },
    end: { x: target.x, y: portY(target.y, link.targetSlot, config) },
  };
}

/** Nodes other than the link's endpoints that reach into its horizontal span. */
export function spannedNodes(segment: LinkSegment, nodes: WorkflowNode[]): WorkflowNode[] {
  const minX = Math.min(segment.start.x, segment.end.x);
  const maxX = Math.max(segment.start.x, segment.end.x);
  return nodes.filter(
    (n) =>
      n.id !== segment.origin.id &&
      n.id !== segment.target.id &&
      !(n.x + n.width < minX || n.x > maxX)
  );
}

/** Spanned nodes the straight segment actually passes through. */
export function findOverlappingNodes(segment: LinkSegment, nodes: WorkflowNode[]): WorkflowNode[] {
  return spannedNodes(segment, nodes).filter((n) =>
    segmentIntersectsRect(segment.start, segment.end, n)
  );
}

function toOverlappingNode(node: WorkflowNode): OverlappingNode {
  return { id: node.id, type: node.type, position: [node.x, node.y] };
}

/** Vertical travel from both endpoints to a horizontal reroute at `y`. */
function travel(segment: LinkSegment, y: number): number {
  return Math.abs(segment.start.y - y) + Math.abs(segment.end.y - y);
}

function planReroute(
  segment: LinkSegment,
  overlapping: WorkflowNode[],
  nodes: WorkflowNode[],
  up: LaneAllocator,
  down: LaneAllocator,
  config: OverlapConfig
): OverlapRecord {
  const spanned = spannedNodes(segment, nodes);
  let highest = spanned[0];
  let lowest = spanned[0];
  for (const n of spanned) {
    if (n.y < highest.y) highest = n;
    if (n.y + n.height > lowest.y + lowest.height) lowest = n;
  }
  const top = highest.y;
  const bottom = lowest.y + lowest.height;
  const columns = new Set(spanned.map((n) => n.x));

  const upY = top - up.peek(columns);
  const downY = bottom + down.peek(columns);
  const upDistance = travel(segment, upY);
  const downDistance = travel(segment, downY);

  const direction: RerouteDirection = upDistance < downDistance ? 'up' : 'down';
  const offset = direction === 'up' ? up.claim(columns) : down.claim(columns);
  const rerouteY = direction === 'up' ? top - offset : bottom + offset;

  return {
    linkId: segment.link.id,
    originId: segment.origin.id,
    originType: segment.origin.type,
    targetId: segment.target.id,
    targetType: segment.target.type,
    overlappingNodes: overlapping.map(toOverlappingNode),
    direction,
    offset,
    rerouteY,
    waypoints: [
      [segment.start.x + config.rerouteInset, rerouteY],
      [segment.end.x - config.rerouteInset, rerouteY],
    ],
    upDistance,
    downDistance,
    highestNode: { id: highest.id, type: highest.type, top },
    lowestNode: { id: lowest.id, type: lowest.type, bottom },
  };
}

function traceRecord(logger: LayoutLogger, record: OverlapRecord): void {
  logger.trace(
    `link ${record.linkId}: ${record.originType}(${record.originId}) -> ` +
      `${record.targetType}(${record.targetId}) overlaps ${record.overlappingNodes.length} node(s)`
  );
  logger.trace(
    `  up=${record.upDistance} down=${record.downDistance} -> ${record.direction.toUpperCase()} ` +
      `at y=${record.rerouteY} (lane ${record.offset})`
  );
}

/**
 * Find every link whose straight line passes behind another node and plan
 * a two-waypoint reroute for it.
 */
export function detectLinkOverlaps(graph: WorkflowGraph, options: OverlapOptions = {}): OverlapResult {
  const config = resolveConfig(DEFAULT_OVERLAP_CONFIG, options.config);
  const logger = options.logger ?? silentLogger('reroute');

  const nodes = filterConnectedNodes(graph.nodes, graph.links);
  logger.note('reroute', `analyzing ${graph.links.length} links against ${nodes.length} nodes`);

  if (graph.links.length === 0 || nodes.length === 0) {
    logger.finish();
    return { status: 'success', message: 'No links to analyze', overlaps: [] };
  }

  const nodeMap = new Map(nodes.map((n) => [n.id, n] as const));

  const candidates = logger.step('findOverlappingNodes', () => {
    const found: Array<{ segment: LinkSegment; overlapping: WorkflowNode[] }> = [];
    for (const link of graph.links) {
      const segment = linkSegment(link, nodeMap, config);
      if (!segment) continue;
      const overlapping = findOverlappingNodes(segment, nodes);
      if (overlapping.length > 0) found.push({ segment, overlapping });
    }
    return found;
  });

  const overlaps = logger.step('planReroutes', () => {
    const up = new LaneAllocator(config.laneStart, config.laneStep);
    const down = new LaneAllocator(config.laneStart, config.laneStep);
    const ordered = [...candidates].sort(
      (a, b) =>
        distance(a.segment.start, a.segment.end) - distance(b.segment.start, b.segment.end)
    );
    const records = ordered.map(({ segment, overlapping }) =>
      planReroute(segment, overlapping, nodes, up, down, config)
    );
    logger.note('reroute', `${up.size} lane(s) above, ${down.size} lane(s) below`);
    return records;
  });

  for (const record of overlaps) traceRecord(logger, record);
  logger.finish();

  return {
    status: 'success',
    message: `Found ${overlaps.length} overlapping links`,
    overlaps,
  };
}
