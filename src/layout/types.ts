/**
 * Shared types for the column layout engine.
 */

import type { LayoutLogger } from './layout-logger';

/** Node and link identifiers as editors send them (LiteGraph uses integers). */
export type NodeId = number | string;
export type LinkId = number | string;

/** A graph node as received from the editor. */
export interface WorkflowNode {
  id: NodeId;
  /** Display/category label; opaque to the algorithms. */
  type: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A directed, slot-addressed connection origin → target. */
export interface WorkflowLink {
  id: LinkId;
  originId: NodeId;
  originSlot: number;
  targetId: NodeId;
  targetSlot: number;
}

/** A full graph snapshot for one request. */
export interface WorkflowGraph {
  nodes: WorkflowNode[];
  links: WorkflowLink[];
}

/** Adjacency built from a node/link list. Every map is pre-seeded per node. */
export interface NodeGraph {
  nodeMap: Map<NodeId, WorkflowNode>;
  children: Map<NodeId, NodeId[]>;
  parents: Map<NodeId, NodeId[]>;
  /** Links whose endpoints are both present in `nodeMap`. */
  links: WorkflowLink[];
}

/** An ordered root → leaf path of node ids. */
export type Chain = NodeId[];

export type Position = [x: number, y: number];
export type Size = [width: number, height: number];

/** A vertical band of the layout. */
export interface ColumnState {
  index: number;
  x: number;
  width: number;
  members: NodeId[];
}

/** Output of the column assigner. */
export interface ColumnLayout {
  /** Dense, compacted column index per node. */
  nodeColumns: Map<NodeId, number>;
  /** Final columns in ascending index order. */
  columns: ColumnState[];
  /** False when the leftward-link correction hit its iteration cap. */
  converged: boolean;
  /** Number of correction passes that ran. */
  iterations: number;
}

/** Tunables for the organize pipeline. */
export interface LayoutConfig {
  startX: number;
  startY: number;
  columnSpacing: number;
  nodeSpacing: number;
  componentSpacing: number;
  portOffset: number;
  portSpacing: number;
  maxLeftwardIterations: number;
  maxChains: number;
}

export interface OrganizeOptions {
  config?: Partial<LayoutConfig>;
  logger?: LayoutLogger;
}

export interface OrganizeResult {
  status: 'success';
  message: string;
  positions: Map<NodeId, Position>;
  sizes: Map<NodeId, Size>;
  componentCount: number;
  /** False when at least one component kept leftward links after the iteration cap. */
  converged: boolean;
}

/** Tunables for overlap detection. */
export interface OverlapConfig {
  portOffset: number;
  portSpacing: number;
  rerouteInset: number;
  laneStart: number;
  laneStep: number;
}

export interface OverlapOptions {
  config?: Partial<OverlapConfig>;
  logger?: LayoutLogger;
}

export type RerouteDirection = 'up' | 'down';

export interface OverlappingNode {
  id: NodeId;
  type: string;
  position: Position;
}

/** A reroute directive for one link that passes behind other nodes. */
export interface OverlapRecord {
  linkId: LinkId;
  originId: NodeId;
  originType: string;
  targetId: NodeId;
  targetType: string;
  overlappingNodes: OverlappingNode[];
  direction: RerouteDirection;
  /** Lane distance from the obstructing nodes in the chosen direction. */
  offset: number;
  rerouteY: number;
  waypoints: [Position, Position];
  upDistance: number;
  downDistance: number;
  highestNode: { id: NodeId; type: string; top: number };
  lowestNode: { id: NodeId; type: string; bottom: number };
}

export interface OverlapResult {
  status: 'success';
  message: string;
  overlaps: OverlapRecord[];
}
