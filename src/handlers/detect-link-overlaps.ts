/**
 * Handler for detect_link_overlaps tool.
 *
 * Reports every link whose straight line passes behind another node and
 * the two reroute waypoints that take it around, above or below.
 */

import { type ToolContext, type ToolDefinition, type ToolResult } from '../types';
import { detectLinkOverlaps } from '../layout';
import type { OverlapConfig, OverlapRecord } from '../layout/types';
import { DEBUG_LEVEL_SCHEMA, GRAPH_SCHEMA, createToolLogger, jsonResult } from './helpers';
import { optionalNumber, parseGraph, validateArgs } from './validation';

const CONFIG_KEYS = [
  'rerouteInset',
  'laneStart',
  'laneStep',
] as const satisfies ReadonlyArray<keyof OverlapConfig>;

export function readOverlapOverrides(args: Record<string, unknown>): Partial<OverlapConfig> {
  const overrides: Partial<OverlapConfig> = {};
  for (const key of CONFIG_KEYS) {
    const value = optionalNumber(args, key, { min: 0 });
    if (value !== undefined) overrides[key] = value;
  }
  return overrides;
}

/** Wire shape of one overlap: the flat snake_case record editors consume. */
export function serializeOverlap(record: OverlapRecord): Record<string, unknown> {
  const [reroute1, reroute2] = record.waypoints;
  return {
    link_id: record.linkId,
    origin_id: record.originId,
    origin_type: record.originType,
    target_id: record.targetId,
    target_type: record.targetType,
    overlapping_nodes: record.overlappingNodes.map((n) => ({
      node_id: n.id,
      node_type: n.type,
      node_pos: n.position,
    })),
    reroute_direction: record.direction,
    reroute_offset: record.offset,
    reroute1_pos: reroute1,
    reroute2_pos: reroute2,
    reroute_y: record.rerouteY,
    up_distance: record.upDistance,
    down_distance: record.downDistance,
    highest_node_id: record.highestNode.id,
    highest_node_type: record.highestNode.type,
    highest_node_top: record.highestNode.top,
    lowest_node_id: record.lowestNode.id,
    lowest_node_type: record.lowestNode.type,
    lowest_node_bottom: record.lowestNode.bottom,
  };
}

export async function handleDetectLinkOverlaps(
  args: Record<string, unknown>,
  context?: ToolContext
): Promise<ToolResult> {
  validateArgs(args, ['graph']);
  const graph = parseGraph(args['graph']);
  const logger = createToolLogger('reroute', args, context);

  const result = detectLinkOverlaps(graph, { config: readOverlapOverrides(args), logger });
  return jsonResult({
    status: result.status,
    message: result.message,
    overlaps: result.overlaps.map(serializeOverlap),
  });
}

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'detect_link_overlaps',
  description:
    'Find links whose straight line passes behind other nodes and plan a reroute for each. Every overlap gets a direction (up when the detour above is strictly shorter, otherwise down), a reroute Y one lane away from the obstructing nodes, and two waypoints (reroute1_pos near the origin, reroute2_pos near the target). Links that cross the same columns get separate lanes. Shorter links are routed first.',
  inputSchema: {
    type: 'object',
    properties: {
      graph: GRAPH_SCHEMA,
      rerouteInset: {
        type: 'number',
        description: 'Horizontal distance of each waypoint from its port (default: 50).',
      },
      laneStart: {
        type: 'number',
        description: 'Distance of the first lane from the obstructing nodes (default: 50).',
      },
      laneStep: {
        type: 'number',
        description: 'Distance between consecutive lanes (default: 20).',
      },
      debugLevel: DEBUG_LEVEL_SCHEMA,
    },
    required: ['graph'],
  },
};
