/**
 * Handler for plan_reindex tool.
 */

import { type ToolContext, type ToolDefinition, type ToolResult } from '../types';
import { planReindex } from '../layout';
import { GRAPH_SCHEMA, jsonResult, toRecord } from './helpers';
import { optionalNumber, parseGraph, parsePositions, validateArgs } from './validation';

export async function handlePlanReindex(
  args: Record<string, unknown>,
  _context?: ToolContext
): Promise<ToolResult> {
  validateArgs(args, ['graph']);
  const graph = parseGraph(args['graph']);
  const positions =
    args['positions'] === undefined ? undefined : parsePositions(args['positions'], graph);
  const tolerance = optionalNumber(args, 'columnTolerance', { min: 0 });

  const plan = planReindex(graph, positions, tolerance);
  return jsonResult({
    status: 'success',
    message: `Renumbered ${plan.nodeIds.size} nodes and ${plan.linkIds.size} links`,
    node_ids: toRecord(plan.nodeIds),
    link_ids: toRecord(plan.linkIds),
  });
}

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'plan_reindex',
  description:
    'Plan sequential renumbering after a layout: nodes are numbered left to right (nodes in the same column top to bottom), then links by origin and target. Returns old id → new id maps; nothing is modified.',
  inputSchema: {
    type: 'object',
    properties: {
      graph: GRAPH_SCHEMA,
      positions: {
        type: 'object',
        description:
          'Optional { id: [x, y] } map, typically the positions returned by organize_workflow. Only these nodes are renumbered.',
      },
      columnTolerance: {
        type: 'number',
        description: 'Nodes whose X differs by less than this are ordered by Y (default: 10).',
      },
    },
    required: ['graph'],
  },
};
