/**
 * Handler for organize_workflow tool.
 *
 * Arranges every connected node of a workflow graph into left-to-right
 * columns and returns the new positions and sizes.  Nodes without links
 * are left out of the result; the caller keeps them where they are.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { type ToolContext, type ToolDefinition, type ToolResult } from '../types';
import { ChainLimitError, organizeWorkflow } from '../layout';
import type { LayoutConfig } from '../layout/types';
import { DEBUG_LEVEL_SCHEMA, GRAPH_SCHEMA, createToolLogger, jsonResult, toRecord } from './helpers';
import { optionalNumber, parseGraph, validateArgs } from './validation';

/** Numeric arguments that map one-to-one onto LayoutConfig fields. */
const CONFIG_KEYS = [
  'startX',
  'startY',
  'columnSpacing',
  'nodeSpacing',
  'componentSpacing',
  'maxLeftwardIterations',
  'maxChains',
] as const satisfies ReadonlyArray<keyof LayoutConfig>;

const NON_NEGATIVE: ReadonlySet<string> = new Set([
  'columnSpacing',
  'nodeSpacing',
  'componentSpacing',
  'maxLeftwardIterations',
  'maxChains',
]);

export function readLayoutOverrides(args: Record<string, unknown>): Partial<LayoutConfig> {
  const overrides: Partial<LayoutConfig> = {};
  for (const key of CONFIG_KEYS) {
    const value = optionalNumber(args, key, {
      min: NON_NEGATIVE.has(key) ? 0 : undefined,
      integer: key === 'maxLeftwardIterations' || key === 'maxChains',
    });
    if (value !== undefined) overrides[key] = value;
  }
  return overrides;
}

export async function handleOrganizeWorkflow(
  args: Record<string, unknown>,
  context?: ToolContext
): Promise<ToolResult> {
  validateArgs(args, ['graph']);
  const graph = parseGraph(args['graph']);
  const config = readLayoutOverrides(args);
  const logger = createToolLogger('organize', args, context);

  try {
    const result = organizeWorkflow(graph, { config, logger });
    return jsonResult({
      status: result.status,
      message: result.message,
      positions: toRecord(result.positions),
      sizes: toRecord(result.sizes),
      componentCount: result.componentCount,
      converged: result.converged,
    });
  } catch (error) {
    if (error instanceof ChainLimitError) {
      throw new McpError(ErrorCode.InvalidRequest, error.message);
    }
    throw error;
  }
}

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'organize_workflow',
  description:
    'Arrange the connected nodes of a node-graph workflow into left-to-right columns. Every root-to-leaf path is traced, the longest paths anchor the columns, links never point right-to-left when the fix-up converges, and nodes inside a column are stacked to keep their links short. Disjoint workflows are stacked vertically, shortest first. Nodes without any link are not moved and are absent from the result. Returns { positions: { id: [x, y] }, sizes: { id: [width, height] } } where width is the column width.',
  inputSchema: {
    type: 'object',
    properties: {
      graph: GRAPH_SCHEMA,
      startX: { type: 'number', description: 'Left edge of the first column (default: 100).' },
      startY: { type: 'number', description: 'Top of every column (default: 0).' },
      columnSpacing: {
        type: 'number',
        description: 'Horizontal gap in pixels between columns (default: 100).',
      },
      nodeSpacing: {
        type: 'number',
        description: 'Vertical gap in pixels between nodes in a column (default: 60).',
      },
      componentSpacing: {
        type: 'number',
        description: 'Vertical gap in pixels between disjoint workflows (default: 200).',
      },
      maxLeftwardIterations: {
        type: 'number',
        description: 'Cap on leftward-link correction passes (default: 20).',
      },
      maxChains: {
        type: 'number',
        description:
          'Refuse workflows with more root-to-leaf paths than this (default: 50000).',
      },
      debugLevel: DEBUG_LEVEL_SCHEMA,
    },
    required: ['graph'],
  },
};
