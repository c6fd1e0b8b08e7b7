/**
 * Shared helpers used by individual tool handler modules.
 */

import { type ToolContext, type ToolResult } from '../types';
import type { NodeId } from '../layout/types';
import { createLayoutLogger, type LayoutLogger } from '../layout/layout-logger';
import { optionalNumber } from './validation';

/** Wrap a plain object into the MCP tool-result envelope. */
export function jsonResult(data: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/** Convert an id-keyed map to a JSON object (keys become strings). */
export function toRecord<T>(map: ReadonlyMap<NodeId, T>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [id, value] of map) out[String(id)] = value;
  return out;
}

/**
 * Build the logger for one tool call.  A `debugLevel` argument overrides
 * the server-wide level from the context, which overrides the environment.
 */
export function createToolLogger(
  pipelineName: string,
  args: Record<string, unknown>,
  context?: ToolContext
): LayoutLogger {
  const level =
    optionalNumber(args, 'debugLevel', { min: 0, integer: true }) ?? context?.debugLevel;
  return createLayoutLogger(pipelineName, { level, sink: context?.logSink });
}

/** JSON-schema fragment shared by every tool that accepts a graph snapshot. */
export const GRAPH_SCHEMA = {
  type: 'object',
  description:
    'Graph snapshot: { nodes: [{ id, type, pos: [x, y], size: [w, h] }], links: [{ id, origin_id, origin_slot, target_id, target_slot }] }. Links may also use the serialized array form [id, origin_id, origin_slot, target_id, target_slot, type].',
  properties: {
    nodes: { type: 'array', items: { type: 'object' } },
    links: { type: 'array' },
  },
};

export const DEBUG_LEVEL_SCHEMA = {
  type: 'number',
  description:
    'Diagnostic verbosity written to stderr for this call: 0 = silent, 1 = steps, 2 = per-node traces.',
};
