/**
 * Handler for log_message tool: lets the editor client write a line to the
 * server's diagnostic stream.
 */

import { type ToolContext, type ToolDefinition, type ToolResult } from '../types';
import { stderrSink } from '../layout/layout-logger';
import { jsonResult } from './helpers';
import { requireString, validateArgs } from './validation';

export const LOG_PREFIX = '[workflow]';

export async function handleLogMessage(
  args: Record<string, unknown>,
  context?: ToolContext
): Promise<ToolResult> {
  validateArgs(args, ['message']);
  const message = requireString(args, 'message');
  const sink = context?.logSink ?? stderrSink;
  sink(`${LOG_PREFIX} ${message}`);
  return jsonResult({ status: 'success' });
}

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'log_message',
  description:
    "Write a client message to the server's diagnostic log (stderr). Useful for tracing editor-side actions next to layout diagnostics.",
  inputSchema: {
    type: 'object',
    properties: {
      message: { type: 'string', description: 'Text to log.' },
    },
    required: ['message'],
  },
};
