/**
 * Workflow tool module — registers the layout MCP tools.
 *
 * Implements the generic ToolModule interface so the MCP server can
 * aggregate tools from several modules.
 */

import { type ToolResult, type ToolContext } from './types';
import { type ToolModule } from './module';
import { TOOL_DEFINITIONS, dispatchToolCall, isKnownTool } from './handlers';

export const workflowModule: ToolModule = {
  name: 'workflow',
  toolDefinitions: TOOL_DEFINITIONS,

  dispatch(
    toolName: string,
    args: Record<string, unknown>,
    context?: ToolContext
  ): Promise<ToolResult> | undefined {
    if (!isKnownTool(toolName)) return undefined;
    return dispatchToolCall(toolName, args, context);
  },
};
