/**
 * Barrel re-export of all handler functions + dispatch map.
 *
 * Individual handler modules live in src/handlers/<name>.ts.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { type ToolContext, type ToolResult } from '../types';

import { handleOrganizeWorkflow } from './organize-workflow';
import { handleDetectLinkOverlaps } from './detect-link-overlaps';
import { handlePlanReindex } from './plan-reindex';
import { handleLogMessage } from './log-message';

export { handleOrganizeWorkflow, handleDetectLinkOverlaps, handlePlanReindex, handleLogMessage };
export { TOOL_DEFINITIONS } from '../tool-definitions';

type ToolHandler = (args: Record<string, unknown>, context?: ToolContext) => Promise<ToolResult>;

// ── Dispatch map ───────────────────────────────────────────────────────────
//
// Tool names use snake_case.  The short action names editors already send
// (`organize`, `reroute`, `log`) are kept as aliases.

const handlers: Record<string, ToolHandler> = {
  organize_workflow: handleOrganizeWorkflow,
  detect_link_overlaps: handleDetectLinkOverlaps,
  plan_reindex: handlePlanReindex,
  log_message: handleLogMessage,
  organize: handleOrganizeWorkflow, // alias
  'detect-overlaps': handleDetectLinkOverlaps, // alias
  reroute: handleDetectLinkOverlaps, // alias
  log: handleLogMessage, // alias
};

/** Whether `name` is a tool or alias this dispatcher routes. */
export function isKnownTool(name: string): boolean {
  return Object.hasOwn(handlers, name);
}

/** Route a CallTool request to the correct handler. */
export async function dispatchToolCall(
  name: string,
  args: Record<string, unknown>,
  context?: ToolContext
): Promise<ToolResult> {
  const handler = isKnownTool(name) ? handlers[name] : undefined;
  if (!handler) {
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }

  try {
    return await handler(args, context);
  } catch (error) {
    if (error instanceof McpError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new McpError(ErrorCode.InternalError, `Error executing ${name}: ${message}`);
  }
}
