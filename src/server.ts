/**
 * MCP server factory.
 *
 * Wires MCP SDK request handlers ↔ tool modules.  Kept apart from the
 * stdio entry point so tests can build a server without a transport.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';
import { type ToolModule } from './module';
import { type ToolContext } from './types';
import { workflowModule } from './workflow-module';

export const SERVER_NAME = 'workflow-columns-mcp';
export const SERVER_VERSION = '0.1.0';

// ── Registered tool modules ────────────────────────────────────────────────
export const modules: readonly ToolModule[] = [workflowModule];

export function createServer(context: ToolContext = {}): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: modules.flatMap((m) => m.toolDefinitions),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    for (const mod of modules) {
      const result = mod.dispatch(name, args ?? {}, context);
      if (result) return result;
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}
