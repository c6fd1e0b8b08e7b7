/**
 * Shared interfaces used across the workflow-columns MCP server.
 */

/** Shape of the JSON returned by tool handlers that wrap results. */
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

/**
 * JSON-schema description of one MCP tool.  A type alias rather than an
 * interface so it stays assignable to the SDK's open `Tool` shape.
 */
export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
};

// ── Tool execution context ─────────────────────────────────────────────────

/**
 * Optional context threaded through tool dispatch into handlers.
 *
 * Carries the server-wide diagnostic settings chosen on the command line,
 * so handlers build their loggers without a process-wide debug switch.
 */
export interface ToolContext {
  /** Verbosity for layout diagnostics; a per-call `debugLevel` argument wins. */
  debugLevel?: number;
  /** Receives diagnostic lines instead of stderr. */
  logSink?: (line: string) => void;
}
