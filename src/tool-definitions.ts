/**
 * MCP tool schema definitions — thin barrel.
 *
 * Each tool definition is co-located with its handler module.
 * This file collects them into a single array for the MCP server.
 */

import { type ToolDefinition } from './types';
import { TOOL_DEFINITION as ORGANIZE_WORKFLOW } from './handlers/organize-workflow';
import { TOOL_DEFINITION as DETECT_LINK_OVERLAPS } from './handlers/detect-link-overlaps';
import { TOOL_DEFINITION as PLAN_REINDEX } from './handlers/plan-reindex';
import { TOOL_DEFINITION as LOG_MESSAGE } from './handlers/log-message';

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  ORGANIZE_WORKFLOW,
  DETECT_LINK_OVERLAPS,
  PLAN_REINDEX,
  LOG_MESSAGE,
];
