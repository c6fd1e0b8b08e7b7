/**
 * @internal
 * Runtime argument validation for MCP tool handlers.
 *
 * Tool arguments arrive as untyped JSON.  Everything the layout engine
 * consumes is narrowed here; failures surface as MCP InvalidParams errors
 * naming the offending field.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type {
  LinkId,
  NodeId,
  Position,
  WorkflowGraph,
  WorkflowLink,
  WorkflowNode,
} from '../layout/types';

function invalid(message: string): McpError {
  return new McpError(ErrorCode.InvalidParams, message);
}

/**
 * Validate that all `requiredKeys` are present and non-undefined in `args`.
 * Throws an MCP InvalidParams error with a clear message listing missing keys.
 */
export function validateArgs<T extends object>(args: T, requiredKeys: (keyof T & string)[]): void {
  const missing = requiredKeys.filter((key) => args[key] === undefined || args[key] === null);
  if (missing.length > 0) {
    throw invalid(`Missing required argument(s): ${missing.join(', ')}`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isId(value: unknown): value is NodeId {
  return isFiniteNumber(value) || (typeof value === 'string' && value.length > 0);
}

function requireId(value: unknown, path: string): NodeId {
  if (!isId(value)) throw invalid(`${path} must be a number or a non-empty string`);
  return value;
}

function requireSlot(value: unknown, path: string): number {
  if (value === undefined || value === null) return 0;
  if (!isFiniteNumber(value) || value < 0 || !Number.isInteger(value)) {
    throw invalid(`${path} must be a non-negative integer`);
  }
  return value;
}

/** Parse an `[a, b]` pair of finite numbers. */
export function requirePair(value: unknown, path: string): [number, number] {
  if (!Array.isArray(value) || value.length < 2) {
    throw invalid(`${path} must be a [number, number] pair`);
  }
  const [a, b] = value;
  if (!isFiniteNumber(a) || !isFiniteNumber(b)) {
    throw invalid(`${path} must be a [number, number] pair`);
  }
  return [a, b];
}

function parseNode(raw: unknown, index: number): WorkflowNode {
  const path = `nodes[${index}]`;
  if (!isRecord(raw)) throw invalid(`${path} must be an object`);
  const id = requireId(raw['id'], `${path}.id`);
  const type = raw['type'] ?? '';
  if (typeof type !== 'string') throw invalid(`${path}.type must be a string`);
  const [x, y] = requirePair(raw['pos'], `${path}.pos`);
  const [width, height] = requirePair(raw['size'], `${path}.size`);
  if (width < 0 || height < 0) throw invalid(`${path}.size must not be negative`);
  return { id, type, x, y, width, height };
}

/**
 * Parse a link in object form (`{ id, origin_id, origin_slot, target_id, target_slot }`)
 * or in the serialized array form `[id, origin_id, origin_slot, target_id, target_slot, type?]`.
 */
function parseLink(raw: unknown, index: number): WorkflowLink {
  const path = `links[${index}]`;
  if (Array.isArray(raw)) {
    if (raw.length < 5) throw invalid(`${path} must have at least 5 entries`);
    const [id, originId, originSlot, targetId, targetSlot] = raw;
    return {
      id: requireId(id, `${path}[0]`),
      originId: requireId(originId, `${path}[1]`),
      originSlot: requireSlot(originSlot, `${path}[2]`),
      targetId: requireId(targetId, `${path}[3]`),
      targetSlot: requireSlot(targetSlot, `${path}[4]`),
    };
  }
  if (!isRecord(raw)) throw invalid(`${path} must be an object or an array`);
  const linkId: LinkId = requireId(raw['id'], `${path}.id`);
  return {
    id: linkId,
    originId: requireId(raw['origin_id'], `${path}.origin_id`),
    originSlot: requireSlot(raw['origin_slot'], `${path}.origin_slot`),
    targetId: requireId(raw['target_id'], `${path}.target_id`),
    targetSlot: requireSlot(raw['target_slot'], `${path}.target_slot`),
  };
}

function parseList<T>(raw: unknown, path: string, item: (v: unknown, i: number) => T): T[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) throw invalid(`${path} must be an array`);
  return raw.map(item);
}

/** Parse the `graph` payload: `{ nodes: [...], links: [...] }`. Missing lists are empty. */
export function parseGraph(raw: unknown): WorkflowGraph {
  if (!isRecord(raw)) throw invalid('graph must be an object with nodes and links');
  return {
    nodes: parseList(raw['nodes'], 'graph.nodes', parseNode),
    links: parseList(raw['links'], 'graph.links', parseLink),
  };
}

/**
 * Parse a `{ nodeId: [x, y] }` object, matching keys back to the graph's
 * node ids (object keys are always strings on the wire).
 */
export function parsePositions(raw: unknown, graph: WorkflowGraph): Map<NodeId, Position> {
  if (!isRecord(raw)) throw invalid('positions must be an object of node id → [x, y]');
  const byKey = new Map(graph.nodes.map((n) => [String(n.id), n.id] as const));
  const positions = new Map<NodeId, Position>();
  for (const [key, value] of Object.entries(raw)) {
    const id = byKey.get(key);
    if (id === undefined) continue;
    positions.set(id, requirePair(value, `positions.${key}`));
  }
  return positions;
}

/** Read an optional numeric argument, enforcing a lower bound. */
export function optionalNumber(
  args: Record<string, unknown>,
  key: string,
  opts: { min?: number; integer?: boolean } = {}
): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (!isFiniteNumber(value)) throw invalid(`${key} must be a number`);
  if (opts.integer && !Number.isInteger(value)) throw invalid(`${key} must be an integer`);
  if (opts.min !== undefined && value < opts.min) throw invalid(`${key} must be >= ${opts.min}`);
  return value;
}

/** Read a required string argument. */
export function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') throw invalid(`${key} must be a string`);
  return value;
}
