/**
 * Default tunables and per-call overrides.
 */

import {
  START_X,
  START_Y,
  COLUMN_SPACING,
  NODE_VERTICAL_SPACING,
  COMPONENT_SPACING,
  PORT_OFFSET,
  PORT_SPACING,
  MAX_LEFTWARD_ITERATIONS,
  MAX_CHAINS,
  REROUTE_INSET,
  REROUTE_LANE_START,
  REROUTE_LANE_STEP,
} from '../constants';
import type { LayoutConfig, OverlapConfig } from './types';

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = {
  startX: START_X,
  startY: START_Y,
  columnSpacing: COLUMN_SPACING,
  nodeSpacing: NODE_VERTICAL_SPACING,
  componentSpacing: COMPONENT_SPACING,
  portOffset: PORT_OFFSET,
  portSpacing: PORT_SPACING,
  maxLeftwardIterations: MAX_LEFTWARD_ITERATIONS,
  maxChains: MAX_CHAINS,
};

export const DEFAULT_OVERLAP_CONFIG: Readonly<OverlapConfig> = {
  portOffset: PORT_OFFSET,
  portSpacing: PORT_SPACING,
  rerouteInset: REROUTE_INSET,
  laneStart: REROUTE_LANE_START,
  laneStep: REROUTE_LANE_STEP,
};

/** Merge overrides onto the defaults.  Overrides must not carry `undefined` values. */
export function resolveConfig<T extends object>(defaults: T, overrides: Partial<T> = {}): T {
  return { ...defaults, ...overrides };
}

/** Estimated Y of a port on a node whose top edge sits at `nodeY`. */
export function portY(
  nodeY: number,
  slot: number,
  config: Pick<LayoutConfig, 'portOffset' | 'portSpacing'>
): number {
  return nodeY + config.portOffset + slot * config.portSpacing;
}
