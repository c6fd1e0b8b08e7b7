/**
 * Centralised magic numbers for column layout and overlap detection.
 */

/** Left margin (px) of the first column. */
export const START_X = 100;

/** Top coordinate (px) where every column starts stacking nodes. */
export const START_Y = 0;

/** Horizontal gap (px) between the right edge of a column and the next column. */
export const COLUMN_SPACING = 100;

/**
 * Vertical gap (px) between nodes stacked in the same column.
 * Leaves room for the ~30px title bar editors draw above a node body.
 */
export const NODE_VERTICAL_SPACING = 60;

/** Vertical gap (px) between stacked disconnected workflows. */
export const COMPONENT_SPACING = 200;

/**
 * Estimated port geometry.  Editors do not send real slot positions, so a
 * port's Y is approximated as `nodeY + PORT_OFFSET + slot * PORT_SPACING`.
 */
export const PORT_OFFSET = 30;
export const PORT_SPACING = 20;

/** Hard cap on leftward-link correction passes. */
export const MAX_LEFTWARD_ITERATIONS = 20;

/**
 * Upper bound on enumerated root-to-leaf chains.  Path enumeration is
 * exponential in fan-out; past this count the request is rejected.
 */
export const MAX_CHAINS = 50_000;

/** Horizontal inset (px) of reroute waypoints from the link endpoints. */
export const REROUTE_INSET = 50;

/** Distance (px) of the first reroute lane from the obstructing nodes. */
export const REROUTE_LANE_START = 50;

/** Extra distance (px) for every further lane in the same direction. */
export const REROUTE_LANE_STEP = 20;

/** Two nodes whose X differ by less than this share a column when reindexing. */
export const REINDEX_COLUMN_TOLERANCE = 10;
