/**
 * Geometry helpers shared by the overlap detector.
 *
 * Rectangles are axis-aligned and given by their top-left corner; Y grows
 * downwards as in every canvas-based graph editor.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Inclusive point-in-rectangle test. */
export function pointInRect(p: Point, rect: Rect): boolean {
  return (
    rect.x <= p.x && p.x <= rect.x + rect.width && rect.y <= p.y && p.y <= rect.y + rect.height
  );
}

/** True when the triangle a → b → c is counter-clockwise. */
export function ccw(a: Point, b: Point, c: Point): boolean {
  return (c.y - a.y) * (b.x - a.x) > (b.y - a.y) * (c.x - a.x);
}

/**
 * Orientation-based segment intersection test.
 *
 * Collinear overlaps are not special-cased: two segments lying on the same
 * line never report an intersection.
 */
export function segmentsIntersect(a1: Point, a2: Point, b1: Point, b2: Point): boolean {
  return ccw(a1, b1, b2) !== ccw(a2, b1, b2) && ccw(a1, a2, b1) !== ccw(a1, a2, b2);
}

/** The four edges of a rectangle: top, right, bottom, left. */
export function rectEdges(rect: Rect): Array<[Point, Point]> {
  const left = rect.x;
  const right = rect.x + rect.width;
  const top = rect.y;
  const bottom = rect.y + rect.height;
  return [
    [
      { x: left, y: top },
      { x: right, y: top },
    ],
    [
      { x: right, y: top },
      { x: right, y: bottom },
    ],
    [
      { x: left, y: bottom },
      { x: right, y: bottom },
    ],
    [
      { x: left, y: top },
      { x: left, y: bottom },
    ],
  ];
}

/**
 * Test whether the segment p1 → p2 touches a rectangle: either endpoint
 * lies inside it, or the segment crosses one of its edges.
 */
export function segmentIntersectsRect(p1: Point, p2: Point, rect: Rect): boolean {
  if (pointInRect(p1, rect) || pointInRect(p2, rect)) return true;
  return rectEdges(rect).some(([e1, e2]) => segmentsIntersect(p1, p2, e1, e2));
}

/** Euclidean distance between two points. */
export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}
