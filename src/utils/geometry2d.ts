/**
 * 2D geometry in canvas space: distances, polygon area and convex clipping.
 */

export interface Point2D {
  x: number
  y: number
}

export interface Bounds2D {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

/** Polygons with less area than this (in square pixels) are treated as degenerate. */
export const AREA_EPSILON = 1e-9

/** Default slack, in pixels, for points that lie on a clip boundary. */
export const CLIP_TOLERANCE = 1e-6

/**
 * Calculate the distance from a point to a line segment in 2D.
 */
export function distanceToLineSegment2D(
  px: number,
  py: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): number {
  const A = px - x1;
  const B = py - y1;
  const C = x2 - x1;
  const D = y2 - y1;

  const dot = A * C + B * D;
  const lenSq = C * C + D * D;

  // Segment is a point
  if (lenSq === 0) {
    return Math.sqrt(A * A + B * B);
  }

  const param = Math.max(0, Math.min(1, dot / lenSq));

  const closestX = x1 + param * C;
  const closestY = y1 + param * D;

  return Math.sqrt((px - closestX) ** 2 + (py - closestY) ** 2);
}

/**
 * Calculate the Euclidean distance between two 2D points.
 */
export function distance2D(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): number {
  return Math.sqrt((x2 - x1) ** 2 + (y2 - y1) ** 2);
}

export function segmentLength(start: Point2D, end: Point2D): number {
  return distance2D(start.x, start.y, end.x, end.y);
}

/**
 * Shoelace area. Positive when the vertices run counter-clockwise in a
 * y-up frame (clockwise on a y-down canvas).
 */
export function signedArea(polygon: readonly Point2D[]): number {
  let sum = 0;
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
}

export function isDegeneratePolygon(polygon: readonly Point2D[]): boolean {
  return polygon.length < 3 || Math.abs(signedArea(polygon)) < AREA_EPSILON;
}

export function rectanglePolygon(bounds: Bounds2D): Point2D[] {
  return [
    { x: bounds.minX, y: bounds.minY },
    { x: bounds.maxX, y: bounds.minY },
    { x: bounds.maxX, y: bounds.maxY },
    { x: bounds.minX, y: bounds.maxY },
  ];
}

export function boundsOf(points: readonly Point2D[]): Bounds2D | null {
  if (points.length === 0) {
    return null;
  }
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  return { minX, minY, maxX, maxY };
}

export function unionBounds(a: Bounds2D | null, b: Bounds2D | null): Bounds2D | null {
  if (!a) return b;
  if (!b) return a;
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function clampToBounds(p: Point2D, bounds: Bounds2D): Point2D {
  return {
    x: Math.max(bounds.minX, Math.min(bounds.maxX, p.x)),
    y: Math.max(bounds.minY, Math.min(bounds.maxY, p.y)),
  };
}

/**
 * Signed distance of p from the edge a→b, positive on the polygon's inner side.
 * orientation is the sign of the polygon's signed area.
 */
function insideDistance(p: Point2D, a: Point2D, b: Point2D, orientation: number): number {
  const ex = b.x - a.x;
  const ey = b.y - a.y;
  const len = Math.sqrt(ex * ex + ey * ey);
  if (len === 0) {
    return 0;
  }
  return (orientation * (ex * (p.y - a.y) - ey * (p.x - a.x))) / len;
}

export function isPointInConvexPolygon(
  p: Point2D,
  polygon: readonly Point2D[],
  tolerance: number = CLIP_TOLERANCE,
): boolean {
  if (isDegeneratePolygon(polygon)) {
    return false;
  }
  const orientation = Math.sign(signedArea(polygon));
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    if (insideDistance(p, a, b, orientation) < -tolerance) {
      return false;
    }
  }
  return true;
}

/**
 * Clip a segment against a convex polygon of either winding (Cyrus-Beck).
 * Points within `tolerance` pixels of an edge count as inside, so a segment
 * lying on the polygon boundary survives. Returns null when nothing remains.
 */
export function clipSegmentToConvexPolygon(
  start: Point2D,
  end: Point2D,
  polygon: readonly Point2D[],
  tolerance: number = CLIP_TOLERANCE,
): [Point2D, Point2D] | null {
  if (isDegeneratePolygon(polygon)) {
    return null;
  }
  const orientation = Math.sign(signedArea(polygon));
  const dx = end.x - start.x;
  const dy = end.y - start.y;

  let tEnter = 0;
  let tExit = 1;

  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    const ex = b.x - a.x;
    const ey = b.y - a.y;
    const len = Math.sqrt(ex * ex + ey * ey);
    if (len === 0) continue;

    // Inward unit normal of this edge
    const nx = (-ey * orientation) / len;
    const ny = (ex * orientation) / len;

    // f(t) = num + t * den must stay >= 0
    const num = nx * (start.x - a.x) + ny * (start.y - a.y) + tolerance;
    const den = nx * dx + ny * dy;

    if (Math.abs(den) < 1e-12) {
      if (num < 0) return null;
      continue;
    }

    const t = -num / den;
    if (den > 0) {
      tEnter = Math.max(tEnter, t);
    } else {
      tExit = Math.min(tExit, t);
    }
    if (tEnter > tExit) {
      return null;
    }
  }

  return [
    { x: start.x + tEnter * dx, y: start.y + tEnter * dy },
    { x: start.x + tExit * dx, y: start.y + tExit * dy },
  ];
}

/**
 * Clip a polygon against a convex polygon (Sutherland-Hodgman).
 * Consecutive duplicate vertices are removed from the result.
 */
export function clipPolygonToConvexPolygon(
  subject: readonly Point2D[],
  clip: readonly Point2D[],
): Point2D[] {
  if (subject.length === 0 || isDegeneratePolygon(clip)) {
    return [];
  }
  const orientation = Math.sign(signedArea(clip));
  let output: Point2D[] = [...subject];

  for (let i = 0; i < clip.length && output.length > 0; i++) {
    const a = clip[i];
    const b = clip[(i + 1) % clip.length];
    const input = output;
    output = [];

    for (let j = 0; j < input.length; j++) {
      const current = input[j];
      const previous = input[(j + input.length - 1) % input.length];
      const dCurrent = insideDistance(current, a, b, orientation);
      const dPrevious = insideDistance(previous, a, b, orientation);

      if (dCurrent >= 0) {
        if (dPrevious < 0) {
          output.push(intersectAt(previous, current, dPrevious, dCurrent));
        }
        output.push(current);
      } else if (dPrevious >= 0) {
        output.push(intersectAt(previous, current, dPrevious, dCurrent));
      }
    }
  }

  return removeDuplicateVertices(output);
}

function intersectAt(p: Point2D, q: Point2D, dp: number, dq: number): Point2D {
  const t = dp / (dp - dq);
  return { x: p.x + t * (q.x - p.x), y: p.y + t * (q.y - p.y) };
}

function removeDuplicateVertices(polygon: Point2D[]): Point2D[] {
  const result: Point2D[] = [];
  for (const p of polygon) {
    const last = result[result.length - 1];
    if (!last || Math.abs(last.x - p.x) > 1e-12 || Math.abs(last.y - p.y) > 1e-12) {
      result.push(p);
    }
  }
  if (result.length > 1) {
    const first = result[0];
    const last = result[result.length - 1];
    if (Math.abs(last.x - first.x) <= 1e-12 && Math.abs(last.y - first.y) <= 1e-12) {
      result.pop();
    }
  }
  return result;
}
