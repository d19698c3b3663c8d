/**
 * Geometry operations - pure functions for geometric calculations.
 * All functions are deterministic and side-effect free.
 */

import type { Point, Rect } from "./types";

// =============================================================================
// POINT OPERATIONS
// =============================================================================

/**
 * Create a point
 */
export function point(x: number, y: number): Point {
  return { x, y };
}

/**
 * Manhattan distance between two points
 */
export function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Squared euclidean distance (no sqrt)
 */
export function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * Row-major flat index of a point
 */
export function toIndex(p: Point, width: number): number {
  return p.y * width + p.x;
}

/**
 * Inverse of {@link toIndex}
 */
export function fromIndex(index: number, width: number): Point {
  return { x: index % width, y: Math.floor(index / width) };
}

// =============================================================================
// RECT OPERATIONS
// =============================================================================

export function rect(
  x: number,
  y: number,
  width: number,
  height: number,
): Rect {
  return { x, y, width, height };
}

/**
 * Check if a point is inside a rect
 */
export function rectContainsPoint(r: Rect, p: Point): boolean {
  return (
    p.x >= r.x && p.x < r.x + r.width && p.y >= r.y && p.y < r.y + r.height
  );
}

/**
 * Check if two rects overlap. Touching edges do not count.
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return (
    a.x < b.x + b.width &&
    a.x + a.width > b.x &&
    a.y < b.y + b.height &&
    a.y + a.height > b.y
  );
}

/**
 * Expand a rect by padding on all sides
 */
export function inflateRect(r: Rect, padding: number): Rect {
  return {
    x: r.x - padding,
    y: r.y - padding,
    width: r.width + padding * 2,
    height: r.height + padding * 2,
  };
}

// =============================================================================
// CIRCUMCIRCLE
// =============================================================================

/**
 * Whether `p` lies inside or on the circumcircle of triangle `abc`.
 *
 * The centre is kept scaled by `d = 2 * cross(ab, ac)` and the comparison
 * is done against the scaled radius, so no division happens. Collinear
 * triangles have no circumcircle and contain nothing.
 */
export function pointInCircumcircle(
  p: Point,
  a: Point,
  b: Point,
  c: Point,
): boolean {
  const abx = b.x - a.x;
  const aby = b.y - a.y;
  const acx = c.x - a.x;
  const acy = c.y - a.y;

  const d = 2 * (abx * acy - aby * acx);
  if (d === 0) return false;

  const abSq = abx * abx + aby * aby;
  const acSq = acx * acx + acy * acy;

  // Centre relative to a, multiplied by d
  const ux = acy * abSq - aby * acSq;
  const uy = abx * acSq - acx * abSq;

  const px = (p.x - a.x) * d - ux;
  const py = (p.y - a.y) * d - uy;

  return px * px + py * py <= ux * ux + uy * uy;
}
