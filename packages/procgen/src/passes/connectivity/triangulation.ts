/**
 * Delaunay triangulation of doorways (Bowyer-Watson).
 */

import { pointInCircumcircle } from "../../core/geometry/operations";
import type { Dimensions, Point } from "../../core/geometry/types";
import type { Dungeon, Edge } from "../../pipeline/types";

/**
 * Triangle represented by three point indices
 */
export interface Triangle {
  readonly a: number;
  readonly b: number;
  readonly c: number;
}

/**
 * Edge with the smaller index first
 */
export function makeEdge(a: number, b: number): Edge {
  return a < b ? { from: a, to: b } : { from: b, to: a };
}

/**
 * Order edges by `from`, then `to`
 */
export function compareEdges(a: Edge, b: Edge): number {
  return a.from - b.from || a.to - b.to;
}

/**
 * Three synthetic vertices whose triangle strictly encloses the grid.
 */
export function superTriangle(dimensions: Dimensions): [Point, Point, Point] {
  return [
    { x: -1, y: -1 },
    { x: -1, y: 2 * dimensions.height + 1 },
    { x: 2 * dimensions.width + 1, y: -1 },
  ];
}

/**
 * Incremental Delaunay triangulation of `points`.
 *
 * Every point is inserted into the triangle set seeded with the super
 * triangle: triangles whose circumcircle holds the point are removed, and
 * the boundary of the hole they leave is fanned to the point. Triangles
 * still touching a super vertex are dropped at the end, so the returned
 * indices always refer to `points`.
 */
export function bowyerWatson(
  points: readonly Point[],
  dimensions: Dimensions,
): Triangle[] {
  const count = points.length;
  const vertices: Point[] = [...points, ...superTriangle(dimensions)];
  const vertex = (index: number): Point =>
    vertices[index] ?? { x: 0, y: 0 };

  let triangles: Triangle[] = [{ a: count, b: count + 1, c: count + 2 }];
  // Keyed by from * stride + to, insertion ordered
  const stride = count + 3;
  const polygon = new Map<number, Edge>();

  const toggle = (edge: Edge): void => {
    const key = edge.from * stride + edge.to;
    if (!polygon.delete(key)) {
      polygon.set(key, edge);
    }
  };

  for (let index = 0; index < count; index++) {
    const p = vertex(index);
    const kept: Triangle[] = [];
    polygon.clear();

    for (const triangle of triangles) {
      if (
        pointInCircumcircle(
          p,
          vertex(triangle.a),
          vertex(triangle.b),
          vertex(triangle.c),
        )
      ) {
        toggle(makeEdge(triangle.a, triangle.b));
        toggle(makeEdge(triangle.a, triangle.c));
        toggle(makeEdge(triangle.b, triangle.c));
      } else {
        kept.push(triangle);
      }
    }

    for (const edge of polygon.values()) {
      kept.push({ a: edge.from, b: edge.to, c: index });
    }
    triangles = kept;
  }

  return triangles.filter(
    (t) => t.a < count && t.b < count && t.c < count,
  );
}

/**
 * Unique edges of a triangle list, sorted by `(from, to)`.
 */
export function triangleEdges(triangles: readonly Triangle[]): Edge[] {
  const seen = new Set<string>();
  const edges: Edge[] = [];

  for (const t of triangles) {
    for (const edge of [
      makeEdge(t.a, t.b),
      makeEdge(t.a, t.c),
      makeEdge(t.b, t.c),
    ]) {
      const key = `${edge.from}:${edge.to}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push(edge);
    }
  }

  return edges.sort(compareEdges);
}

/**
 * Delaunay edges over the doorways of `dungeon`, as doorway index pairs.
 */
export function triangulate(dimensions: Dimensions, dungeon: Dungeon): Edge[] {
  const points = dungeon.doorways.map((doorway) => doorway.position);
  return triangleEdges(bowyerWatson(points, dimensions));
}
