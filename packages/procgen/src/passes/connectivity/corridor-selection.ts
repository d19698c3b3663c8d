/**
 * Corridor selection: minimum spanning tree plus a random share of the
 * remaining Delaunay edges.
 */

import type { Configuration, RandomSource } from "@delve/contracts";
import { UnionFind } from "../../core/algorithms/union-find";
import { squaredDistance } from "../../core/geometry/operations";
import type { Doorway, Dungeon, Edge } from "../../pipeline/types";

export interface SpanningTree {
  /** Input edges stably sorted by squared length. */
  readonly sorted: readonly Edge[];
  /** Ascending indices into `sorted` of the edges Kruskal accepted. */
  readonly tree: readonly number[];
}

function edgeLengthSquared(doorways: readonly Doorway[], edge: Edge): number {
  const a = doorways[edge.from];
  const b = doorways[edge.to];
  if (a === undefined || b === undefined) {
    throw new RangeError(
      `Edge (${edge.from}, ${edge.to}) references a missing doorway`,
    );
  }
  return squaredDistance(a.position, b.position);
}

/**
 * Kruskal's algorithm over doorway edges. Ties keep their input order.
 */
export function minimumSpanningTree(
  doorways: readonly Doorway[],
  edges: readonly Edge[],
): SpanningTree {
  const sorted = edges
    .map((edge) => ({ edge, length: edgeLengthSquared(doorways, edge) }))
    .sort((a, b) => a.length - b.length)
    .map(({ edge }) => edge);

  const sets = new UnionFind(doorways.length);
  const tree: number[] = [];

  sorted.forEach((edge, index) => {
    if (sets.union(edge.from, edge.to)) {
      tree.push(index);
    }
  });

  return { sorted, tree };
}

/**
 * Pick the corridor edges of a dungeon from its triangulation.
 *
 * Every tree edge joining two different rooms is kept, in tree order.
 * Each other edge joining two different rooms is then kept when a draw in
 * `[1, denominator]` is at most `numerator`. Edges between doorways of the
 * same room never become corridors.
 */
export function pickCorridors(
  config: Configuration,
  dungeon: Dungeon,
  edges: readonly Edge[],
  rng: RandomSource,
): Edge[] {
  const { doorways } = dungeon;
  const { sorted, tree } = minimumSpanningTree(doorways, edges);
  const [numerator, denominator] = config.reintroducedCorridorDensity;

  const crossesRooms = (edge: Edge): boolean =>
    doorways[edge.from]?.roomIndex !== doorways[edge.to]?.roomIndex;

  // Tree indices are ascending, so one sweep splits off the residual edges
  const residual: Edge[] = [];
  let treeCursor = 0;
  sorted.forEach((edge, index) => {
    if (tree[treeCursor] === index) {
      treeCursor++;
      return;
    }
    residual.push(edge);
  });

  const corridors: Edge[] = [];

  for (const index of tree) {
    const edge = sorted[index];
    if (edge !== undefined && crossesRooms(edge)) {
      corridors.push(edge);
    }
  }

  for (const edge of residual) {
    if (!crossesRooms(edge)) continue;
    if (rng.range(1, denominator) <= numerator) {
      corridors.push(edge);
    }
  }

  return corridors;
}
