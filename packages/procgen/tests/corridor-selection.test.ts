import {
  type Configuration,
  DEFAULT_CONFIGURATION,
  SeededRandom,
} from "@delve/contracts";
import { describe, expect, it } from "vitest";
import { squaredDistance } from "../src/core/geometry";
import {
  minimumSpanningTree,
  pickCorridors,
} from "../src/passes/connectivity/corridor-selection";
import { triangulate } from "../src/passes/connectivity/triangulation";
import type { Doorway, Dungeon, Edge } from "../src/pipeline/types";
import { MaxRandom, MinRandom } from "../src/testing";

function doorway(x: number, y: number, roomIndex: number): Doorway {
  return { position: { x, y }, roomIndex };
}

function withDensity(numerator: number, denominator: number): Configuration {
  return {
    ...DEFAULT_CONFIGURATION,
    reintroducedCorridorDensity: [numerator, denominator],
  };
}

function edge(from: number, to: number): Edge {
  return { from, to };
}

// Doorways on the corners of a 3x2 rectangle
const SQUARE: readonly Doorway[] = [
  doorway(1, 1, 0),
  doorway(4, 1, 1),
  doorway(1, 3, 2),
  doorway(4, 3, 3),
];
const SQUARE_EDGES = [edge(0, 1), edge(0, 2), edge(1, 2), edge(1, 3), edge(2, 3)];

describe("minimumSpanningTree", () => {
  it("sorts edges by length, keeping ties in input order", () => {
    const { sorted, tree } = minimumSpanningTree(SQUARE, SQUARE_EDGES);
    expect(sorted).toEqual([
      edge(0, 2),
      edge(1, 3),
      edge(0, 1),
      edge(2, 3),
      edge(1, 2),
    ]);
    expect(tree).toEqual([0, 1, 2]);
  });

  it("builds the tree of a triangle", () => {
    const doorways = [doorway(1, 1, 0), doorway(4, 1, 1), doorway(1, 3, 2)];
    const { sorted, tree } = minimumSpanningTree(doorways, [
      edge(0, 1),
      edge(1, 2),
      edge(0, 2),
    ]);
    expect(sorted).toEqual([edge(0, 2), edge(0, 1), edge(1, 2)]);
    expect(tree).toEqual([0, 1]);
  });

  it("handles an empty edge list", () => {
    expect(minimumSpanningTree(SQUARE, [])).toEqual({ sorted: [], tree: [] });
  });

  it("throws on an edge to a missing doorway", () => {
    expect(() => minimumSpanningTree(SQUARE, [edge(0, 9)])).toThrow(
      "Edge (0, 9) references a missing doorway",
    );
  });

  it.each([
    [10, 20],
    [100, 60],
    [1000, 200],
  ])("matches Prim's total weight for %i points", (count, size) => {
    const doorways = scatterDoorways(count, size);
    const dungeon: Dungeon = { rooms: [], doorways };
    const edges = triangulate({ width: size, height: size }, dungeon);
    const { sorted, tree } = minimumSpanningTree(doorways, edges);

    let kruskal = 0;
    for (const index of tree) {
      const e = sorted[index];
      if (e) kruskal += length(doorways, e);
    }

    const prim = primForest(doorways, edges);
    expect(kruskal).toBe(prim.weight);
    expect(tree).toHaveLength(prim.edgeCount);
  });
});

describe("pickCorridors", () => {
  const dungeon: Dungeon = { rooms: [], doorways: SQUARE };

  it("keeps only the tree at density 0", () => {
    expect(
      pickCorridors(withDensity(0, 1), dungeon, SQUARE_EDGES, new MinRandom()),
    ).toEqual([edge(0, 2), edge(1, 3), edge(0, 1)]);
  });

  it("keeps every edge at density 1", () => {
    expect(
      pickCorridors(withDensity(1, 1), dungeon, SQUARE_EDGES, new MinRandom()),
    ).toEqual([edge(0, 2), edge(1, 3), edge(0, 1), edge(2, 3), edge(1, 2)]);
  });

  it("keeps a residual edge when the draw is at most the numerator", () => {
    const config = withDensity(1, 2);
    expect(
      pickCorridors(config, dungeon, SQUARE_EDGES, new MinRandom()),
    ).toHaveLength(5);
    expect(
      pickCorridors(config, dungeon, SQUARE_EDGES, new MaxRandom()),
    ).toHaveLength(3);
  });

  it("almost never reintroduces edges at a density with a huge denominator", () => {
    const config = withDensity(1, 4_000_000_000);
    let kept = 0;
    for (let seed = 1; seed <= 200; seed++) {
      const corridors = pickCorridors(
        config,
        dungeon,
        SQUARE_EDGES,
        new SeededRandom(seed),
      );
      kept += corridors.length - 3;
    }
    expect(kept).toBe(0);
  });

  it("drops edges between doorways of the same room", () => {
    const sameRoom: Dungeon = {
      rooms: [],
      doorways: SQUARE.map((d) => ({ ...d, roomIndex: 0 })),
    };
    expect(
      pickCorridors(withDensity(1, 1), sameRoom, SQUARE_EDGES, new MinRandom()),
    ).toEqual([]);
  });

  it("skips same-room tree edges but keeps the rest", () => {
    // 0 and 2 share a room, so the shortest tree edge is dropped
    const mixed: Dungeon = {
      rooms: [],
      doorways: [
        doorway(1, 1, 0),
        doorway(4, 1, 1),
        doorway(1, 3, 0),
        doorway(4, 3, 2),
      ],
    };
    expect(
      pickCorridors(withDensity(0, 1), mixed, SQUARE_EDGES, new MinRandom()),
    ).toEqual([edge(1, 3), edge(0, 1)]);
  });
});

function length(doorways: readonly Doorway[], e: Edge): number {
  const a = doorways[e.from];
  const b = doorways[e.to];
  if (!a || !b) throw new Error(`bad edge ${e.from}-${e.to}`);
  return squaredDistance(a.position, b.position);
}

function scatterDoorways(count: number, size: number): Doorway[] {
  let state = count >>> 0;
  const next = (n: number): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % n;
  };

  const seen = new Set<number>();
  const doorways: Doorway[] = [];
  while (doorways.length < count) {
    const x = next(size);
    const y = next(size);
    if (seen.has(y * size + x)) continue;
    seen.add(y * size + x);
    doorways.push(doorway(x, y, doorways.length));
  }
  return doorways;
}

/** Minimum spanning forest weight by Prim's algorithm over adjacency lists */
function primForest(
  doorways: readonly Doorway[],
  edges: readonly Edge[],
): { weight: number; edgeCount: number } {
  const adjacency: Array<Array<{ to: number; w: number }>> = doorways.map(
    () => [],
  );
  for (const e of edges) {
    const w = length(doorways, e);
    adjacency[e.from]?.push({ to: e.to, w });
    adjacency[e.to]?.push({ to: e.from, w });
  }

  const inTree = new Array<boolean>(doorways.length).fill(false);
  const best = new Array<number>(doorways.length).fill(Infinity);
  let weight = 0;
  let edgeCount = 0;

  for (let root = 0; root < doorways.length; root++) {
    if (inTree[root]) continue;
    best[root] = 0;

    while (true) {
      let next = -1;
      for (let v = 0; v < doorways.length; v++) {
        if (inTree[v] || best[v] === Infinity) continue;
        if (next === -1 || (best[v] ?? Infinity) < (best[next] ?? Infinity)) {
          next = v;
        }
      }
      if (next === -1) break;

      inTree[next] = true;
      if (next !== root) {
        weight += best[next] ?? 0;
        edgeCount++;
      }
      for (const { to, w } of adjacency[next] ?? []) {
        if (!inTree[to] && w < (best[to] ?? Infinity)) best[to] = w;
      }
    }
  }

  return { weight, edgeCount };
}
