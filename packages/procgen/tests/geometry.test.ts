import { describe, expect, it } from "vitest";
import {
  fromIndex,
  inflateRect,
  manhattanDistance,
  point,
  pointInCircumcircle,
  rect,
  rectContainsPoint,
  rectsOverlap,
  squaredDistance,
  toIndex,
} from "../src/core/geometry";

describe("point operations", () => {
  it("measures distances", () => {
    expect(manhattanDistance(point(1, 2), point(4, -2))).toBe(7);
    expect(squaredDistance(point(1, 2), point(4, -2))).toBe(25);
  });

  it("converts between points and flat indices", () => {
    expect(toIndex(point(3, 2), 10)).toBe(23);
    expect(fromIndex(23, 10)).toEqual({ x: 3, y: 2 });
  });
});

describe("rect operations", () => {
  it("contains points on its low edges but not its high edges", () => {
    const r = rect(2, 2, 3, 3);
    expect(rectContainsPoint(r, point(2, 2))).toBe(true);
    expect(rectContainsPoint(r, point(4, 4))).toBe(true);
    expect(rectContainsPoint(r, point(5, 4))).toBe(false);
    expect(rectContainsPoint(r, point(1, 3))).toBe(false);
  });

  it("does not count touching rects as overlapping", () => {
    expect(rectsOverlap(rect(0, 0, 5, 5), rect(5, 0, 5, 5))).toBe(false);
    expect(rectsOverlap(rect(0, 0, 5, 5), rect(4, 4, 5, 5))).toBe(true);
    expect(rectsOverlap(rect(0, 0, 5, 5), rect(0, 5, 5, 5))).toBe(false);
  });

  it("inflates on every side", () => {
    expect(inflateRect(rect(10, 20, 5, 6), 3)).toEqual({
      x: 7,
      y: 17,
      width: 11,
      height: 12,
    });
  });
});

describe("pointInCircumcircle", () => {
  const a = point(6, 4);
  const b = point(-6, 12);
  const c = point(0, 1);

  it("accepts a point inside", () => {
    expect(pointInCircumcircle(point(7, 10), a, b, c)).toBe(true);
  });

  it("rejects a point outside", () => {
    expect(pointInCircumcircle(point(8, 10), a, b, c)).toBe(false);
  });

  it("is unaffected by scaling", () => {
    const s = (p: { x: number; y: number }) => point(p.x * 100, p.y * 100);
    expect(pointInCircumcircle(point(700, 1000), s(a), s(b), s(c))).toBe(
      true,
    );
  });

  it("counts the triangle's own vertices as inside", () => {
    expect(pointInCircumcircle(a, a, b, c)).toBe(true);
    expect(pointInCircumcircle(c, a, b, c)).toBe(true);
  });

  it("is false for a degenerate triangle", () => {
    expect(
      pointInCircumcircle(point(1, 1), point(0, 0), point(1, 0), point(2, 0)),
    ).toBe(false);
  });
});
