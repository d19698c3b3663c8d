import { describe, expect, it } from "vitest";
import { MinHeap } from "../src/core/data-structures";

describe("MinHeap", () => {
  it("returns entries in ascending key order", () => {
    const heap = new MinHeap<string>();
    heap.insert(4, "d");
    heap.insert(1, "a");
    heap.insert(3, "c");
    heap.insert(2, "b");

    expect(heap.extractMin()).toEqual({ key: 1, value: "a" });
    expect(heap.extractMin()).toEqual({ key: 2, value: "b" });
    expect(heap.extractMin()).toEqual({ key: 3, value: "c" });
    expect(heap.extractMin()).toEqual({ key: 4, value: "d" });
    expect(heap.extractMin()).toBeUndefined();
  });

  it("keeps duplicate keys", () => {
    const heap = new MinHeap<number>();
    heap.insert(5, 10);
    heap.insert(5, 20);
    heap.insert(1, 30);

    expect(heap.size).toBe(3);
    expect(heap.extractMin()?.value).toBe(30);
    const rest = [heap.extractMin()?.value, heap.extractMin()?.value];
    expect(rest.sort()).toEqual([10, 20]);
  });

  it("peeks without removing", () => {
    const heap = new MinHeap<number>();
    expect(heap.min()).toBeUndefined();

    heap.insert(10, 1);
    heap.insert(5, 2);
    expect(heap.min()).toEqual({ key: 5, value: 2 });
    expect(heap.size).toBe(2);
  });

  it("supports size/isEmpty/clear", () => {
    const heap = new MinHeap<number>();
    expect(heap.isEmpty).toBe(true);
    expect(heap.size).toBe(0);

    heap.insert(3, 0);
    heap.insert(2, 0);
    expect(heap.isEmpty).toBe(false);

    heap.clear();
    expect(heap.isEmpty).toBe(true);
    expect(heap.size).toBe(0);
    expect(heap.extractMin()).toBeUndefined();

    heap.insert(7, 7);
    expect(heap.extractMin()).toEqual({ key: 7, value: 7 });
  });

  it("sorts a scrambled sequence", () => {
    const heap = new MinHeap<number>();
    const keys: number[] = [];
    for (let i = 0; i < 200; i++) {
      const key = (i * 37) % 101;
      keys.push(key);
      heap.insert(key, i);
    }

    const drained: number[] = [];
    for (let entry = heap.extractMin(); entry; entry = heap.extractMin()) {
      drained.push(entry.key);
    }
    expect(drained).toEqual([...keys].sort((a, b) => a - b));
  });
});
