import { describe, it, expect } from "vitest";
import { PriorityHeap } from "../src/queue/priority-heap";

describe("PriorityHeap", () => {
  it("pops in ascending order", () => {
    const heap = new PriorityHeap<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 2, 3, 9, 0]) heap.push(n);

    const popped: number[] = [];
    while (heap.size > 0) {
      const next = heap.pop();
      if (next !== undefined) popped.push(next);
    }

    expect(popped).toEqual([0, 1, 2, 3, 4, 5, 9]);
  });

  it("peek and toSortedArray leave the heap intact", () => {
    const heap = new PriorityHeap<number>((a, b) => a - b);
    heap.push(3);
    heap.push(1);
    heap.push(2);

    expect(heap.peek()).toBe(1);
    expect(heap.toSortedArray()).toEqual([1, 2, 3]);
    expect(heap.size).toBe(3);
  });

  it("returns undefined when empty", () => {
    const heap = new PriorityHeap<string>((a, b) => a.localeCompare(b));
    expect(heap.pop()).toBeUndefined();
    heap.push("a");
    heap.clear();
    expect(heap.peek()).toBeUndefined();
  });
});
