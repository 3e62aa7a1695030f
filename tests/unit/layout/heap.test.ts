import { describe, expect, it } from "vitest";
import { MinHeap } from "../../../src/layout/heap.js";

describe("MinHeap", () => {
  it("pops by priority and breaks ties by insertion order", () => {
    const heap = new MinHeap<string>();
    heap.push(5, "a");
    heap.push(1, "b");
    heap.push(5, "c");
    heap.push(3, "d");
    heap.push(5, "e");

    const out: Array<string | undefined> = [];
    while (heap.size > 0) {
      out.push(heap.pop());
    }
    expect(out).toEqual(["b", "d", "a", "c", "e"]);
  });

  it("returns undefined when empty", () => {
    expect(new MinHeap<number>().pop()).toBeUndefined();
  });
});
