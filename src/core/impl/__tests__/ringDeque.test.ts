import { describe, expect, it } from "vitest";
import { RingDeque } from "../ringDeque.js";

describe("RingDeque", () => {
  it("keeps FIFO order across growth and wraparound", () => {
    const d = new RingDeque<number>(2);
    d.pushBack(1);
    d.pushBack(2);
    expect(d.popFront()).toBe(1);
    d.pushBack(3);
    d.pushBack(4);
    d.pushBack(5);
    expect(d.size).toBe(4);
    expect(Array.from(d)).toEqual([2, 3, 4, 5]);
    expect(d.peekFront()).toBe(2);
  });

  it("iterates falsy items", () => {
    const d = new RingDeque<number>(1);
    d.pushBack(0);
    d.pushBack(0);
    expect(Array.from(d)).toEqual([0, 0]);
    expect(Array.from(d)).toHaveLength(d.size);
  });

  it("returns undefined when empty", () => {
    const d = new RingDeque<number>();
    expect(d.popFront()).toBeUndefined();
    expect(d.peekFront()).toBeUndefined();
    d.pushBack(7);
    d.clear();
    expect(d.size).toBe(0);
    expect(Array.from(d)).toEqual([]);
  });
});
