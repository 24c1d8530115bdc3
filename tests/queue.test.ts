import { describe, it, expect } from "vitest";
import { BoundedQueue } from "../src/core/queue";
import { flush } from "./helpers";

describe("BoundedQueue", () => {
  it("hands items out in FIFO order", async () => {
    const q = new BoundedQueue<number>(3);
    await q.push(1);
    await q.push(2);
    await q.push(3);
    expect([await q.pop(), await q.pop(), await q.pop()]).toEqual([1, 2, 3]);
  });

  it("blocks the third push at capacity 2 until a consumer pops", async () => {
    const q = new BoundedQueue<string>(2);
    expect(await q.push("a")).toBe(true);
    expect(await q.push("b")).toBe(true);

    let settled = false;
    const third = q.push("c").then((accepted) => {
      settled = true;
      return accepted;
    });
    await flush();

    expect(settled).toBe(false);
    expect(q.size).toBe(2);
    expect(q.blockedProducers).toBe(1);

    expect(await q.pop()).toBe("a");
    expect(await third).toBe(true);
    expect(q.size).toBe(2);
    expect(await q.pop()).toBe("b");
    expect(await q.pop()).toBe("c");
  });

  it("tryPush rejects instead of blocking when full", () => {
    const q = new BoundedQueue<number>(2);
    expect(q.tryPush(1)).toBe(true);
    expect(q.tryPush(2)).toBe(true);
    expect(q.tryPush(3)).toBe(false);
    expect(q.size).toBe(2);
  });

  it("wakes a waiting consumer on push", async () => {
    const q = new BoundedQueue<number>(1);
    const popped = q.pop();
    await flush();
    await q.push(42);
    expect(await popped).toBe(42);
    expect(q.size).toBe(0);
  });

  it("close releases blocked producers and idle consumers", async () => {
    const full = new BoundedQueue<number>(1);
    await full.push(1);
    const blocked = full.push(2);
    full.close();
    expect(await blocked).toBe(false);
    expect(await full.push(3)).toBe(false);
    // what was queued before close is still delivered
    expect(await full.pop()).toBe(1);
    expect(await full.pop()).toBeUndefined();

    const empty = new BoundedQueue<number>(1);
    const waiting = empty.pop();
    empty.close();
    expect(await waiting).toBeUndefined();
  });

  it("drain removes pending items, including blocked producers' items", async () => {
    const q = new BoundedQueue<number>(1);
    await q.push(1);
    const blocked = q.push(2);
    expect(q.drain()).toEqual([1, 2]);
    expect(await blocked).toBe(true);
    expect(q.size).toBe(0);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});
