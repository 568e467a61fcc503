import { describe, it, expect } from "vitest";
import { AsyncQueue } from "@src/shared/asyncQueue.js";

interface Item {
  id: number;
}

describe("AsyncQueue", () => {
  it("yields buffered values in push order and completes after end()", async () => {
    const queue = new AsyncQueue<Item>();
    queue.push({ id: 1 });
    queue.push({ id: 2 });
    queue.end();

    const seen: number[] = [];
    for await (const item of queue) seen.push(item.id);

    expect(seen).toEqual([1, 2]);
  });

  it("resolves a waiting consumer on push", async () => {
    const queue = new AsyncQueue<Item>();
    const pending = queue.next();

    queue.push({ id: 7 });

    await expect(pending).resolves.toEqual({ value: { id: 7 }, done: false });
  });

  it("refuses values after end()", () => {
    const queue = new AsyncQueue<Item>();
    queue.end();

    expect(queue.push({ id: 1 })).toBe(false);
    expect(queue.isEnded).toBe(true);
  });

  it("delivers buffered values before surfacing a failure once", async () => {
    const queue = new AsyncQueue<Item>();
    queue.push({ id: 1 });
    queue.fail(new Error("stream broke"));

    await expect(queue.next()).resolves.toEqual({ value: { id: 1 }, done: false });
    await expect(queue.next()).rejects.toThrow("stream broke");
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it("rejects a waiting consumer when the queue fails", async () => {
    const queue = new AsyncQueue<Item>();
    const pending = queue.next();

    queue.fail(new Error("engine gone"));

    await expect(pending).rejects.toThrow("engine gone");
  });

  it("ends and drops the buffer when the consumer breaks out", async () => {
    const queue = new AsyncQueue<Item>();
    queue.push({ id: 1 });
    queue.push({ id: 2 });

    for await (const item of queue) {
      if (item.id === 1) break;
    }

    expect(queue.isEnded).toBe(true);
    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });
});
