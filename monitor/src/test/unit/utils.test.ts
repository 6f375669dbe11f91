/**
 * Tests for async helpers and small data structures
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { BoundedBuffer } from "../../utils/BoundedBuffer.js";
import { KeyedSerialQueue } from "../../utils/KeyedSerialQueue.js";
import { TimeoutError, backoffDelay, errorMessage, jitter, sleep, withTimeout } from "../../utils/async.js";

describe("BoundedBuffer", () => {
  it("should keep items in FIFO order", () => {
    const buffer = new BoundedBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.peek()).toBe(1);
    expect(buffer.shift()).toBe(1);
    expect(buffer.toArray()).toEqual([2]);
  });

  it("should drop the oldest item when full", () => {
    const buffer = new BoundedBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.push(3)).toBe(1);
    expect(buffer.toArray()).toEqual([2, 3]);
    expect(buffer.droppedCount).toBe(1);
    expect(buffer.size).toBe(2);
  });

  it("should reject an invalid capacity", () => {
    expect(() => new BoundedBuffer(0)).toThrow(RangeError);
    expect(() => new BoundedBuffer(1.5)).toThrow(RangeError);
  });
});

describe("KeyedSerialQueue", () => {
  it("should run tasks for one key in submission order", async () => {
    const queue = new KeyedSerialQueue();
    const order: string[] = [];
    let releaseFirst = (): void => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = queue.run("redis", async () => {
      await gate;
      order.push("first");
    });
    const second = queue.run("redis", async () => {
      order.push("second");
    });
    const other = queue.run("vpn", async () => {
      order.push("other");
    });

    await other;
    expect(order).toEqual(["other"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["other", "first", "second"]);
  });

  it("should keep the chain going after a failed task", async () => {
    const queue = new KeyedSerialQueue();

    const failing = queue.run("redis", async () => {
      throw new Error("boom");
    });
    const next = queue.run("redis", async () => "ran");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ran");
    await queue.drain();
    expect(queue.pendingKeys).toBe(0);
  });
});

describe("async helpers", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should double the backoff up to the cap", () => {
    expect([1, 2, 3, 4, 5, 6].map((n) => backoffDelay(n, 1000, 10000))).toEqual([
      1000, 2000, 4000, 8000, 10000, 10000,
    ]);
  });

  it("should keep jitter within the spread", () => {
    expect(jitter(100, () => 0)).toBe(0);
    expect(jitter(100, () => 0.999)).toBe(99);
    expect(jitter(0, () => 0.5)).toBe(0);
  });

  it("should reject with a TimeoutError when the budget runs out", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 500, "redis ping");
    const assertion = expect(pending).rejects.toThrow(new TimeoutError("redis ping", 500));

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it("should resolve sleep early with false on abort", async () => {
    const controller = new AbortController();
    const slept = sleep(60000, controller.signal);
    controller.abort();

    await expect(slept).resolves.toBe(false);
    await expect(sleep(1)).resolves.toBe(true);
  });

  it("should describe unknown thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("Unknown error");
  });
});
