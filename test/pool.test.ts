import { afterEach, describe, expect, it, vi } from "vitest";

import { startHeartbeat, withHeartbeat } from "../src/commands/heartbeat.js";
import { runPool } from "../src/commands/pool.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("runPool", () => {
  it("keeps at most limit workers in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const done: number[] = [];

    await runPool(Array.from({ length: 10 }, (_, i) => i), 3, async (item) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
      done.push(item);
    });

    expect(peak).toBe(3);
    expect(done.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("stops starting items after the first failure", async () => {
    const started: number[] = [];
    const failure = new Error("plot 2 failed");

    await expect(
      runPool([1, 2, 3], 1, async (item) => {
        started.push(item);
        if (item === 2) {
          throw failure;
        }
      })
    ).rejects.toBe(failure);
    expect(started).toEqual([1, 2]);
  });

  it("aborts the shared signal for running siblings", async () => {
    let siblingSawAbort = false;

    await expect(
      runPool(["slow", "fails"], 2, async (item, signal) => {
        if (item === "fails") {
          throw new Error("boom");
        }
        await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
        siblingSawAbort = signal.aborted;
      })
    ).rejects.toThrow("boom");
    expect(siblingSawAbort).toBe(true);
  });

  it("runs nothing once the parent signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const worker = vi.fn(async () => {});

    await expect(runPool([1, 2], 2, worker, controller.signal)).rejects.toMatchObject({ name: "AbortError" });
    expect(worker).not.toHaveBeenCalled();
  });

  it("completes an empty batch", async () => {
    await expect(runPool([], 6, async () => {})).resolves.toBeUndefined();
  });
});

describe("heartbeat", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks with the elapsed time until stopped", () => {
    vi.useFakeTimers();
    const onTick = vi.fn();
    const heartbeat = startHeartbeat(1000, onTick);

    vi.advanceTimersByTime(3000);
    heartbeat.stop();
    vi.advanceTimersByTime(3000);

    expect(onTick.mock.calls).toEqual([[1000], [2000], [3000]]);
  });

  it("stops when the wrapped work fails", async () => {
    vi.useFakeTimers();
    const onTick = vi.fn();

    await expect(
      withHeartbeat(1000, onTick, async () => {
        vi.advanceTimersByTime(2500);
        throw new Error("query failed");
      })
    ).rejects.toThrow("query failed");

    vi.advanceTimersByTime(5000);
    expect(onTick).toHaveBeenCalledTimes(2);
  });
});
