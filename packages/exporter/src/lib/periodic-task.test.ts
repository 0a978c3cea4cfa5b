import { describe, it, expect, vi, afterEach } from "vitest";
import { MAX_TIMER_MS, PeriodicTask } from "./periodic-task.js";
import { createTestLogger } from "../test/helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Poll until a condition is met */
async function waitFor(fn: () => void, timeout = 500): Promise<void> {
  const start = Date.now();
  while (true) {
    try {
      fn();
      return;
    } catch {
      if (Date.now() - start > timeout) throw new Error("waitFor timed out");
      await new Promise((r) => setTimeout(r, 20));
    }
  }
}

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let task: PeriodicTask | undefined;

afterEach(() => {
  task?.stop();
  task = undefined;
});

describe("PeriodicTask", () => {
  it.each([0, -1, 1004.9999999999999, MAX_TIMER_MS + 1, 2_592_000_000])(
    "rejects an interval of %d ms",
    (intervalMs) => {
      const { logger } = createTestLogger();
      expect(() => new PeriodicTask(() => {}, { name: "fetch", intervalMs, logger })).toThrow(
        RangeError,
      );
    },
  );

  it("accepts the timer limit", () => {
    const { logger } = createTestLogger();
    task = new PeriodicTask(() => {}, { name: "fetch", intervalMs: MAX_TIMER_MS, logger });
    expect(task.intervalMs).toBe(MAX_TIMER_MS);
  });

  it("starts and stops the loop", () => {
    const { logger } = createTestLogger();
    task = new PeriodicTask(() => {}, { name: "test", intervalMs: 1_000, logger });

    expect(task.isRunning).toBe(false);
    task.start();
    expect(task.isRunning).toBe(true);
    task.stop();
    expect(task.isRunning).toBe(false);
  });

  it("runs a tick immediately on start", () => {
    const { logger } = createTestLogger();
    const tick = vi.fn();
    task = new PeriodicTask(tick, { name: "test", intervalMs: 60_000, logger });

    task.start();
    expect(tick).toHaveBeenCalledTimes(1);
  });

  it("does not start twice", () => {
    const { logger } = createTestLogger();
    const tick = vi.fn();
    task = new PeriodicTask(tick, { name: "test", intervalMs: 60_000, logger });

    task.start();
    task.start(); // no-op
    expect(tick).toHaveBeenCalledTimes(1);
    expect(task.isRunning).toBe(true);
  });

  it("keeps ticking on its interval", async () => {
    const { logger } = createTestLogger();
    const tick = vi.fn();
    task = new PeriodicTask(tick, { name: "test", intervalMs: 20, logger });

    task.start();
    await waitFor(() => {
      expect(tick.mock.calls.length).toBeGreaterThanOrEqual(3);
    });
  });

  it("skips a tick while the previous one is still in flight", async () => {
    const { logger } = createTestLogger();
    const gate = deferred();
    const tick = vi.fn(() => gate.promise);
    task = new PeriodicTask(tick, { name: "test", intervalMs: 60_000, logger });

    const first = task.run();
    const second = task.run();
    expect(second).toBe(first);
    expect(tick).toHaveBeenCalledTimes(1);

    gate.resolve();
    await first;

    await task.run();
    expect(tick).toHaveBeenCalledTimes(2);
  });

  it("logs a failing tick and keeps going", async () => {
    const { logger, error } = createTestLogger();
    const tick = vi
      .fn()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValue(undefined);
    task = new PeriodicTask(tick, { name: "fetch", intervalMs: 60_000, logger });

    await expect(task.run()).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ task: "fetch", err: expect.any(Error) }),
      "periodic task tick failed",
    );

    await task.run();
    expect(tick).toHaveBeenCalledTimes(2);
  });

  it("recovers from a tick that throws synchronously", async () => {
    const { logger, error } = createTestLogger();
    const tick = vi.fn(() => {
      throw new Error("sync boom");
    });
    task = new PeriodicTask(tick, { name: "update", intervalMs: 60_000, logger });

    await task.run();
    await task.run();
    expect(tick).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledTimes(2);
  });
});
