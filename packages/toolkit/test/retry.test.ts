import { describe, expect, it, vi } from "vitest";

import { RetryExhaustedError } from "../src/errors";
import { attempt, withTimeout } from "../src/retry";

describe("attempt", () => {
  it("returns the first successful result and waits between attempts", async () => {
    const sleep = vi.fn(async () => undefined);
    const fn = vi
      .fn<(index: number) => string>()
      .mockImplementationOnce(() => {
        throw new Error("flaky");
      })
      .mockImplementationOnce(() => "ok");

    const result = await attempt(5, fn, { delayMs: 250, sleep });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("wraps the last error once every attempt failed", async () => {
    const errors: number[] = [];
    const fn = vi.fn(async (index: number) => {
      throw new Error(`failure ${index}`);
    });

    const promise = attempt(3, fn, {
      sleep: async () => undefined,
      delayMs: 10,
      onError: (_, index) => errors.push(index)
    });

    await expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(promise).rejects.toThrow("gave up after 3 attempts: failure 3");
    expect(errors).toEqual([1, 2, 3]);
  });

  it("accepts synchronous functions", async () => {
    await expect(attempt(1, () => 42)).resolves.toBe(42);
  });
});

describe("withTimeout", () => {
  it("aborts the signal when the deadline passes", async () => {
    vi.useFakeTimers();
    try {
      let aborted = false;
      const promise = withTimeout(1_000, (signal) =>
        new Promise<string>(() => {
          signal.addEventListener("abort", () => {
            aborted = true;
          });
        })
      );
      const assertion = expect(promise).rejects.toThrow("timed out after 1000ms");

      await vi.advanceTimersByTimeAsync(1_000);

      await assertion;
      expect(aborted).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it("resolves with the inner value before the deadline", async () => {
    await expect(withTimeout(1_000, async () => "done")).resolves.toBe("done");
  });
});
