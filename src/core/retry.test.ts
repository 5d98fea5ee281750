import { describe, expect, it } from "vitest";
import { err, ok, Result } from "./result";
import { backoffDelay, RetryPolicy, retryResult } from "./retry";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 10, multiplier: 2, maxDelayMs: 1_000, jitter: 0 };

describe("backoffDelay", () => {
  const jittered: RetryPolicy = { maxAttempts: 5, baseDelayMs: 1_000, multiplier: 2, maxDelayMs: 5_000, jitter: 0.5 };

  it("grows exponentially and stays under the cap", () => {
    expect(backoffDelay(jittered, 1, () => 0)).toBe(1_000);
    expect(backoffDelay(jittered, 2, () => 1)).toBe(3_000);
    expect(backoffDelay(jittered, 3, () => 0)).toBe(4_000);
    expect(backoffDelay(jittered, 4, () => 0)).toBe(5_000);
  });
});

describe("retryResult", () => {
  it("gives up after the last attempt", async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await retryResult(
      policy,
      async (): Promise<Result<number, string>> => {
        calls += 1;
        return err("down");
      },
      { isRetryable: () => true, sleep: async (ms) => void delays.push(ms), random: () => 0 },
    );

    expect(result).toEqual({ ok: false, error: "down" });
    expect(calls).toBe(3);
    expect(delays).toEqual([10, 20]);
  });

  it("returns the first success", async () => {
    const result = await retryResult(
      policy,
      async (attempt): Promise<Result<number, string>> => (attempt < 2 ? err("down") : ok(attempt)),
      { isRetryable: () => true, sleep: async () => {} },
    );
    expect(result).toEqual({ ok: true, value: 2 });
  });

  it("stops at an error that is not retryable", async () => {
    let calls = 0;
    await retryResult(
      policy,
      async (): Promise<Result<number, string>> => {
        calls += 1;
        return err("gone");
      },
      { isRetryable: (error) => error !== "gone", sleep: async () => {} },
    );
    expect(calls).toBe(1);
  });

  it("stops when asked to", async () => {
    let calls = 0;
    await retryResult(
      policy,
      async (): Promise<Result<number, string>> => {
        calls += 1;
        return err("down");
      },
      { isRetryable: () => true, sleep: async () => {}, shouldStop: () => true },
    );
    expect(calls).toBe(1);
  });
});
