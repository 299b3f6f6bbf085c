import { describe, it, expect, vi } from "vitest";
import { RetryPolicy, backoffDelay, DEFAULT_RETRY_OPTIONS, type Sleep } from "./retry.ts";
import { ErrorTracker } from "./error-tracker.ts";
import { InvalidSymbolError } from "../errors.ts";
import type { Logger } from "../logger.ts";

const quiet: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function failing(times: number, error: () => unknown = () => new Error("connection reset")) {
  let calls = 0;
  const operation = vi.fn(async () => {
    calls++;
    if (calls <= times) throw error();
    return "ok";
  });
  return operation;
}

describe("backoffDelay", () => {
  it("grows exponentially up to the cap", () => {
    const options = { ...DEFAULT_RETRY_OPTIONS, maxDelayMs: 5000 };
    expect([0, 1, 2, 3, 4].map((a) => backoffDelay(options, a))).toEqual([
      1000, 2000, 4000, 5000, 5000,
    ]);
  });
});

describe("RetryPolicy", () => {
  it("recovers after transient failures and records each one", async () => {
    const errors = new ErrorTracker({ logger: quiet });
    const sleep = vi.fn<Sleep>(() => Promise.resolve());
    const policy = new RetryPolicy({ maxRetries: 3 }, { errors, sleep });
    const operation = failing(3);

    await expect(policy.execute(operation, { operation: "fetch" })).resolves.toBe("ok");

    expect(operation).toHaveBeenCalledTimes(4);
    const recorded = errors.getErrors();
    expect(recorded).toHaveLength(3);
    expect(recorded.map((e) => e.retryCount)).toEqual([0, 1, 2]);
    expect(recorded.map((e) => e.severity)).toEqual(["medium", "medium", "medium"]);
    expect(recorded[0]?.category).toBe("network");
    expect(recorded[0]?.context).toEqual({ operation: "fetch", attempt: 1, maxAttempts: 4 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  it("rethrows the last error once attempts run out", async () => {
    const errors = new ErrorTracker({ logger: quiet });
    const policy = new RetryPolicy(
      { maxRetries: 3 },
      { errors, sleep: () => Promise.resolve() }
    );
    const operation = failing(10);

    await expect(policy.execute(operation, { operation: "fetch" })).rejects.toThrow(
      "connection reset"
    );
    expect(operation).toHaveBeenCalledTimes(4);
    expect(errors.getErrors()).toHaveLength(4);
    expect(errors.getErrors()[3]?.severity).toBe("high");
  });

  it("does not retry invalid input", async () => {
    const errors = new ErrorTracker({ logger: quiet });
    const sleep = vi.fn<Sleep>(() => Promise.resolve());
    const policy = new RetryPolicy({}, { errors, sleep });
    const operation = failing(1, () => new InvalidSymbolError("??"));

    await expect(policy.execute(operation, { operation: "scrape" })).rejects.toBeInstanceOf(
      InvalidSymbolError
    );
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(errors.getErrors()[0]?.severity).toBe("high");
  });

  it("stops retrying once the signal aborts", async () => {
    const errors = new ErrorTracker({ logger: quiet });
    const controller = new AbortController();
    const policy = new RetryPolicy(
      { maxRetries: 3 },
      { errors, sleep: () => Promise.resolve() }
    );
    const operation = vi.fn(async () => {
      controller.abort();
      throw new Error("timeout");
    });

    await expect(
      policy.execute(operation, { operation: "fetch", signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
