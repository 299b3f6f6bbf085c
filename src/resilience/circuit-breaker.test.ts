import { describe, it, expect, vi } from "vitest";
import { CircuitBreaker } from "./circuit-breaker.ts";
import { INITIAL_STATE, admit, onFailure, onSuccess } from "./circuit-breaker-state.ts";
import { CircuitOpenError } from "../errors.ts";
import type { Logger } from "../logger.ts";

const quiet: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
const settings = { failureThreshold: 3, recoveryTimeoutMs: 1000 };

describe("circuit state transitions", () => {
  it("opens at the threshold", () => {
    let state = INITIAL_STATE;
    state = onFailure(state, settings, 0);
    state = onFailure(state, settings, 0);
    expect(state).toEqual({ kind: "closed", failures: 2 });
    expect(onFailure(state, settings, 50)).toEqual({ kind: "open", openedAt: 50 });
  });

  it("admits a single probe after the recovery timeout", () => {
    const open = { kind: "open", openedAt: 100 } as const;
    expect(admit(open, settings, 1099).allowed).toBe(false);

    const probe = admit(open, settings, 1100);
    expect(probe).toEqual({ allowed: true, state: { kind: "halfOpen", probeInFlight: true } });
    expect(admit(probe.state, settings, 1100).allowed).toBe(false);
  });

  it("closes on success and reopens on a failed probe", () => {
    const halfOpen = { kind: "halfOpen", probeInFlight: true } as const;
    expect(onSuccess(halfOpen)).toEqual(INITIAL_STATE);
    expect(onFailure(halfOpen, settings, 7)).toEqual({ kind: "open", openedAt: 7 });
  });
});

describe("CircuitBreaker", () => {
  const fail = () => Promise.reject(new Error("connection refused"));

  function breakerAt(clock: { t: number }) {
    return new CircuitBreaker({ ...settings, name: "quotes", now: () => clock.t, logger: quiet });
  }

  it("fails fast while open", async () => {
    const clock = { t: 0 };
    const breaker = breakerAt(clock);
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow("connection refused");
    }
    expect(breaker.state).toBe("open");

    const operation = vi.fn(() => Promise.resolve(1));
    await expect(breaker.execute(operation)).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(breaker.execute(operation)).rejects.toThrow("Circuit breaker 'quotes' is open");
    expect(operation).not.toHaveBeenCalled();
  });

  it("recovers through a successful probe", async () => {
    const clock = { t: 0 };
    const breaker = breakerAt(clock);
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }

    clock.t = 1000;
    await expect(breaker.execute(() => Promise.resolve("quote"))).resolves.toBe("quote");
    expect(breaker.state).toBe("closed");
  });

  it("reopens when the probe fails", async () => {
    const clock = { t: 0 };
    const breaker = breakerAt(clock);
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }

    clock.t = 1500;
    await expect(breaker.execute(fail)).rejects.toThrow("connection refused");
    expect(breaker.state).toBe("open");

    clock.t = 2400;
    await expect(breaker.execute(fail)).rejects.toBeInstanceOf(CircuitOpenError);
  });

  it("rejects concurrent calls while a probe is running", async () => {
    const clock = { t: 0 };
    const breaker = breakerAt(clock);
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }
    clock.t = 1000;

    let finish: (value: string) => void = () => {};
    const probe = breaker.execute(
      () => new Promise<string>((resolve) => { finish = resolve; })
    );
    await expect(breaker.execute(() => Promise.resolve("x"))).rejects.toBeInstanceOf(
      CircuitOpenError
    );

    finish("done");
    await expect(probe).resolves.toBe("done");
    expect(breaker.state).toBe("closed");
  });

  it("ignores failures that are not trippable", async () => {
    const breaker = new CircuitBreaker({
      ...settings,
      isTrippable: () => false,
      logger: quiet,
    });
    for (let i = 0; i < 5; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }
    expect(breaker.state).toBe("closed");
  });

  it("resets to closed", async () => {
    const breaker = breakerAt({ t: 0 });
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow();
    }
    breaker.reset();
    expect(breaker.state).toBe("closed");
  });
});
