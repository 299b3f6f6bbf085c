// Pure transitions for the circuit breaker. No clocks or timers here: the
// caller passes `now` in, which keeps every transition testable.

export type CircuitState =
  | { kind: "closed"; failures: number }
  | { kind: "open"; openedAt: number }
  | { kind: "halfOpen"; probeInFlight: boolean };

export interface CircuitSettings {
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export const INITIAL_STATE: CircuitState = { kind: "closed", failures: 0 };

export type Admission =
  | { allowed: true; state: CircuitState }
  | { allowed: false; state: CircuitState };

/** Decides whether a call may run now, moving open → halfOpen when due. */
export function admit(
  state: CircuitState,
  settings: CircuitSettings,
  now: number
): Admission {
  switch (state.kind) {
    case "closed":
      return { allowed: true, state };
    case "open":
      if (now - state.openedAt >= settings.recoveryTimeoutMs) {
        return { allowed: true, state: { kind: "halfOpen", probeInFlight: true } };
      }
      return { allowed: false, state };
    case "halfOpen":
      if (state.probeInFlight) return { allowed: false, state };
      return { allowed: true, state: { kind: "halfOpen", probeInFlight: true } };
  }
}

export function onSuccess(state: CircuitState): CircuitState {
  if (state.kind === "closed" && state.failures === 0) return state;
  return INITIAL_STATE;
}

export function onFailure(
  state: CircuitState,
  settings: CircuitSettings,
  now: number
): CircuitState {
  switch (state.kind) {
    case "closed": {
      const failures = state.failures + 1;
      return failures >= settings.failureThreshold
        ? { kind: "open", openedAt: now }
        : { kind: "closed", failures };
    }
    case "halfOpen":
      return { kind: "open", openedAt: now };
    case "open":
      return state;
  }
}
