import { CircuitOpenError } from "../errors.ts";
import { createLogger, type Logger } from "../logger.ts";
import {
  INITIAL_STATE,
  admit,
  onFailure,
  onSuccess,
  type CircuitSettings,
  type CircuitState,
} from "./circuit-breaker-state.ts";

export interface CircuitBreakerOptions extends Partial<CircuitSettings> {
  name?: string;
  now?: () => number;
  /** Failures that should not count toward opening the circuit. */
  isTrippable?: (error: unknown) => boolean;
  logger?: Logger;
}

export class CircuitBreaker {
  readonly name: string;
  private readonly settings: CircuitSettings;
  private readonly now: () => number;
  private readonly isTrippable: (error: unknown) => boolean;
  private readonly logger: Logger;
  private current: CircuitState = INITIAL_STATE;

  constructor(options: CircuitBreakerOptions = {}) {
    this.name = options.name ?? "default";
    this.settings = {
      failureThreshold: options.failureThreshold ?? 5,
      recoveryTimeoutMs: options.recoveryTimeoutMs ?? 60_000,
    };
    this.now = options.now ?? Date.now;
    this.isTrippable = options.isTrippable ?? (() => true);
    this.logger = options.logger ?? createLogger("circuit");
  }

  get state(): CircuitState["kind"] {
    return this.current.kind;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const admission = admit(this.current, this.settings, this.now());
    this.transition(admission.state);
    if (!admission.allowed) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await operation();
      this.transition(onSuccess(this.current));
      return result;
    } catch (error) {
      if (this.isTrippable(error) || this.current.kind === "halfOpen") {
        this.transition(onFailure(this.current, this.settings, this.now()));
      }
      throw error;
    }
  }

  reset(): void {
    this.transition(INITIAL_STATE);
  }

  private transition(next: CircuitState): void {
    if (next.kind !== this.current.kind) {
      this.logger.info(`Circuit '${this.name}' ${this.current.kind} -> ${next.kind}`);
    }
    this.current = next;
  }
}
