import { setTimeout as delay } from "node:timers/promises";
import { InputValidationError } from "../errors.ts";
import { categorizeError } from "./classify.ts";
import type { ErrorSink } from "../types/index.ts";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 60_000,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryDependencies {
  errors: ErrorSink;
  sleep?: Sleep;
  isRetriable?: (error: unknown) => boolean;
}

export interface RetryContext {
  operation: string;
  signal?: AbortSignal;
  [key: string]: unknown;
}

const notInputError = (error: unknown): boolean =>
  !(error instanceof InputValidationError);

/** Delay before re-attempt `attempt` (0-based). */
export function backoffDelay(options: RetryOptions, attempt: number): number {
  return Math.min(
    options.baseDelayMs * options.backoffFactor ** attempt,
    options.maxDelayMs
  );
}

/**
 * Runs an async operation up to `maxRetries + 1` times with exponential
 * backoff. Every failed attempt is recorded in the error sink; the last
 * failure is rethrown.
 */
export class RetryPolicy {
  readonly options: RetryOptions;
  private readonly errors: ErrorSink;
  private readonly sleep: Sleep;
  private readonly isRetriable: (error: unknown) => boolean;

  constructor(options: Partial<RetryOptions>, deps: RetryDependencies) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    this.errors = deps.errors;
    this.sleep = deps.sleep ?? sleep;
    this.isRetriable = deps.isRetriable ?? notInputError;
  }

  async execute<T>(operation: () => Promise<T>, context: RetryContext): Promise<T> {
    const { signal, ...details } = context;
    const attempts = this.options.maxRetries + 1;

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const retriable = this.isRetriable(error);
        const last = attempt + 1 >= attempts || !retriable;

        this.errors.record(
          error,
          categorizeError(error),
          last ? "high" : "medium",
          { ...details, attempt: attempt + 1, maxAttempts: attempts },
          attempt
        );

        if (last) throw error;
        signal?.throwIfAborted();
        await this.sleep(backoffDelay(this.options, attempt), signal);
      }
    }
  }
}
