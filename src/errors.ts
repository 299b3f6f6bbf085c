// Error types raised across the scraping pipeline. Expected absence of a
// field is never an error; these are for failures a caller must see.

/** Bad caller input. Never retried. */
export class InputValidationError extends Error {
  override name = "InputValidationError";
}

export class InvalidSymbolError extends InputValidationError {
  override name = "InvalidSymbolError";

  constructor(readonly symbol: string) {
    super(`Invalid stock symbol: ${symbol || "(empty)"}`);
  }
}

export class DocumentFetchError extends Error {
  override name = "DocumentFetchError";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class CircuitOpenError extends Error {
  override name = "CircuitOpenError";

  constructor(readonly circuit: string) {
    super(`Circuit breaker '${circuit}' is open`);
  }
}

export class AiServiceError extends Error {
  override name = "AiServiceError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
