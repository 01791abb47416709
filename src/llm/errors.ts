import type { ZodIssue } from "zod";

export class LLMError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A request config value is outside its declared bound or has the wrong type.
 * Thrown when a config is constructed or merged; never retried.
 */
export class ValidationError extends LLMError {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(message);
  }
}

/** The remote call failed. `attempts` counts the transport invocations made. */
export class ProviderError extends LLMError {
  constructor(
    message: string,
    cause: unknown,
    public readonly attempts: number
  ) {
    super(message, cause);
  }
}

export class TransientProviderError extends ProviderError {}

export class FatalProviderError extends ProviderError {}

/** Non-2xx answer from the provider's HTTP endpoint. */
export class TransportHttpError extends LLMError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(`provider responded ${status}: ${truncate(body, 500)}`);
  }
}

/** The provider did not answer within the transport's timeout. Retryable. */
export class TransportTimeoutError extends LLMError {
  constructor(public readonly timeoutMs: number) {
    super(`no response within ${timeoutMs} ms`);
  }
}

function truncate(text: string, max: number) {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
