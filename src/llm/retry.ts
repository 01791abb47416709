import { TransportHttpError, TransportTimeoutError } from "./errors";
import { logger } from "../utils/logger";

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Backoff floor; the first retry waits this long. */
  minDelayMs: number;
  /** Backoff ceiling per attempt. */
  maxDelayMs: number;
}

export interface RetryPolicyOptions extends Partial<RetryOptions> {
  sleep?: (ms: number) => Promise<void>;
  classify?: (error: unknown) => ErrorClassification;
}

export interface ErrorClassification {
  retryable: boolean;
  retryAfterSeconds?: number;
}

export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = Object.freeze({
  maxAttempts: 3,
  minDelayMs: 4_000,
  maxDelayMs: 10_000,
});

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded exponential backoff around one async attempt. Only errors that
 * classify as retryable are retried; anything else fails on the spot. When
 * attempts run out the last error is rethrown as it was.
 */
export class RetryPolicy {
  readonly options: Readonly<RetryOptions>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly classify: (error: unknown) => ErrorClassification;

  constructor(options: RetryPolicyOptions = {}) {
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts));
    const minDelayMs = Math.max(0, options.minDelayMs ?? DEFAULT_RETRY_OPTIONS.minDelayMs);
    const maxDelayMs = Math.max(minDelayMs, options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs);
    this.options = Object.freeze({ maxAttempts, minDelayMs, maxDelayMs });
    this.sleep = options.sleep ?? sleep;
    this.classify = options.classify ?? classifyError;
  }

  /** Wait before retry number `retry` (1-based): floor, doubling, capped at the ceiling. */
  delayFor(retry: number, retryAfterSeconds?: number): number {
    const { minDelayMs, maxDelayMs } = this.options;
    if (retryAfterSeconds !== undefined && Number.isFinite(retryAfterSeconds)) {
      return Math.min(maxDelayMs, Math.max(minDelayMs, retryAfterSeconds * 1_000));
    }
    return Math.min(maxDelayMs, Math.max(minDelayMs, minDelayMs * Math.pow(2, retry - 1)));
  }

  isRetryable(error: unknown): boolean {
    return this.classify(error).retryable;
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, context = "request"): Promise<T> {
    const { maxAttempts } = this.options;
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await fn(attempt);
      } catch (error) {
        const { retryable, retryAfterSeconds } = this.classify(error);
        if (!retryable || attempt >= maxAttempts) {
          throw error;
        }
        const delayMs = this.delayFor(attempt, retryAfterSeconds);
        logger.warn(`${context} failed, retrying`, {
          attempt,
          maxAttempts,
          delayMs,
          error,
        });
        await this.sleep(delayMs);
      }
    }
  }
}

export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof TransportHttpError) {
    return {
      retryable: isRetryableStatus(error.status),
      retryAfterSeconds: error.retryAfterSeconds,
    };
  }
  if (error instanceof TransportTimeoutError) {
    return { retryable: true };
  }
  if (!(error instanceof Error)) {
    return { retryable: false };
  }
  if (readProperty(error, "retryable") === true) {
    return { retryable: true };
  }
  const status = readProperty(error, "status");
  if (typeof status === "number") {
    return { retryable: isRetryableStatus(status) };
  }
  return { retryable: isNetworkFailure(error) };
}

export function isRetryableStatus(status: number) {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function isNetworkFailure(error: Error): boolean {
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return true;
  }
  const code = readProperty(error, "code");
  if (typeof code === "string" && NETWORK_CODES.has(code)) {
    return true;
  }
  // undici reports connection problems as `TypeError: fetch failed` with the socket error as cause
  if (error.message === "fetch failed") {
    return true;
  }
  const cause = readProperty(error, "cause");
  return cause instanceof Error && cause !== error && isNetworkFailure(cause);
}

function readProperty(target: object, key: string): unknown {
  return Reflect.get(target, key);
}
