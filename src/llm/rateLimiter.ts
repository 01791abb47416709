function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export interface RateLimiterOptions {
  /** Requests per rolling minute. */
  rpm?: number;
  /** Tokens per rolling minute, counted as each request's `max_tokens`. */
  tpm?: number;
}

const WINDOW_MS = 60_000;

/**
 * Sliding one-minute window shared by every call made through a client.
 * `schedule` waits until both budgets have room, then runs the task.
 */
export class RateLimiter {
  private readonly requestTimes: number[] = [];
  private readonly tokenHistory: Array<{ timestamp: number; tokens: number }> = [];

  constructor(
    private readonly options: RateLimiterOptions,
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  private prune(now: number) {
    const windowStart = now - WINDOW_MS;
    while (this.requestTimes.length && this.requestTimes[0] <= windowStart) {
      this.requestTimes.shift();
    }
    while (this.tokenHistory.length && this.tokenHistory[0].timestamp <= windowStart) {
      this.tokenHistory.shift();
    }
  }

  private totalTokens() {
    return this.tokenHistory.reduce((sum, entry) => sum + entry.tokens, 0);
  }

  /** Milliseconds until a request of `tokens` fits, 0 when it fits now. */
  delayFor(tokens: number): number {
    const { rpm, tpm } = this.options;
    const now = this.now();
    this.prune(now);
    const rpmOk = !rpm || this.requestTimes.length < rpm;
    // a single request larger than the budget runs alone once the window is empty
    const tpmOk = !tpm || this.tokenHistory.length === 0 || this.totalTokens() + tokens <= tpm;
    if (rpmOk && tpmOk) {
      return 0;
    }
    const candidates: number[] = [];
    if (!rpmOk) candidates.push(this.requestTimes[0] + WINDOW_MS);
    if (!tpmOk) candidates.push(this.tokenHistory[0].timestamp + WINDOW_MS);
    return Math.max(Math.max(...candidates) - now, 50);
  }

  async schedule<T>(tokens: number, fn: () => Promise<T>): Promise<T> {
    if (this.options.rpm || this.options.tpm) {
      for (let delay = this.delayFor(tokens); delay > 0; delay = this.delayFor(tokens)) {
        await this.wait(delay);
      }
      const now = this.now();
      this.requestTimes.push(now);
      if (this.options.tpm) {
        this.tokenHistory.push({ timestamp: now, tokens });
      }
    }
    return fn();
  }
}
