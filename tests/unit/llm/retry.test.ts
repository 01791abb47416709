import { TransportHttpError, TransportTimeoutError } from "../../../src/llm/errors";
import { RetryPolicy, classifyError } from "../../../src/llm/retry";

describe("RetryPolicy", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("backs off from the floor, doubling up to the ceiling", () => {
    const policy = new RetryPolicy();

    expect([1, 2, 3, 4].map((retry) => policy.delayFor(retry))).toEqual([4_000, 8_000, 10_000, 10_000]);
  });

  it("honours Retry-After within the same bounds", () => {
    const policy = new RetryPolicy();

    expect(policy.delayFor(1, 6)).toBe(6_000);
    expect(policy.delayFor(1, 1)).toBe(4_000);
    expect(policy.delayFor(1, 30)).toBe(10_000);
  });

  it("never lets the ceiling drop under the floor", () => {
    const policy = new RetryPolicy({ minDelayMs: 500, maxDelayMs: 100, maxAttempts: 0 });

    expect(policy.options).toEqual({ maxAttempts: 1, minDelayMs: 500, maxDelayMs: 500 });
  });

  it("retries transient failures and returns the first success", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const policy = new RetryPolicy({ sleep });
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new TransportHttpError(503, "busy"))
      .mockRejectedValueOnce(new TransportHttpError(503, "busy"))
      .mockResolvedValueOnce("ok");

    await expect(policy.execute(fn)).resolves.toBe("ok");

    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[4_000], [8_000]]);
  });

  it("rethrows the last error once attempts run out", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const policy = new RetryPolicy({ sleep });
    const failure = new TransportHttpError(500, "down");
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(failure);

    await expect(policy.execute(fn)).rejects.toBe(failure);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("fails at once on errors that are not retryable", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const policy = new RetryPolicy({ sleep });
    const failure = new TransportHttpError(401, "bad key");
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(failure);

    await expect(policy.execute(fn)).rejects.toBe(failure);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("waits what the provider asks for on 429", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const policy = new RetryPolicy({ sleep });
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new TransportHttpError(429, "slow down", 7))
      .mockResolvedValueOnce("ok");

    await policy.execute(fn);

    expect(sleep.mock.calls).toEqual([[7_000]]);
  });

  it("uses a custom classifier when given one", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const policy = new RetryPolicy({ sleep, classify: () => ({ retryable: true }), maxAttempts: 2 });
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValueOnce("nope").mockResolvedValueOnce("ok");

    await expect(policy.execute(fn)).resolves.toBe("ok");
    expect(policy.isRetryable("anything")).toBe(true);
  });
});

describe("classifyError", () => {
  it.each([408, 425, 429, 500, 503])("treats HTTP %d as transient", (status) => {
    expect(classifyError(new TransportHttpError(status, "")).retryable).toBe(true);
  });

  it.each([400, 401, 403, 404, 422])("treats HTTP %d as fatal", (status) => {
    expect(classifyError(new TransportHttpError(status, "")).retryable).toBe(false);
  });

  it("passes the Retry-After hint along", () => {
    expect(classifyError(new TransportHttpError(429, "", 2))).toEqual({ retryable: true, retryAfterSeconds: 2 });
  });

  it("recognises network failures", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";

    expect(classifyError(reset).retryable).toBe(true);
    expect(classifyError(timeout).retryable).toBe(true);
    expect(classifyError(new TypeError("fetch failed")).retryable).toBe(true);
    expect(classifyError(new TransportTimeoutError(60_000)).retryable).toBe(true);
    expect(classifyError(new Error("request failed", { cause: reset })).retryable).toBe(true);
  });

  it("reads status and retryable flags off foreign errors", () => {
    expect(classifyError(Object.assign(new Error("bad gateway"), { status: 502 })).retryable).toBe(true);
    expect(classifyError(Object.assign(new Error("forbidden"), { status: 403 })).retryable).toBe(false);
    expect(classifyError(Object.assign(new Error("later"), { retryable: true })).retryable).toBe(true);
  });

  it("treats everything else as fatal", () => {
    expect(classifyError(new Error("boom")).retryable).toBe(false);
    expect(classifyError("boom").retryable).toBe(false);
  });
});
