import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { withRetry } from "./retry.js";
import type { Logger } from "./logger.js";

function transient(): Error & { code: string } {
  return Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
}

function createLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  };
}

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should return the first successful result without retrying", async () => {
    const fn = vi.fn().mockResolvedValue("token");
    await expect(withRetry(fn)).resolves.toBe("token");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should retry transient errors until success", async () => {
    const logger = createLogger();
    const fn = vi.fn()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { operation: "GET /api" }, logger)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledWith("GET /api failed (attempt 1/3), retrying");
  });

  it("should rethrow the original error after the last attempt", async () => {
    const error = transient();
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { maxAttempts: 2 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should not retry errors rejected by shouldRetry", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("bad request"));

    await expect(withRetry(fn, { maxAttempts: 5 })).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should grow the delay by the backoff factor", async () => {
    const logger = createLogger();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error("a"))
      .mockRejectedValueOnce(new Error("b"))
      .mockResolvedValue("ok");

    const promise = withRetry(
      fn,
      { maxAttempts: 3, initialDelayMs: 1000, backoffFactor: 2, shouldRetry: () => true, operation: "token" },
      logger
    );
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe("ok");
    expect(logger.warn).toHaveBeenNthCalledWith(1, "token failed (attempt 1/3), retrying in 1.0s");
    expect(logger.warn).toHaveBeenNthCalledWith(2, "token failed (attempt 2/3), retrying in 2.0s");
  });
});
