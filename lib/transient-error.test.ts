import { describe, it, expect } from "vitest";
import { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { getErrorStatus, isRateLimitError, isTransientError } from "./transient-error.js";

function axiosErrorWithStatus(status: number, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = {
    data: {},
    status,
    statusText: "",
    headers,
    config,
  };
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, null, response);
}

function requestError(status: number, message = "failed"): Error & { status: number } {
  return Object.assign(new Error(message), { status });
}

describe("getErrorStatus", () => {
  it("should read the response status of axios errors", () => {
    expect(getErrorStatus(axiosErrorWithStatus(404))).toBe(404);
  });

  it("should read the status property of Octokit errors", () => {
    expect(getErrorStatus(requestError(422))).toBe(422);
  });

  it("should return null when there is no status", () => {
    expect(getErrorStatus(new Error("plain"))).toBeNull();
    expect(getErrorStatus("oops")).toBeNull();
    expect(getErrorStatus(new AxiosError("network down", "ECONNRESET"))).toBeNull();
  });
});

describe("isRateLimitError", () => {
  it("should detect an exhausted rate limit on 403", () => {
    expect(isRateLimitError(axiosErrorWithStatus(403, { "X-RateLimit-Remaining": "0" }))).toBe(true);
  });

  it("should detect retry-after on 429", () => {
    expect(isRateLimitError(axiosErrorWithStatus(429, { "retry-after": "3" }))).toBe(true);
  });

  it("should detect a rate limit message on an Octokit 403", () => {
    expect(isRateLimitError(requestError(403, "You have exceeded a secondary rate limit"))).toBe(true);
  });

  it("should treat a plain 403 as permission denied", () => {
    expect(isRateLimitError(axiosErrorWithStatus(403))).toBe(false);
  });
});

describe("isTransientError", () => {
  it("should retry network errors", () => {
    expect(isTransientError(new AxiosError("socket hang up", "ECONNRESET"))).toBe(true);
    expect(isTransientError(Object.assign(new Error("timeout"), { code: "ETIMEDOUT" }))).toBe(true);
  });

  it("should retry 429 and 5xx responses", () => {
    expect(isTransientError(axiosErrorWithStatus(429))).toBe(true);
    expect(isTransientError(axiosErrorWithStatus(502))).toBe(true);
    expect(isTransientError(requestError(500))).toBe(true);
  });

  it("should not retry client errors", () => {
    expect(isTransientError(axiosErrorWithStatus(400))).toBe(false);
    expect(isTransientError(axiosErrorWithStatus(404))).toBe(false);
    expect(isTransientError(new Error("schema mismatch"))).toBe(false);
  });
});
