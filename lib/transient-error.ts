/**
 * Transient Error Detection
 *
 * Classifies errors from the OCM (axios) and GitHub (Octokit) clients as
 * transient, i.e. worth retrying, or permanent. Configuration and schema
 * errors never qualify.
 */

import { isAxiosError } from "axios";

/** Network-level error codes that indicate a transient failure. */
export const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNABORTED",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

type HeaderBag = Record<string, unknown> | undefined;

function getHeaderValue(headers: HeaderBag, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target && value !== undefined && value !== null) {
      return String(value);
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getResponseHeaders(error: unknown): HeaderBag {
  if (!isRecord(error) || !isRecord(error.response)) {
    return undefined;
  }
  const headers = error.response.headers;
  return isRecord(headers) ? headers : undefined;
}

/**
 * Extract the HTTP status code from an error object, or null if absent.
 * Axios keeps it on `response.status`; Octokit's RequestError on `status`.
 */
export function getErrorStatus(error: unknown): number | null {
  if (isAxiosError(error)) {
    return error.response?.status ?? null;
  }
  if (!isRecord(error)) {
    return null;
  }
  return typeof error.status === "number" ? error.status : null;
}

/**
 * Returns true for 403 or 429 errors that carry rate-limit signals.
 * A plain 403 (permission denied) returns false.
 */
export function isRateLimitError(error: unknown): boolean {
  const status = getErrorStatus(error);
  if (status !== 403 && status !== 429) {
    return false;
  }
  const headers = getResponseHeaders(error);
  const remaining = getHeaderValue(headers, "x-ratelimit-remaining");
  const retryAfter = getHeaderValue(headers, "retry-after");
  if (remaining === "0" || retryAfter) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("rate limit");
}

/**
 * Determine whether an error is transient.
 *
 * Covers:
 * - Network errors: ECONNRESET, ETIMEDOUT, ECONNABORTED, ECONNREFUSED, ENOTFOUND, EAI_AGAIN, EPIPE
 * - Rate limits: 429, or 403 with rate-limit response signals
 * - Server errors: any HTTP 5xx
 */
export function isTransientError(error: unknown): boolean {
  if (isRecord(error) && typeof error.code === "string" && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return true;
  }

  const status = getErrorStatus(error);

  if (status === 429) {
    return true;
  }

  if (status !== null && status >= 500) {
    return true;
  }

  return isRateLimitError(error);
}
