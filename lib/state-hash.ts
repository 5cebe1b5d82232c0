/**
 * Canonical Hashing
 *
 * SHA-256 over the RFC 8785 canonical JSON form of a value, so equal
 * structures hash identically regardless of key order or process.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function hashDesiredState(value: unknown): string {
  return createHash("sha256").update(canonicalJson(value)).digest("hex");
}
