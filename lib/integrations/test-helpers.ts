/**
 * Shared fixtures for integration tests.
 */

import { vi } from "vitest";
import type { QueryFunction } from "../app-interface/query-function.js";
import { loadRuntimeConfig, type RuntimeConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { SecretReader } from "../secret-reader.js";
import type { IntegrationContext } from "./types.js";

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  };
}

/**
 * Query function answering each query with the `data` entry whose key
 * appears in the query text, e.g. `clusters_v1`.
 */
export function createStaticQuery(data: Record<string, Record<string, unknown>>): QueryFunction {
  return async (query) => {
    const match = Object.keys(data).find((marker) => query.includes(marker));
    return match ? data[match] : {};
  };
}

export const TEST_OCM_ENVIRONMENT = {
  name: "ocm-test",
  url: "https://api.ocm.example.com",
  accessTokenClientId: "test-client",
  accessTokenUrl: "https://sso.example.com/token",
  accessTokenClientSecret: { path: "secrets/ocm", field: "client_secret" },
};

export function createTestContext(options: {
  data?: Record<string, Record<string, unknown>>;
  config?: Partial<RuntimeConfig>;
  secrets?: Record<string, string>;
}): IntegrationContext {
  const secrets = options.secrets ?? {};
  const secretReader: SecretReader = {
    readSecret: async (ref) => secrets[`${ref.path}#${ref.field}`] ?? "test-secret",
  };
  return {
    config: { ...loadRuntimeConfig({}), ...options.config },
    query: createStaticQuery(options.data ?? {}),
    secretReader,
    logger: createMockLogger(),
  };
}
