/**
 * Runtime Configuration
 *
 * Tunables shared by every integration, derived once from the environment
 * by the entry point and passed down explicitly.
 */

// ───────────────────────────────────────────────────────────────────────────────
// Configuration Boundaries
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Bounds for every numeric setting. Out-of-range values are clamped;
 * unparseable values fall back to the default.
 */
export const CONFIG_BOUNDS = {
  requestTimeoutSeconds: { min: 1, max: 600, default: 60 },
  tokenMaxAttempts: { min: 1, max: 20, default: 10 },
  requestMaxAttempts: { min: 1, max: 10, default: 3 },
  pageSize: { min: 1, max: 100, default: 100 },
  subscriptionChunkSize: { min: 1, max: 500, default: 100 },
  maxPages: { min: 1, max: 100_000, default: 1_000 },
  githubConcurrency: { min: 1, max: 50, default: 10 },
} as const;

/** Parent prefixes; the managed prefixes are the segments below them that configuration uses */
export const DEFAULT_MANAGED_LABEL_PREFIXES = ["sre-capabilities"] as const;

export interface RuntimeConfig {
  dryRun: boolean;
  /** Desired-state hash of the last successful run; matching runs are skipped */
  earlyExitHash: string | undefined;
  requestTimeoutMs: number;
  tokenMaxAttempts: number;
  requestMaxAttempts: number;
  pageSize: number;
  subscriptionChunkSize: number;
  maxPages: number;
  /** Concurrent GitHub requests per integration run */
  githubConcurrency: number;
  managedLabelPrefixes: readonly string[];
}

type Bounds = { readonly min: number; readonly max: number; readonly default: number };

/**
 * Parse an integer from an environment value and clamp it into bounds.
 */
export function parseBoundedInt(value: string | undefined, bounds: Bounds): number {
  const parsed = parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) {
    return bounds.default;
  }
  return Math.max(bounds.min, Math.min(bounds.max, parsed));
}

export function parseBoolean(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Split a comma-separated list, dropping blanks. Unset means the fallback;
 * an explicitly empty value means an empty list.
 */
export function parseList(value: string | undefined, fallback: readonly string[]): readonly string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return Object.freeze({
    dryRun: parseBoolean(env.DRY_RUN),
    earlyExitHash: env.EARLY_EXIT_HASH?.trim() || undefined,
    requestTimeoutMs:
      parseBoundedInt(env.OCM_REQUEST_TIMEOUT_SECONDS, CONFIG_BOUNDS.requestTimeoutSeconds) * 1000,
    tokenMaxAttempts: parseBoundedInt(env.OCM_TOKEN_MAX_ATTEMPTS, CONFIG_BOUNDS.tokenMaxAttempts),
    requestMaxAttempts: parseBoundedInt(env.OCM_REQUEST_MAX_ATTEMPTS, CONFIG_BOUNDS.requestMaxAttempts),
    pageSize: parseBoundedInt(env.OCM_PAGE_SIZE, CONFIG_BOUNDS.pageSize),
    subscriptionChunkSize: parseBoundedInt(
      env.OCM_SUBSCRIPTION_CHUNK_SIZE,
      CONFIG_BOUNDS.subscriptionChunkSize
    ),
    maxPages: parseBoundedInt(env.OCM_MAX_PAGES, CONFIG_BOUNDS.maxPages),
    githubConcurrency: parseBoundedInt(env.GITHUB_ORG_CONCURRENCY, CONFIG_BOUNDS.githubConcurrency),
    managedLabelPrefixes: parseList(env.OL_MANAGED_LABEL_PREFIXES, DEFAULT_MANAGED_LABEL_PREFIXES),
  });
}
