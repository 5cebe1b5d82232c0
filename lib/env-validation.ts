/**
 * Environment Variable Validation
 *
 * Checks the variables every integration entry point needs before any
 * external call is made: where desired state comes from and, optionally,
 * how to authenticate against it.
 */

/**
 * Raised for missing or invalid configuration. Never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface EnvValidationResult {
  valid: boolean;
  missing: string[];
}

/**
 * Where the desired-state document is read from.
 */
export type DesiredStateSource =
  | { kind: "bundle"; path: string }
  | { kind: "graphql"; url: string; token?: string };

const BUNDLE_VAR = "APP_INTERFACE_BUNDLE";
const SERVER_URL_VAR = "QONTRACT_SERVER_URL";
const SERVER_TOKEN_VAR = "QONTRACT_SERVER_TOKEN";

/**
 * Validate that a desired-state source is configured.
 *
 * @param required - Additional variables the caller needs
 */
export function validateEnv(
  required: readonly string[] = [],
  env: NodeJS.ProcessEnv = process.env
): EnvValidationResult {
  const missing: string[] = [];

  if (!env[BUNDLE_VAR] && !env[SERVER_URL_VAR]) {
    missing.push(`${BUNDLE_VAR} or ${SERVER_URL_VAR}`);
  }

  for (const varName of required) {
    if (!env[varName]) {
      missing.push(varName);
    }
  }

  return { valid: missing.length === 0, missing };
}

/**
 * Resolve the configured desired-state source. A bundle file wins over a
 * GraphQL server when both are set.
 *
 * @throws ConfigurationError when nothing is configured or the URL is invalid
 */
export function getDesiredStateSource(env: NodeJS.ProcessEnv = process.env): DesiredStateSource {
  const validation = validateEnv([], env);
  if (!validation.valid) {
    throw new ConfigurationError(
      `Missing required environment variables: ${validation.missing.join(", ")}`
    );
  }

  const bundle = env[BUNDLE_VAR];
  if (bundle) {
    return { kind: "bundle", path: bundle };
  }

  const url = env[SERVER_URL_VAR] ?? "";
  if (!URL.canParse(url)) {
    throw new ConfigurationError(`${SERVER_URL_VAR} must be a valid URL, got: ${url}`);
  }

  const token = env[SERVER_TOKEN_VAR];
  return token ? { kind: "graphql", url, token } : { kind: "graphql", url };
}
