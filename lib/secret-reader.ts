/**
 * Secret Reader
 *
 * Desired state references secrets by `{ path, field }`. Integrations
 * resolve them through a SecretReader so that tests and alternative
 * backends can be swapped in.
 */

import { ConfigurationError } from "./env-validation.js";

export interface SecretRef {
  path: string;
  field: string;
}

export interface SecretReader {
  readSecret(ref: SecretRef): Promise<string>;
}

/**
 * Environment variable a secret reference maps to: path and field joined
 * with `_`, upper-cased, every other character replaced by `_`.
 *
 * `app-sre/ocm/prod` + `client_secret` → `APP_SRE_OCM_PROD_CLIENT_SECRET`
 */
export function secretEnvVarName(ref: SecretRef): string {
  return `${ref.path}_${ref.field}`
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export class EnvSecretReader implements SecretReader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async readSecret(ref: SecretRef): Promise<string> {
    const name = secretEnvVarName(ref);
    const value = this.env[name];
    if (!value) {
      throw new ConfigurationError(`secret ${ref.path}#${ref.field} is not available (expected ${name})`);
    }
    return value;
  }
}
