/**
 * Shared Integration Runner
 *
 * Builds the integration context from the environment (runtime config,
 * desired-state source, secrets, logger), applies the early-exit check and
 * reports failures through @actions/core.
 */

import * as core from "@actions/core";
import { createQueryFunction } from "../../lib/app-interface/query-function.js";
import { loadRuntimeConfig } from "../../lib/config.js";
import { getDesiredStateSource } from "../../lib/env-validation.js";
import type { Integration, IntegrationContext } from "../../lib/integrations/types.js";
import { createLogger } from "../../lib/logger.js";
import { EnvSecretReader } from "../../lib/secret-reader.js";
import { hashDesiredState } from "../../lib/state-hash.js";

/**
 * Assemble the context an integration runs with.
 *
 * @throws ConfigurationError when no desired-state source is configured
 */
export function buildIntegrationContext(name: string, env: NodeJS.ProcessEnv = process.env): IntegrationContext {
  return {
    config: loadRuntimeConfig(env),
    query: createQueryFunction(getDesiredStateSource(env)),
    secretReader: new EnvSecretReader(env),
    logger: createLogger({ prefix: name }),
  };
}

/**
 * Run one integration end to end.
 *
 * Returns without changes when `EARLY_EXIT_HASH` equals the hash of the
 * current desired state.
 */
export async function runIntegration(integration: Integration): Promise<void> {
  let ctx: IntegrationContext;
  try {
    ctx = buildIntegrationContext(integration.name);
  } catch (error) {
    core.setFailed(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const { logger, config } = ctx;
  logger.info(`Starting ${integration.name}${config.dryRun ? " (dry-run)" : ""}`);

  try {
    const desiredStateHash = hashDesiredState(await integration.getEarlyExitDesiredState(ctx));
    logger.info(`desired_state_hash=${desiredStateHash}`);
    if (config.earlyExitHash === desiredStateHash) {
      logger.info("Desired state unchanged since the last run, nothing to do");
      return;
    }

    await integration.run(ctx);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`${integration.name} failed`, err);
    core.setFailed(err.message);
    process.exit(1);
  }

  logger.info(`Done - ${integration.name} completed successfully`);
}

/**
 * Standard entry point guard for scripts.
 * Runs main() only when the script is executed directly (not imported for testing).
 *
 * @param callerUrl - Pass `import.meta.url` from the calling module
 */
export function runIfMain(callerUrl: string, main: () => Promise<void>): void {
  const entryUrl = process.argv[1] ? new URL(process.argv[1], "file://").href : "";
  if (callerUrl === entryUrl) {
    main().catch((error: unknown) => {
      core.setFailed(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  }
}
