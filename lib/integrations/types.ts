/**
 * Integration Contract
 *
 * Every integration reads desired state through the query function,
 * reads current state from the external system, diffs and applies. The
 * entry point builds the context once and passes it in.
 */

import type { QueryFunction } from "../app-interface/query-function.js";
import type { OCMEnvironment } from "../app-interface/schemas.js";
import type { RuntimeConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { initOCMBaseClient, type OCMApi } from "../ocm/base-client.js";
import type { SecretReader } from "../secret-reader.js";

export interface IntegrationContext {
  config: RuntimeConfig;
  query: QueryFunction;
  secretReader: SecretReader;
  logger: Logger;
}

export interface Integration {
  readonly name: string;
  /**
   * Desired state the early-exit hash is computed from. Equal hashes
   * between runs mean there is nothing new to apply.
   */
  getEarlyExitDesiredState(ctx: IntegrationContext): Promise<unknown>;
  run(ctx: IntegrationContext): Promise<void>;
}

/**
 * Builds the OCM client for one environment.
 */
export type OCMApiFactory = (environment: OCMEnvironment, ctx: IntegrationContext) => Promise<OCMApi>;

export const initOCMApiFromContext: OCMApiFactory = (environment, ctx) =>
  initOCMBaseClient(environment, ctx.secretReader, {
    requestTimeoutMs: ctx.config.requestTimeoutMs,
    tokenMaxAttempts: ctx.config.tokenMaxAttempts,
    requestMaxAttempts: ctx.config.requestMaxAttempts,
    pageSize: ctx.config.pageSize,
    pageLimit: ctx.config.maxPages,
    logger: ctx.logger,
  });
