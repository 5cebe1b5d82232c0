/**
 * OCM Base Client
 *
 * Thin authenticated client for the OpenShift Cluster Manager API. One
 * instance per environment: a client-credentials token is acquired on the
 * first request and reused. GETs retry transient failures; writes log the
 * response body on failure and rethrow.
 */

import axios, { isAxiosError, type AxiosInstance } from "axios";
import { z } from "zod";
import type { OCMEnvironment } from "../app-interface/schemas.js";
import type { Logger } from "../logger.js";
import { logger as defaultLogger } from "../logger.js";
import { withRetry } from "../retry.js";
import type { SecretReader } from "../secret-reader.js";
import { CONFIG_BOUNDS } from "../config.js";

export type OCMSession = Pick<AxiosInstance, "get" | "post" | "patch" | "delete">;

export type QueryParams = Record<string, string | number | boolean>;

export type OCMItem = Record<string, unknown>;

export interface OCMClientOptions {
  url: string;
  accessTokenClientId: string;
  accessTokenClientSecret: string;
  accessTokenUrl: string;
  session?: OCMSession;
  requestTimeoutMs?: number;
  tokenMaxAttempts?: number;
  requestMaxAttempts?: number;
  /** Default page size of paginated calls */
  pageSize?: number;
  /** Hard cap on pages fetched by one paginated call */
  pageLimit?: number;
  logger?: Logger;
}

export interface PaginationOptions {
  maxPageSize?: number;
  /** Stop quietly after this many pages */
  maxPages?: number;
}

export class PaginationLimitError extends Error {
  constructor(apiPath: string, limit: number) {
    super(`pagination of ${apiPath} exceeded ${limit} pages`);
    this.name = "PaginationLimitError";
  }
}

const TokenResponseSchema = z.object({ access_token: z.string().min(1) });

const PageSchema = z.object({
  items: z.array(z.record(z.unknown())).nullish(),
  page: z.number().nullish(),
  size: z.number().nullish(),
});

export class OCMBaseClient {
  private readonly session: OCMSession;
  private readonly timeout: number;
  private readonly logger: Logger;
  private accessToken: Promise<string> | undefined;

  constructor(private readonly options: OCMClientOptions) {
    this.session = options.session ?? axios.create();
    this.timeout = options.requestTimeoutMs ?? CONFIG_BOUNDS.requestTimeoutSeconds.default * 1000;
    this.logger = options.logger ?? defaultLogger;
  }

  get url(): string {
    return this.options.url;
  }

  private async fetchAccessToken(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.options.accessTokenClientId,
      client_secret: this.options.accessTokenClientSecret,
    });
    const response = await withRetry(
      () =>
        this.session.post(this.options.accessTokenUrl, form, {
          headers: { "content-type": "application/x-www-form-urlencoded" },
          timeout: this.timeout,
        }),
      {
        maxAttempts: this.options.tokenMaxAttempts ?? CONFIG_BOUNDS.tokenMaxAttempts.default,
        initialDelayMs: 1_000,
        backoffFactor: 2,
        operation: `access token request for ${this.options.accessTokenClientId}`,
      },
      this.logger
    );
    return TokenResponseSchema.parse(response.data).access_token;
  }

  private async headers(): Promise<Record<string, string>> {
    if (!this.accessToken) {
      const pending = this.fetchAccessToken();
      this.accessToken = pending;
      // a failed bootstrap is retried by the next request
      pending.catch(() => {
        if (this.accessToken === pending) {
          this.accessToken = undefined;
        }
      });
    }
    return {
      authorization: `Bearer ${await this.accessToken}`,
      accept: "application/json",
    };
  }

  async get(apiPath: string, params?: QueryParams): Promise<unknown> {
    const headers = await this.headers();
    const response = await withRetry(
      () => this.session.get(`${this.options.url}${apiPath}`, { params, headers, timeout: this.timeout }),
      {
        maxAttempts: this.options.requestMaxAttempts ?? CONFIG_BOUNDS.requestMaxAttempts.default,
        operation: `GET ${apiPath}`,
      },
      this.logger
    );
    return response.data;
  }

  /**
   * Iterate the `items` of a paginated list endpoint.
   *
   * @throws PaginationLimitError when the page limit is reached while
   * the server still returns full pages
   */
  async *getPaginated(
    apiPath: string,
    params: QueryParams = {},
    { maxPageSize = this.options.pageSize ?? CONFIG_BOUNDS.pageSize.default, maxPages }: PaginationOptions = {}
  ): AsyncGenerator<OCMItem, void, undefined> {
    const pageLimit = this.options.pageLimit ?? CONFIG_BOUNDS.maxPages.default;
    for (let page = 1; ; page++) {
      if (page > pageLimit) {
        throw new PaginationLimitError(apiPath, pageLimit);
      }
      const response = PageSchema.parse(await this.get(apiPath, { ...params, size: maxPageSize, page }));
      const items = response.items ?? [];
      yield* items;
      const onPage = response.size ?? items.length;
      if (onPage < maxPageSize) {
        return;
      }
      if (maxPages !== undefined && page >= maxPages) {
        return;
      }
    }
  }

  async post(apiPath: string, data?: unknown, params?: QueryParams): Promise<unknown> {
    const response = await this.write("POST", apiPath, () =>
      this.headers().then((headers) =>
        this.session.post(`${this.options.url}${apiPath}`, data, { params, headers, timeout: this.timeout })
      )
    );
    return response.status === 204 ? {} : response.data;
  }

  async patch(apiPath: string, data: unknown, params?: QueryParams): Promise<void> {
    await this.write("PATCH", apiPath, () =>
      this.headers().then((headers) =>
        this.session.patch(`${this.options.url}${apiPath}`, data, { params, headers, timeout: this.timeout })
      )
    );
  }

  async delete(apiPath: string): Promise<void> {
    await this.write("DELETE", apiPath, () =>
      this.headers().then((headers) =>
        this.session.delete(`${this.options.url}${apiPath}`, { headers, timeout: this.timeout })
      )
    );
  }

  private async write<T>(method: string, apiPath: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        this.logger.error(`${method} ${apiPath} failed with ${error.response.status}: ${JSON.stringify(error.response.data)}`);
      }
      throw error;
    }
  }
}

/**
 * The subset of the client the discovery and label functions use.
 */
export type OCMApi = Pick<OCMBaseClient, "get" | "getPaginated" | "post" | "patch" | "delete">;

export interface InitOCMClientOptions {
  session?: OCMSession;
  requestTimeoutMs?: number;
  tokenMaxAttempts?: number;
  requestMaxAttempts?: number;
  pageSize?: number;
  pageLimit?: number;
  logger?: Logger;
}

export async function initOCMBaseClient(
  environment: OCMEnvironment,
  secretReader: SecretReader,
  options: InitOCMClientOptions = {}
): Promise<OCMBaseClient> {
  return new OCMBaseClient({
    ...options,
    url: environment.url,
    accessTokenClientId: environment.accessTokenClientId,
    accessTokenUrl: environment.accessTokenUrl,
    accessTokenClientSecret: await secretReader.readSecret(environment.accessTokenClientSecret),
  });
}

/** OCM clients by environment name */
export type OCMApis = ReadonlyMap<string, OCMApi>;

export type InitOCMApi = (environment: OCMEnvironment) => Promise<OCMApi>;

/**
 * Build one client per environment that is actually referenced.
 */
export async function initOCMApis(
  environments: readonly OCMEnvironment[],
  init: InitOCMApi,
  only?: ReadonlySet<string>
): Promise<Map<string, OCMApi>> {
  const apis = new Map<string, OCMApi>();
  for (const environment of environments) {
    if (only && !only.has(environment.name)) {
      continue;
    }
    apis.set(environment.name, await init(environment));
  }
  return apis;
}
