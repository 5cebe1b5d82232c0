/**
 * Desired-State Query Functions
 *
 * A QueryFunction turns a GraphQL query into its `data` object. Against a
 * qontract server the query is posted; against a local bundle file the
 * whole document is returned and each typed query picks its root field.
 */

import { readFile } from "node:fs/promises";
import axios from "axios";
import * as yaml from "js-yaml";
import { z } from "zod";
import type { DesiredStateSource } from "../env-validation.js";

export type QueryFunction = (query: string) => Promise<unknown>;

export class QueryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "QueryError";
  }
}

const GraphqlResponseSchema = z.object({
  data: z.record(z.unknown()).nullish(),
  errors: z.array(z.object({ message: z.string() })).nullish(),
});

/**
 * Minimal HTTP surface used for GraphQL; an axios instance satisfies it.
 */
export interface GraphqlSession {
  post(url: string, data: unknown, config?: { headers?: Record<string, string>; timeout?: number }): Promise<{ data: unknown }>;
}

export interface GraphqlQueryOptions {
  url: string;
  token?: string;
  timeoutMs?: number;
  session?: GraphqlSession;
}

export function createGraphqlQueryFunction(options: GraphqlQueryOptions): QueryFunction {
  const session = options.session ?? axios.create();
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (options.token) {
    headers.authorization = options.token;
  }

  return async (query) => {
    const response = await session.post(options.url, { query }, { headers, timeout: options.timeoutMs ?? 60_000 });
    const parsed = GraphqlResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new QueryError(`unexpected GraphQL response from ${options.url}`, { cause: parsed.error });
    }
    if (parsed.data.errors && parsed.data.errors.length > 0) {
      throw new QueryError(`GraphQL errors: ${parsed.data.errors.map((e) => e.message).join("; ")}`);
    }
    return parsed.data.data ?? {};
  };
}

/**
 * Query function over a YAML or JSON bundle file. The file is read once.
 */
export function createBundleQueryFunction(
  path: string,
  read: (path: string) => Promise<string> = (file) => readFile(file, "utf8")
): QueryFunction {
  let document: Promise<unknown> | undefined;

  const load = async (): Promise<unknown> => {
    const content = await read(path);
    try {
      return yaml.load(content);
    } catch (error) {
      throw new QueryError(`cannot parse desired-state bundle ${path}`, { cause: error });
    }
  };

  return async () => {
    document ??= load();
    return document;
  };
}

export function createQueryFunction(source: DesiredStateSource): QueryFunction {
  switch (source.kind) {
    case "bundle":
      return createBundleQueryFunction(source.path);
    case "graphql":
      return createGraphqlQueryFunction({ url: source.url, token: source.token });
  }
}
