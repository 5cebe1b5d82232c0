import { describe, it, expect, vi } from "vitest";
import {
  QueryError,
  createBundleQueryFunction,
  createGraphqlQueryFunction,
  type GraphqlSession,
} from "./query-function.js";

describe("createGraphqlQueryFunction", () => {
  function session(data: unknown): GraphqlSession {
    return { post: vi.fn().mockResolvedValue({ data }) };
  }

  it("should post the query and return the data object", async () => {
    const http = session({ data: { clusters: [] } });
    const queryFn = createGraphqlQueryFunction({
      url: "https://qontract.example.com/graphql",
      token: "test-token",
      session: http,
    });

    await expect(queryFn("query { clusters }")).resolves.toEqual({ clusters: [] });
    expect(http.post).toHaveBeenCalledWith(
      "https://qontract.example.com/graphql",
      { query: "query { clusters }" },
      { headers: { "content-type": "application/json", authorization: "test-token" }, timeout: 60_000 }
    );
  });

  it("should raise GraphQL errors", async () => {
    const queryFn = createGraphqlQueryFunction({
      url: "https://qontract.example.com/graphql",
      session: session({ errors: [{ message: "unknown field" }, { message: "bad type" }] }),
    });

    await expect(queryFn("query { nope }")).rejects.toThrow("GraphQL errors: unknown field; bad type");
  });

  it("should reject responses that are not GraphQL envelopes", async () => {
    const queryFn = createGraphqlQueryFunction({
      url: "https://qontract.example.com/graphql",
      session: session("<html>"),
    });

    await expect(queryFn("query { clusters }")).rejects.toBeInstanceOf(QueryError);
  });
});

describe("createBundleQueryFunction", () => {
  it("should parse the YAML bundle once", async () => {
    const read = vi.fn().mockResolvedValue("clusters:\n  - name: prod-1\n");
    const queryFn = createBundleQueryFunction("/bundle.yml", read);

    await expect(queryFn("query A")).resolves.toEqual({ clusters: [{ name: "prod-1" }] });
    await queryFn("query B");
    expect(read).toHaveBeenCalledTimes(1);
    expect(read).toHaveBeenCalledWith("/bundle.yml");
  });

  it("should accept JSON bundles", async () => {
    const queryFn = createBundleQueryFunction("/bundle.json", async () => '{"roles": []}');
    await expect(queryFn("query")).resolves.toEqual({ roles: [] });
  });

  it("should wrap parse failures", async () => {
    const queryFn = createBundleQueryFunction("/broken.yml", async () => "a: [unclosed");
    await expect(queryFn("query")).rejects.toThrow("cannot parse desired-state bundle /broken.yml");
  });
});
